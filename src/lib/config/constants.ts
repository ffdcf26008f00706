// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { normalizeLanguage } from '@/lib/utils/lang'

export const readPositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(raw ?? '', 10)
  return Number.isNaN(parsed) ? fallback : Math.max(1, parsed)
}

// Configuration constants
export const DEFAULT_LANGUAGE = normalizeLanguage(process.env.PROPOSAL_LANGUAGE)

// Editorial thresholds used by the linter
export const MAX_LENGTH_HOURS = readPositiveInt(process.env.PROPOSAL_MAX_LENGTH_HOURS, 80)
export const MIN_LEARNING_OBJECTIVES = readPositiveInt(
  process.env.PROPOSAL_MIN_LEARNING_OBJECTIVES,
  3,
)
export const MIN_PROJECT_STEPS = readPositiveInt(process.env.PROPOSAL_MIN_PROJECT_STEPS, 3)
export const MIN_OVERVIEW_WORDS = readPositiveInt(process.env.PROPOSAL_MIN_OVERVIEW_WORDS, 20)
export const MAX_TITLE_LENGTH = readPositiveInt(process.env.PROPOSAL_MAX_TITLE_LENGTH, 80)

export const PROPOSAL_DEBUG_LOGS = process.env.PROPOSAL_DEBUG_LOGS === 'true'
