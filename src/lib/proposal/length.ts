// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { LengthUnit, ProjectLength } from '@/lib/types/proposal'

const LENGTH_PATTERN = /^(\d+(?:\.\d+)?)\s*([a-z]+)$/i

// Accepted spellings per unit, Indonesian included
const UNIT_ALIASES: Record<string, LengthUnit> = {
  h: 'hours',
  hr: 'hours',
  hrs: 'hours',
  hour: 'hours',
  hours: 'hours',
  jam: 'hours',
  min: 'minutes',
  mins: 'minutes',
  minute: 'minutes',
  minutes: 'minutes',
  menit: 'minutes',
}

/**
 * Parse a project length such as "8 hours" or "90 min".
 * Returns null unless the text is a positive number followed by a known unit.
 */
export function parseProjectLength(text: string): ProjectLength | null {
  const match = LENGTH_PATTERN.exec(text.trim())
  if (!match) return null

  const value = Number.parseFloat(match[1])
  const unit = UNIT_ALIASES[match[2].toLowerCase()]
  if (!unit || !Number.isFinite(value) || value <= 0) return null

  return { value, unit, hours: unit === 'hours' ? value : value / 60 }
}
