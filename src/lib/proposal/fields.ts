// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { Lang } from '@/lib/utils/lang'
import type { ProposalFieldDefinition, ProposalFieldKey } from '@/lib/types/proposal'
import { getProposalLabels } from './labels'

// Table order of the proposal document
export const PROPOSAL_FIELDS: readonly ProposalFieldDefinition[] = [
  { key: 'targetStudent', required: true, list: false, ordered: false },
  { key: 'prerequisites', required: true, list: true, ordered: false },
  { key: 'programs', required: false, list: false, ordered: false },
  { key: 'learningObjectives', required: true, list: true, ordered: false },
  { key: 'scenario', required: true, list: false, ordered: false },
  { key: 'title', required: true, list: false, ordered: false },
  { key: 'overview', required: true, list: false, ordered: false },
  { key: 'length', required: true, list: false, ordered: false },
  { key: 'technicalRequirements', required: true, list: true, ordered: false },
  { key: 'projectSteps', required: true, list: true, ordered: true },
]

export const PROPOSAL_FIELD_KEYS: readonly ProposalFieldKey[] = PROPOSAL_FIELDS.map(
  (field) => field.key,
)

export function isProposalFieldKey(key: string): key is ProposalFieldKey {
  return PROPOSAL_FIELD_KEYS.some((candidate) => candidate === key)
}

export interface DescribedProposalField extends ProposalFieldDefinition {
  label: string
  guidance: string
}

export function describeProposalFields(language: Lang = 'en'): DescribedProposalField[] {
  const labels = getProposalLabels(language)
  return PROPOSAL_FIELDS.map((field) => ({
    ...field,
    label: labels.fields[field.key],
    guidance: labels.guidance[field.key],
  }))
}
