// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { ZodIssue } from 'zod'
import type { Lang } from '@/lib/utils/lang'
import { DEFAULT_LANGUAGE } from '@/lib/config/constants'
import type {
  ProjectLength,
  ProposalFields,
  ProposalIssue,
  ProposalValidationResult,
} from '@/lib/types/proposal'
import { logProposalDebug } from '@/lib/utils/text'
import { ProposalValidationError } from './errors'
import { parseProjectLength } from './length'
import { PROPOSAL_FIELD_KEYS, isProposalFieldKey } from './fields'
import { getProposalLabels } from './labels'
import { INVALID_LENGTH_PARAM, proposalFieldsSchema } from './schema'

function toProposalIssues(issue: ZodIssue, language: Lang): ProposalIssue[] {
  const { fields, messages } = getProposalLabels(language)
  const key = issue.path[0]

  if (issue.code === 'unrecognized_keys') {
    return issue.keys.map((unknownKey): ProposalIssue => ({
      field: unknownKey,
      code: 'unknown_field',
      message: messages.unknownField(unknownKey),
      severity: 'error',
    }))
  }

  if (typeof key !== 'string' || !isProposalFieldKey(key)) {
    return [
      { field: null, code: 'invalid_input', message: messages.invalidInput, severity: 'error' },
    ]
  }

  const label = fields[key]
  const fieldIssue = (code: ProposalIssue['code'], message: string): ProposalIssue[] => [
    { field: key, code, message, severity: 'error' },
  ]
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined'
        ? fieldIssue('missing_field', messages.missingField(label))
        : fieldIssue('invalid_type', messages.invalidType(label))
    case 'too_small':
      return fieldIssue('empty_field', messages.emptyField(label))
    case 'custom':
      if (issue.params?.[INVALID_LENGTH_PARAM]) {
        return fieldIssue('invalid_length', messages.invalidLength(label))
      }
      break
  }
  return fieldIssue('invalid_type', messages.invalidType(label))
}

// Field order first, unknown fields after in the order they were reported
function issueRank(issue: ProposalIssue): number {
  if (issue.field === null) return -1
  const index = PROPOSAL_FIELD_KEYS.findIndex((key) => key === issue.field)
  return index === -1 ? PROPOSAL_FIELD_KEYS.length : index
}

/**
 * Validate a mapping of field name to text against the proposal table schema.
 *
 * Values are trimmed; an empty optional field is dropped from the result.
 */
export function validateProposal(
  input: unknown,
  language: Lang = DEFAULT_LANGUAGE,
): ProposalValidationResult {
  const parsed = proposalFieldsSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .flatMap((issue) => toProposalIssues(issue, language))
      .sort((a, b) => issueRank(a) - issueRank(b))
    logProposalDebug('Validation failed:', issues.map((issue) => issue.code))
    return { valid: false, issues }
  }

  const proposal: ProposalFields = { ...parsed.data }
  if (!proposal.programs) delete proposal.programs

  const projectLength: ProjectLength | null = parseProjectLength(proposal.length)
  if (!projectLength) {
    const { fields, messages } = getProposalLabels(language)
    return {
      valid: false,
      issues: [
        {
          field: 'length',
          code: 'invalid_length',
          message: messages.invalidLength(fields.length),
          severity: 'error',
        },
      ],
    }
  }

  return { valid: true, proposal, projectLength, issues: [] }
}

export function assertValidProposal(
  input: unknown,
  language: Lang = DEFAULT_LANGUAGE,
): ProposalFields {
  const result = validateProposal(input, language)
  if (!result.valid) throw new ProposalValidationError(result.issues)
  return result.proposal
}
