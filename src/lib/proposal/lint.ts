// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import {
  DEFAULT_LANGUAGE,
  MAX_LENGTH_HOURS,
  MAX_TITLE_LENGTH,
  MIN_LEARNING_OBJECTIVES,
  MIN_OVERVIEW_WORDS,
  MIN_PROJECT_STEPS,
} from '@/lib/config/constants'
import type { LintOptions, LintReport, ProposalIssue } from '@/lib/types/proposal'
import { countWords, logProposalDebug } from '@/lib/utils/text'
import { PROPOSAL_FIELDS } from './fields'
import { getProposalLabels } from './labels'
import { splitListItems } from './list-items'
import { isPlaceholderText } from './template'
import { validateProposal } from './validate'

/**
 * Editorial checks on top of validation. Validation issues are errors; everything
 * found on a structurally valid proposal is a warning.
 */
export function lintProposal(input: unknown, options: LintOptions = {}): LintReport {
  const language = options.language ?? DEFAULT_LANGUAGE
  const maxLengthHours = options.maxLengthHours ?? MAX_LENGTH_HOURS
  const minLearningObjectives = options.minLearningObjectives ?? MIN_LEARNING_OBJECTIVES
  const minProjectSteps = options.minProjectSteps ?? MIN_PROJECT_STEPS
  const minOverviewWords = options.minOverviewWords ?? MIN_OVERVIEW_WORDS
  const maxTitleLength = options.maxTitleLength ?? MAX_TITLE_LENGTH

  const result = validateProposal(input, language)
  if (!result.valid) {
    return { passed: false, errors: result.issues, warnings: [] }
  }

  const { proposal, projectLength } = result
  const { fields, messages } = getProposalLabels(language)
  const warnings: ProposalIssue[] = []
  const warn = (field: ProposalIssue['field'], code: ProposalIssue['code'], message: string) =>
    warnings.push({ field, code, message, severity: 'warning' })

  for (const { key } of PROPOSAL_FIELDS) {
    const value = proposal[key]
    if (value && isPlaceholderText(key, value)) {
      warn(key, 'placeholder_text', messages.placeholderText(fields[key]))
    }
  }

  if (projectLength.hours > maxLengthHours) {
    warn(
      'length',
      'length_exceeds_maximum',
      messages.lengthExceedsMaximum(fields.length, projectLength.hours, maxLengthHours),
    )
  }

  const objectiveCount = splitListItems(proposal.learningObjectives).length
  if (objectiveCount < minLearningObjectives) {
    warn(
      'learningObjectives',
      'too_few_learning_objectives',
      messages.tooFewItems(fields.learningObjectives, objectiveCount, minLearningObjectives),
    )
  }

  const overviewWords = countWords(proposal.overview)
  if (overviewWords < minOverviewWords) {
    warn(
      'overview',
      'overview_too_short',
      messages.tooFewWords(fields.overview, overviewWords, minOverviewWords),
    )
  }

  const titleLength = [...proposal.title].length
  if (titleLength > maxTitleLength) {
    warn('title', 'title_too_long', messages.titleTooLong(fields.title, titleLength, maxTitleLength))
  }

  const stepCount = splitListItems(proposal.projectSteps).length
  if (stepCount < minProjectSteps) {
    warn(
      'projectSteps',
      'too_few_project_steps',
      messages.tooFewItems(fields.projectSteps, stepCount, minProjectSteps),
    )
  }

  logProposalDebug('Lint finished:', { warnings: warnings.length })
  return {
    passed: options.strict ? warnings.length === 0 : true,
    errors: [],
    warnings,
  }
}
