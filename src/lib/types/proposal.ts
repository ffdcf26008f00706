// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { Lang } from '@/lib/utils/lang'

export type ProposalFieldKey =
  | 'targetStudent'
  | 'prerequisites'
  | 'programs'
  | 'learningObjectives'
  | 'scenario'
  | 'title'
  | 'overview'
  | 'length'
  | 'technicalRequirements'
  | 'projectSteps'

export interface ProposalFields {
  targetStudent: string
  prerequisites: string
  programs?: string
  learningObjectives: string
  scenario: string
  title: string
  overview: string
  length: string
  technicalRequirements: string
  projectSteps: string
}

export interface ProposalFieldDefinition {
  key: ProposalFieldKey
  required: boolean
  list: boolean
  ordered: boolean
}

export type LengthUnit = 'hours' | 'minutes'

export interface ProjectLength {
  value: number
  unit: LengthUnit
  hours: number
}

export type ProposalIssueCode =
  | 'invalid_input'
  | 'missing_field'
  | 'invalid_type'
  | 'empty_field'
  | 'invalid_length'
  | 'unknown_field'
  | 'placeholder_text'
  | 'length_exceeds_maximum'
  | 'too_few_learning_objectives'
  | 'overview_too_short'
  | 'title_too_long'
  | 'too_few_project_steps'

export type ProposalIssueSeverity = 'error' | 'warning'

export interface ProposalIssue {
  field: string | null
  code: ProposalIssueCode
  message: string
  severity: ProposalIssueSeverity
}

export type ProposalValidationResult =
  | {
      valid: true
      proposal: ProposalFields
      projectLength: ProjectLength
      issues: ProposalIssue[]
    }
  | { valid: false; issues: ProposalIssue[] }

export interface LintOptions {
  language?: Lang
  maxLengthHours?: number
  minLearningObjectives?: number
  minProjectSteps?: number
  minOverviewWords?: number
  maxTitleLength?: number
  strict?: boolean
}

export interface LintReport {
  passed: boolean
  errors: ProposalIssue[]
  warnings: ProposalIssue[]
}
