// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod'
import { parseProjectLength } from './length'

const requiredText = z.string().trim().min(1)

// Refinement params tag the issue so validation can report it as invalid_length
export const INVALID_LENGTH_PARAM = 'invalidLength'

export const proposalFieldsSchema = z
  .object({
    targetStudent: requiredText,
    prerequisites: requiredText,
    programs: z.string().trim().optional(),
    learningObjectives: requiredText,
    scenario: requiredText,
    title: requiredText,
    overview: requiredText,
    length: requiredText.refine((value) => value === '' || parseProjectLength(value) !== null, {
      params: { [INVALID_LENGTH_PARAM]: true },
    }),
    technicalRequirements: requiredText,
    projectSteps: requiredText,
  })
  .strict()

export type ProposalFieldsInput = z.input<typeof proposalFieldsSchema>
