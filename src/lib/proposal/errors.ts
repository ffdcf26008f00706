// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { ProposalIssue } from '@/lib/types/proposal'

export class ProposalValidationError extends Error {
  readonly code = 'PROPOSAL_INVALID'
  readonly issues: ProposalIssue[]

  constructor(issues: ProposalIssue[], message: string = 'Proposal is incomplete or invalid') {
    super(message)
    this.name = 'ProposalValidationError'
    this.issues = issues
  }

  static isInstance(error: unknown): error is ProposalValidationError {
    return error instanceof ProposalValidationError
  }
}
