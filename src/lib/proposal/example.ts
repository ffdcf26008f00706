// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import fs from 'fs'
import path from 'path'
import type { ProposalFields } from '@/lib/types/proposal'
import { assertValidProposal } from './validate'

export const WORKED_EXAMPLE_FILE = path.resolve(
  __dirname,
  '../../../data/examples/cybersecurity-soc-analyst.json',
)

/**
 * Load the bundled, fully worked proposal (a SOC intrusion investigation).
 */
export function loadWorkedExample(
  filePath: string = WORKED_EXAMPLE_FILE,
): ProposalFields {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'))
  return assertValidProposal(raw, 'en')
}
