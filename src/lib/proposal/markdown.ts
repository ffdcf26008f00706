// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { Lang } from '@/lib/utils/lang'
import { DEFAULT_LANGUAGE } from '@/lib/config/constants'
import type { ProposalFields } from '@/lib/types/proposal'
import { PROPOSAL_FIELDS } from './fields'
import { getProposalLabels } from './labels'

export interface MarkdownRenderOptions {
  language?: Lang
  heading?: string
}

// One table cell: pipes escaped, lines trimmed and joined with <br>
export function escapeTableCell(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .join('<br>')
    .replace(/\|/g, '\\|')
}

/**
 * Render the proposal into the fixed two-column table, one row per field.
 */
export function renderProposalMarkdown(
  fields: ProposalFields,
  options: MarkdownRenderOptions = {},
): string {
  const language = options.language ?? DEFAULT_LANGUAGE
  const labels = getProposalLabels(language)
  const heading = (options.heading ?? fields.title).replace(/\s+/g, ' ').trim()

  const lines = [
    `# ${heading}`,
    '',
    `| ${labels.fieldHeader} | ${labels.detailsHeader} |`,
    '| --- | --- |',
  ]
  for (const field of PROPOSAL_FIELDS) {
    const value = fields[field.key]?.trim()
    const cell = value ? escapeTableCell(value) : labels.notApplicable
    lines.push(`| ${labels.fields[field.key]} | ${cell} |`)
  }
  return lines.join('\n') + '\n'
}
