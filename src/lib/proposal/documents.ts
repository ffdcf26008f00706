// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { Lang } from '@/lib/utils/lang'
import { DEFAULT_LANGUAGE } from '@/lib/config/constants'
import type { LintOptions, ProposalFields } from '@/lib/types/proposal'
import { logProposalDebug, slugify } from '@/lib/utils/text'
import { errorHandler } from '@/lib/handler/error-handler'
import { generateProposalDocx } from './docx/builder'
import { ProposalValidationError } from './errors'
import { lintProposal } from './lint'
import { renderProposalMarkdown } from './markdown'
import { generateProposalPdf } from './pdf/generator'
import { assertValidProposal } from './validate'

export type ProposalDocumentFormat = 'markdown' | 'docx' | 'pdf'

export interface ProposalDocumentOptions extends Omit<LintOptions, 'language'> {
  format: ProposalDocumentFormat
  language?: Lang
}

export interface GeneratedProposalDocument {
  fileName: string
  mimeType: string
  content: Buffer
}

const FORMATS: Record<
  ProposalDocumentFormat,
  {
    extension: string
    mimeType: string
    render: (fields: ProposalFields, language: Lang) => Promise<Buffer>
  }
> = {
  markdown: {
    extension: 'md',
    mimeType: 'text/markdown; charset=utf-8',
    render: async (fields, language) =>
      Buffer.from(renderProposalMarkdown(fields, { language }), 'utf8'),
  },
  docx: {
    extension: 'docx',
    mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    render: generateProposalDocx,
  },
  pdf: {
    extension: 'pdf',
    mimeType: 'application/pdf',
    render: generateProposalPdf,
  },
}

export const DEFAULT_FILE_STEM = 'project-proposal'

export function proposalFileName(title: string, format: ProposalDocumentFormat): string {
  return `${slugify(title, DEFAULT_FILE_STEM)}.${FORMATS[format].extension}`
}

/**
 * Validate a proposal and render it to the requested format.
 *
 * With `strict`, editorial warnings also reject the proposal.
 */
export async function generateProposalDocument(
  input: unknown,
  options: ProposalDocumentOptions,
): Promise<GeneratedProposalDocument> {
  const language = options.language ?? DEFAULT_LANGUAGE
  const { format } = options

  try {
    const fields = assertValidProposal(input, language)
    if (options.strict) {
      const report = lintProposal(fields, { ...options, language })
      if (!report.passed) throw new ProposalValidationError(report.warnings)
    }

    logProposalDebug('Rendering proposal:', { format, language, title: fields.title })
    const content = await FORMATS[format].render(fields, language)
    return {
      fileName: proposalFileName(fields.title, format),
      mimeType: FORMATS[format].mimeType,
      content,
    }
  } catch (error) {
    console.error(`Error generating ${format} proposal:`, errorHandler(error))
    throw error
  }
}
