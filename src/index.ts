// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

export type {
  LengthUnit,
  LintOptions,
  LintReport,
  ProjectLength,
  ProposalFieldDefinition,
  ProposalFieldKey,
  ProposalFields,
  ProposalIssue,
  ProposalIssueCode,
  ProposalIssueSeverity,
  ProposalValidationResult,
} from './lib/types/proposal'
export type { Lang } from './lib/utils/lang'
export { normalizeLanguage, SUPPORTED_LANGUAGES } from './lib/utils/lang'
export {
  PROPOSAL_FIELDS,
  PROPOSAL_FIELD_KEYS,
  describeProposalFields,
  isProposalFieldKey,
} from './lib/proposal/fields'
export type { DescribedProposalField } from './lib/proposal/fields'
export { getProposalLabels } from './lib/proposal/labels'
export type { ProposalLabels } from './lib/proposal/labels'
export { parseProjectLength } from './lib/proposal/length'
export { splitListItems } from './lib/proposal/list-items'
export { proposalFieldsSchema } from './lib/proposal/schema'
export type { ProposalFieldsInput } from './lib/proposal/schema'
export { validateProposal, assertValidProposal } from './lib/proposal/validate'
export { ProposalValidationError } from './lib/proposal/errors'
export { lintProposal } from './lib/proposal/lint'
export { createBlankTemplate, isPlaceholderText, renderTemplateMarkdown } from './lib/proposal/template'
export { loadWorkedExample } from './lib/proposal/example'
export { renderProposalMarkdown, escapeTableCell } from './lib/proposal/markdown'
export type { MarkdownRenderOptions } from './lib/proposal/markdown'
export { generateProposalDocx } from './lib/proposal/docx/builder'
export { generateProposalPdf } from './lib/proposal/pdf/generator'
export {
  generateProposalDocument,
  proposalFileName,
} from './lib/proposal/documents'
export type {
  GeneratedProposalDocument,
  ProposalDocumentFormat,
  ProposalDocumentOptions,
} from './lib/proposal/documents'
export { errorHandler } from './lib/handler/error-handler'
