// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { jsPDF } from 'jspdf'
import autoTable from 'jspdf-autotable'
import type { Lang } from '@/lib/utils/lang'
import type { ProposalFieldDefinition, ProposalFields } from '@/lib/types/proposal'
import { PROPOSAL_FIELDS } from '../fields'
import { getProposalLabels } from '../labels'
import { splitListItems } from '../list-items'
import { stripBold } from '../docx/text'
import { COLORS, FONT_SIZES, LABEL_COLUMN_WIDTH, PAGE } from './constants'
import { registerUnicodeFonts } from './fonts'
import type { PdfContext } from './types'

/**
 * Plain-text cell content: list fields become "- item" or "1. item" lines,
 * bold markers are dropped.
 */
export function formatPdfCell(field: ProposalFieldDefinition, value: string): string {
  const plain = stripBold(value)
  if (field.list) {
    return splitListItems(plain)
      .map((item, index) => (field.ordered ? `${index + 1}. ${item}` : `- ${item}`))
      .join('\n')
  }
  return plain
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .join('\n')
}

function createPdfContext(language: Lang): PdfContext {
  const pdf = new jsPDF({ orientation: 'portrait', unit: 'mm', format: 'a4' })
  return {
    pdf,
    language,
    font: registerUnicodeFonts(pdf),
    currentY: PAGE.margin,
    pageWidth: PAGE.width,
    pageHeight: PAGE.height,
    margin: PAGE.margin,
    contentWidth: PAGE.width - PAGE.margin * 2,
  }
}

function addTitle(ctx: PdfContext, title: string): void {
  const { pdf } = ctx
  pdf.setFont(ctx.font, 'bold')
  pdf.setFontSize(FONT_SIZES.title)
  pdf.setTextColor(...COLORS.text)
  const lines: string[] = pdf.splitTextToSize(title.replace(/\s+/g, ' ').trim(), ctx.contentWidth)
  pdf.text(lines, ctx.pageWidth / 2, ctx.currentY, { align: 'center' })
  ctx.currentY += lines.length * 7 + 5
}

function addFieldTable(ctx: PdfContext, fields: ProposalFields): void {
  const labels = getProposalLabels(ctx.language)
  const body = PROPOSAL_FIELDS.map((field) => {
    const value = fields[field.key]?.trim()
    return [labels.fields[field.key], value ? formatPdfCell(field, value) : labels.notApplicable]
  })

  autoTable(ctx.pdf, {
    head: [[labels.fieldHeader, labels.detailsHeader]],
    body,
    startY: ctx.currentY,
    margin: { left: ctx.margin, right: ctx.margin, bottom: ctx.margin },
    tableWidth: ctx.contentWidth,
    styles: {
      font: ctx.font,
      fontSize: FONT_SIZES.table,
      overflow: 'linebreak',
      cellPadding: 2,
      valign: 'top',
      textColor: COLORS.text,
    },
    headStyles: {
      fillColor: COLORS.headerFill,
      textColor: COLORS.text,
      fontStyle: 'bold',
    },
    columnStyles: {
      0: { fontStyle: 'bold', fillColor: COLORS.labelFill, cellWidth: LABEL_COLUMN_WIDTH },
      1: { cellWidth: ctx.contentWidth - LABEL_COLUMN_WIDTH },
    },
  })
}

function addFooters(ctx: PdfContext): void {
  const { pdf } = ctx
  const labels = getProposalLabels(ctx.language)
  const totalPages = pdf.getNumberOfPages()
  for (let page = 1; page <= totalPages; page++) {
    pdf.setPage(page)
    pdf.setFont(ctx.font, 'normal')
    pdf.setFontSize(FONT_SIZES.footer)
    pdf.setTextColor(...COLORS.footer)
    pdf.text(
      `${labels.pageLabel} ${page} ${labels.ofLabel} ${totalPages}`,
      ctx.pageWidth / 2,
      ctx.pageHeight - 10,
      { align: 'center' },
    )
  }
}

export async function generateProposalPdf(
  fields: ProposalFields,
  language: Lang = 'en',
): Promise<Buffer> {
  const ctx = createPdfContext(language)

  addTitle(ctx, fields.title)
  addFieldTable(ctx, fields)
  addFooters(ctx)

  return Buffer.from(ctx.pdf.output('arraybuffer'))
}
