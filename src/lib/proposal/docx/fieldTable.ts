import * as docx from 'docx'
import type { ProposalFieldDefinition, ProposalFields } from '@/lib/types/proposal'
import type { ProposalLabels } from '../labels'
import { PROPOSAL_FIELDS } from '../fields'
import { splitListItems } from '../list-items'
import { LIST_REFERENCES, TABLE_SHADING } from './documentStyles'
import { toTextRuns } from './text'

// Label column takes 30% of the table width
const LABEL_WIDTH = 30

function shadedCell(children: docx.Paragraph[], fill: string, width: number): docx.TableCell {
  return new docx.TableCell({
    children,
    width: { size: width, type: docx.WidthType.PERCENTAGE },
    shading: { fill, type: docx.ShadingType.CLEAR, color: 'auto' },
    margins: { top: 80, bottom: 80, left: 100, right: 100 },
  })
}

// Paragraphs for one value cell; list fields become numbered or bulleted items
export function buildValueParagraphs(
  field: ProposalFieldDefinition,
  value: string,
  listInstance: number,
): docx.Paragraph[] {
  if (field.list) {
    const items = splitListItems(value)
    return items.map(
      (item) =>
        new docx.Paragraph({
          children: toTextRuns(item),
          style: 'fieldValue',
          numbering: {
            reference: field.ordered ? LIST_REFERENCES.ordered : LIST_REFERENCES.bullet,
            level: 0,
            instance: listInstance,
          },
        }),
    )
  }
  return value
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => new docx.Paragraph({ children: toTextRuns(line), style: 'fieldValue' }))
}

export function buildFieldTable(fields: ProposalFields, labels: ProposalLabels): docx.Table {
  const headerRow = new docx.TableRow({
    tableHeader: true,
    children: [
      shadedCell(
        [new docx.Paragraph({ text: labels.fieldHeader, style: 'fieldLabel' })],
        TABLE_SHADING.header,
        LABEL_WIDTH,
      ),
      shadedCell(
        [new docx.Paragraph({ text: labels.detailsHeader, style: 'fieldLabel' })],
        TABLE_SHADING.header,
        100 - LABEL_WIDTH,
      ),
    ],
  })

  const rows = PROPOSAL_FIELDS.map((field, index) => {
    const value = fields[field.key]?.trim()
    const paragraphs = value
      ? buildValueParagraphs(field, value, index)
      : [new docx.Paragraph({ text: labels.notApplicable, style: 'fieldValue' })]
    return new docx.TableRow({
      cantSplit: true,
      children: [
        shadedCell(
          [new docx.Paragraph({ text: labels.fields[field.key], style: 'fieldLabel' })],
          TABLE_SHADING.label,
          LABEL_WIDTH,
        ),
        new docx.TableCell({
          children: paragraphs,
          width: { size: 100 - LABEL_WIDTH, type: docx.WidthType.PERCENTAGE },
          margins: { top: 80, bottom: 80, left: 100, right: 100 },
        }),
      ],
    })
  })

  return new docx.Table({
    rows: [headerRow, ...rows],
    width: { size: 100, type: docx.WidthType.PERCENTAGE },
  })
}
