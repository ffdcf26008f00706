import * as docx from 'docx'
import type { Lang } from '@/lib/utils/lang'
import type { ProposalFields } from '@/lib/types/proposal'
import { getProposalLabels } from '../labels'
import { paragraphStyles, numberingConfig } from './documentStyles'
import { buildFieldTable } from './fieldTable'

export async function generateProposalDocx(
  fields: ProposalFields,
  language: Lang = 'en',
): Promise<Buffer> {
  const labels = getProposalLabels(language)

  const footer = new docx.Footer({
    children: [
      new docx.Paragraph({
        children: [
          new docx.TextRun({
            children: [
              `${labels.pageLabel} `,
              docx.PageNumber.CURRENT,
              ` ${labels.ofLabel} `,
              docx.PageNumber.TOTAL_PAGES,
            ],
          }),
        ],
        alignment: docx.AlignmentType.CENTER,
        style: 'footer',
      }),
    ],
  })

  const children: (docx.Paragraph | docx.Table)[] = [
    new docx.Paragraph({
      text: fields.title.replace(/\s+/g, ' ').trim(),
      alignment: docx.AlignmentType.CENTER,
      spacing: { after: 300 },
      heading: docx.HeadingLevel.HEADING_1,
    }),
    buildFieldTable(fields, labels),
  ]

  const doc = new docx.Document({
    title: fields.title,
    styles: { paragraphStyles },
    numbering: { config: numberingConfig },
    sections: [
      {
        footers: { default: footer },
        children,
      },
    ],
  })

  return docx.Packer.toBuffer(doc)
}
