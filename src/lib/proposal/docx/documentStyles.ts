import * as docx from 'docx'

export const LIST_REFERENCES = {
  bullet: 'proposalBullets',
  ordered: 'proposalSteps',
} as const

export const paragraphStyles: docx.IParagraphStyleOptions[] = [
  {
    id: 'footer',
    name: 'Footer',
    run: { size: 20, color: '666666' },
  },
  {
    id: 'fieldLabel',
    name: 'Field Label',
    run: { bold: true, size: 22 },
  },
  {
    id: 'fieldValue',
    name: 'Field Value',
    run: { size: 22 },
    paragraph: { spacing: { after: 80 } },
  },
]

export const numberingConfig: docx.INumberingOptions['config'] = [
  {
    reference: LIST_REFERENCES.ordered,
    levels: [
      {
        level: 0,
        format: docx.LevelFormat.DECIMAL,
        text: '%1.',
        alignment: docx.AlignmentType.START,
        style: { paragraph: { indent: { left: 360, hanging: 260 } } },
      },
    ],
  },
  {
    reference: LIST_REFERENCES.bullet,
    levels: [
      {
        level: 0,
        format: docx.LevelFormat.BULLET,
        text: '•',
        alignment: docx.AlignmentType.START,
        style: { paragraph: { indent: { left: 360, hanging: 260 } } },
      },
    ],
  },
]

export const TABLE_SHADING = {
  header: 'D9D9D9',
  label: 'F2F2F2',
}
