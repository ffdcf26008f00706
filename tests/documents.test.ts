import test from 'node:test'
import assert from 'node:assert/strict'
import JSZip from 'jszip'

import { generateProposalDocument, proposalFileName } from '../src/lib/proposal/documents'
import { ProposalValidationError } from '../src/lib/proposal/errors'
import { PROPOSAL_FIELDS } from '../src/lib/proposal/fields'
import { splitBoldSegments, stripBold } from '../src/lib/proposal/docx/text'
import { generateProposalDocx } from '../src/lib/proposal/docx/builder'
import { renderProposalMarkdown } from '../src/lib/proposal/markdown'
import { formatPdfCell, generateProposalPdf } from '../src/lib/proposal/pdf/generator'
import { assertValidProposal } from '../src/lib/proposal/validate'
import { validInput } from './fixtures'

const fieldDefinition = (key: string) => {
  const definition = PROPOSAL_FIELDS.find((field) => field.key === key)
  assert.ok(definition)
  return definition
}

test('derives file names from the title', () => {
  assert.equal(proposalFileName('  Ünïcode & Tools!  ', 'pdf'), 'unicode-tools.pdf')
  assert.equal(proposalFileName('!!!', 'markdown'), 'project-proposal.md')
})

test('generates markdown', async () => {
  const document = await generateProposalDocument(validInput(), {
    format: 'markdown',
    language: 'en',
  })
  assert.equal(document.fileName, 'night-traffic-investigation.md')
  assert.equal(document.mimeType, 'text/markdown; charset=utf-8')
  assert.equal(
    document.content.toString('utf8'),
    renderProposalMarkdown(assertValidProposal(validInput(), 'en'), { language: 'en' }),
  )
})

test('generates a docx package', async () => {
  const document = await generateProposalDocument(validInput(), { format: 'docx', language: 'en' })
  assert.equal(document.fileName, 'night-traffic-investigation.docx')
  assert.equal(
    document.mimeType,
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  )
  assert.equal(document.content.subarray(0, 2).toString('latin1'), 'PK')
})

test('generates a pdf', async () => {
  const document = await generateProposalDocument(validInput(), { format: 'pdf', language: 'id' })
  assert.equal(document.fileName, 'night-traffic-investigation.pdf')
  assert.equal(document.mimeType, 'application/pdf')
  assert.equal(document.content.subarray(0, 5).toString('latin1'), '%PDF-')
})

test('rejects an invalid proposal', async () => {
  const input = validInput()
  delete input.title
  await assert.rejects(
    generateProposalDocument(input, { format: 'markdown', language: 'en' }),
    (error: unknown) =>
      error instanceof ProposalValidationError && error.issues[0].code === 'missing_field',
  )
})

test('strict generation rejects lint warnings', async () => {
  await assert.rejects(
    generateProposalDocument(
      { ...validInput(), projectSteps: '1. Review\n2. Report' },
      { format: 'markdown', language: 'en', strict: true },
    ),
    (error: unknown) =>
      error instanceof ProposalValidationError &&
      error.issues.map((issue) => issue.code).join() === 'too_few_project_steps',
  )
})

test('formats pdf cells as plain lines', () => {
  assert.equal(
    formatPdfCell(fieldDefinition('projectSteps'), '1. Review\n2. **Investigate**\n3. Report'),
    '1. Review\n2. Investigate\n3. Report',
  )
  assert.equal(formatPdfCell(fieldDefinition('prerequisites'), '* A\n* B'), '- A\n- B')
  assert.equal(
    formatPdfCell(fieldDefinition('scenario'), ' line one \n\n line two'),
    'line one\nline two',
  )
})

test('splits bold markup into runs', () => {
  assert.deepEqual(splitBoldSegments('Run **tcpdump** now'), [
    { text: 'Run ', bold: false },
    { text: 'tcpdump', bold: true },
    { text: ' now', bold: false },
  ])
  assert.deepEqual(splitBoldSegments('plain'), [{ text: 'plain', bold: false }])
  assert.deepEqual(splitBoldSegments(''), [{ text: '', bold: false }])
  assert.equal(stripBold('**A** and **B**'), 'A and B')
})

test('docx document carries labels, shading, numbering, bold runs and a page footer', async () => {
  const fields = assertValidProposal(
    { ...validInput(), projectSteps: '1. Review\n2. **Investigate**\n3. Report' },
    'en',
  )
  const zip = await JSZip.loadAsync(await generateProposalDocx(fields, 'en'))
  const documentFile = zip.file('word/document.xml')
  assert.ok(documentFile)
  const xml = await documentFile.async('string')

  assert.ok(xml.includes('>Target Student</w:t>'))
  assert.ok(xml.includes('>Project Steps</w:t>'))
  assert.ok(xml.includes('w:fill="F2F2F2"'))
  assert.ok(xml.includes('<w:numPr>'))
  assert.match(xml, /<w:r>(?:(?!<\/w:r>)[\s\S])*<w:b\/>(?:(?!<\/w:r>)[\s\S])*>Investigate<\/w:t><\/w:r>/)

  const footers = zip.file(/^word\/footer\d*\.xml$/)
  assert.ok(footers.length > 0)
  const footerXml = (await Promise.all(footers.map((file) => file.async('string')))).join('')
  assert.ok(footerXml.includes('NUMPAGES'))
  assert.ok(footerXml.includes('>Page </w:t>'))
})

test('pdf embeds a unicode font for non-Latin titles', async () => {
  const fields = assertValidProposal(
    { ...validInput(), title: 'Análisis → Обзор трафика' },
    'en',
  )
  const pdf = (await generateProposalPdf(fields, 'en')).toString('latin1')
  assert.ok(pdf.includes('/Identity-H'))
  assert.ok(pdf.includes('DejaVuSans'))
})
