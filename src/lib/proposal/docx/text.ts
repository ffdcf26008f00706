// Text processing helpers for DOCX proposal generation
import * as docx from 'docx'

export interface BoldSegment {
  text: string
  bold: boolean
}

const BOLD_PATTERN = /\*\*(.+?)\*\*/g

// Splits `**bold**` markup into runs; text without markup is one plain segment
export function splitBoldSegments(text: string): BoldSegment[] {
  const segments: BoldSegment[] = []
  let lastIndex = 0
  for (const match of text.matchAll(BOLD_PATTERN)) {
    const index = match.index ?? 0
    if (index > lastIndex) segments.push({ text: text.substring(lastIndex, index), bold: false })
    segments.push({ text: match[1], bold: true })
    lastIndex = index + match[0].length
  }
  if (lastIndex < text.length || segments.length === 0) {
    segments.push({ text: text.substring(lastIndex), bold: false })
  }
  return segments
}

export function stripBold(text: string): string {
  return text.replace(BOLD_PATTERN, '$1')
}

export function toTextRuns(text: string): docx.TextRun[] {
  return splitBoldSegments(text).map(
    (segment) => new docx.TextRun({ text: segment.text, bold: segment.bold }),
  )
}
