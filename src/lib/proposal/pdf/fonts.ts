// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import fs from 'fs'
import type { jsPDF } from 'jspdf'

export const UNICODE_FONT = 'DejaVuSans'
export const FALLBACK_FONT = 'helvetica'

const FONT_FILES = {
  normal: 'dejavu-fonts-ttf/ttf/DejaVuSans.ttf',
  bold: 'dejavu-fonts-ttf/ttf/DejaVuSans-Bold.ttf',
} as const

type FontStyle = keyof typeof FONT_FILES

const fontCache = new Map<FontStyle, string>()

function readFontBase64(style: FontStyle): string {
  const cached = fontCache.get(style)
  if (cached) return cached
  const data = fs.readFileSync(require.resolve(FONT_FILES[style])).toString('base64')
  fontCache.set(style, data)
  return data
}

/**
 * Registers DejaVu Sans (normal and bold) so non-Latin text survives.
 * Returns the font family to draw with; Helvetica when the fonts cannot load.
 */
export function registerUnicodeFonts(pdf: jsPDF): string {
  try {
    for (const style of ['normal', 'bold'] as const) {
      const vfsName = `${UNICODE_FONT}-${style}.ttf`
      pdf.addFileToVFS(vfsName, readFontBase64(style))
      pdf.addFont(vfsName, UNICODE_FONT, style)
    }
    pdf.setFont(UNICODE_FONT, 'normal')
    return UNICODE_FONT
  } catch (error) {
    console.error('Error setting custom fonts:', error)
    pdf.setFont(FALLBACK_FONT, 'normal')
    return FALLBACK_FONT
  }
}
