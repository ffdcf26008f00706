// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { jsPDF } from 'jspdf'
import type { Lang } from '@/lib/utils/lang'

// Rendering context passed to every section renderer
export interface PdfContext {
  pdf: jsPDF
  language: Lang
  font: string // family registered for every text call
  currentY: number // vertical cursor (mm)
  pageWidth: number
  pageHeight: number
  margin: number
  contentWidth: number
}
