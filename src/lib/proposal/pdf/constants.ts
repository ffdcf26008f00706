// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

// Shared constants for PDF generation (dimensions in mm)
export const PAGE = {
  width: 210,
  height: 297,
  margin: 20,
}

type Rgb = [number, number, number]

export const COLORS: Record<'headerFill' | 'labelFill' | 'text' | 'footer', Rgb> = {
  headerFill: [217, 217, 217],
  labelFill: [242, 242, 242],
  text: [0, 0, 0],
  footer: [100, 100, 100],
}

export const FONT_SIZES = {
  title: 16,
  table: 10,
  footer: 9,
}

export const LABEL_COLUMN_WIDTH = 50
