// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { PROPOSAL_DEBUG_LOGS } from '@/lib/config/constants'

let wordSegmenter: Intl.Segmenter | undefined

const getWordSegmenter = () => {
  if (typeof Intl === 'undefined' || typeof Intl.Segmenter !== 'function') return undefined
  if (!wordSegmenter) {
    wordSegmenter = new Intl.Segmenter(undefined, { granularity: 'word' })
  }
  return wordSegmenter
}

// Conditional debug logging for proposal workflows
export const logProposalDebug = (...args: unknown[]) => {
  if (!PROPOSAL_DEBUG_LOGS) return
  console.debug('[proposal]', ...args)
}

// Count word-like segments, falling back to whitespace splitting
export function countWords(text: string): number {
  const normalized = text.normalize('NFKC').trim()
  if (!normalized) return 0

  const segmenter = getWordSegmenter()
  if (segmenter) {
    let count = 0
    for (const segment of segmenter.segment(normalized)) {
      if (segment.isWordLike) count += 1
    }
    return count
  }

  return normalized.split(/\s+/).length
}

// Lower-case, hyphen-separated file stem
export function slugify(text: string, fallback: string): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return slug || fallback
}
