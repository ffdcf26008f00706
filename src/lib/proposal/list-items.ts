// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

const ITEM_MARKER = /^(?:[-*•]|\d+[.)])\s+/

/**
 * Split list-style field text into items.
 *
 * Marked lines (`-`, `*`, `•`, `1.`, `1)`) start items and unmarked lines continue
 * the current one. Lines before the first marker are an introduction and are dropped.
 * Without any marker every non-empty line is an item.
 */
export function splitListItems(text: string): string[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)

  if (!lines.some((line) => ITEM_MARKER.test(line))) return lines

  const items: string[] = []
  for (const line of lines) {
    if (ITEM_MARKER.test(line)) {
      items.push(line.replace(ITEM_MARKER, '').trim())
    } else if (items.length > 0) {
      items[items.length - 1] = `${items[items.length - 1]} ${line}`
    }
  }
  return items.filter(Boolean)
}
