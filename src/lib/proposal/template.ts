// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import { SUPPORTED_LANGUAGES, type Lang } from '@/lib/utils/lang'
import { DEFAULT_LANGUAGE } from '@/lib/config/constants'
import type { ProposalFieldKey, ProposalFields } from '@/lib/types/proposal'
import { getProposalLabels } from './labels'
import { renderProposalMarkdown } from './markdown'

export function createBlankTemplate(language: Lang = DEFAULT_LANGUAGE): ProposalFields {
  const { guidance } = getProposalLabels(language)
  const blank = (key: ProposalFieldKey) => `[${guidance[key]}]`
  return {
    targetStudent: blank('targetStudent'),
    prerequisites: blank('prerequisites'),
    programs: blank('programs'),
    learningObjectives: blank('learningObjectives'),
    scenario: blank('scenario'),
    title: blank('title'),
    overview: blank('overview'),
    length: blank('length'),
    technicalRequirements: blank('technicalRequirements'),
    projectSteps: blank('projectSteps'),
  }
}

// True when the opening bracket closes only at the last character
function isWhollyBracketed(text: string): boolean {
  if (!text.startsWith('[') || !text.endsWith(']')) return false
  let depth = 0
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '[') depth += 1
    else if (text[i] === ']') depth -= 1
    if (depth === 0 && i < text.length - 1) return false
  }
  return depth === 0
}

// True when a value is the blank template's guidance, in any language
export function isPlaceholderText(key: ProposalFieldKey, value: string): boolean {
  const text = value.trim()
  if (isWhollyBracketed(text)) return true
  return SUPPORTED_LANGUAGES.some((language) => text === getProposalLabels(language).guidance[key])
}

export function renderTemplateMarkdown(language: Lang = DEFAULT_LANGUAGE): string {
  return renderProposalMarkdown(createBlankTemplate(language), {
    language,
    heading: getProposalLabels(language).templateHeading,
  })
}
