// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

export type Lang = 'en' | 'id'

export const SUPPORTED_LANGUAGES: readonly Lang[] = ['en', 'id']

/**
 * Normalize unknown language input to supported Lang type.
 * Defaults to 'en' if unsupported or undefined.
 */
export const normalizeLanguage = (lang: unknown): Lang => (lang === 'id' ? 'id' : 'en')
