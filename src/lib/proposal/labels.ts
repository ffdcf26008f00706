// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

import type { Lang } from '@/lib/utils/lang'
import type { ProposalFieldKey } from '@/lib/types/proposal'

export interface ProposalLabels {
  fields: Record<ProposalFieldKey, string>
  guidance: Record<ProposalFieldKey, string>
  fieldHeader: string
  detailsHeader: string
  templateHeading: string
  notApplicable: string
  pageLabel: string
  ofLabel: string
  messages: {
    invalidInput: string
    missingField: (label: string) => string
    invalidType: (label: string) => string
    emptyField: (label: string) => string
    invalidLength: (label: string) => string
    unknownField: (key: string) => string
    placeholderText: (label: string) => string
    lengthExceedsMaximum: (label: string, hours: number, max: number) => string
    tooFewItems: (label: string, count: number, min: number) => string
    tooFewWords: (label: string, count: number, min: number) => string
    titleTooLong: (label: string, length: number, max: number) => string
  }
}

const EN: ProposalLabels = {
  fields: {
    targetStudent: 'Target Student',
    prerequisites: 'Prerequisite Skills',
    programs: 'Udacity Programs',
    learningObjectives: 'Project Learning Objectives',
    scenario: 'Project Scenario',
    title: 'Project Title',
    overview: 'Project Overview',
    length: 'Project Length',
    technicalRequirements: 'Technical Requirements and Dependencies',
    projectSteps: 'Project Steps',
  },
  guidance: {
    targetStudent: 'Describe the student this project is for',
    prerequisites: 'List the skills a student needs before starting',
    programs: 'List prior programs or courses the student has completed',
    learningObjectives: 'List what the student will be able to do after the project',
    scenario: 'Describe the real-world situation the project simulates',
    title: 'Give the project a short, descriptive title',
    overview: 'Summarize what the student will build or investigate',
    length: 'Estimate the time to complete, e.g. 8 hours',
    technicalRequirements: 'List the tools, data and starter files the project depends on',
    projectSteps: 'List the steps the student will follow, in order',
  },
  fieldHeader: 'Field',
  detailsHeader: 'Details',
  templateHeading: 'Project Proposal Template',
  notApplicable: 'N/A',
  pageLabel: 'Page',
  ofLabel: 'of',
  messages: {
    invalidInput: 'Proposal must be an object mapping field names to text',
    missingField: (label) => `${label} is required`,
    invalidType: (label) => `${label} must be text`,
    emptyField: (label) => `${label} must not be empty`,
    invalidLength: (label) =>
      `${label} must be a positive number followed by a unit, e.g. "8 hours"`,
    unknownField: (key) => `Unknown field "${key}"`,
    placeholderText: (label) => `${label} still contains template guidance`,
    lengthExceedsMaximum: (label, hours, max) =>
      `${label} of ${hours} hours exceeds the maximum of ${max} hours`,
    tooFewItems: (label, count, min) => `${label} lists ${count} item(s); at least ${min} expected`,
    tooFewWords: (label, count, min) => `${label} has ${count} word(s); at least ${min} expected`,
    titleTooLong: (label, length, max) =>
      `${label} is ${length} characters long; at most ${max} allowed`,
  },
}

const ID: ProposalLabels = {
  fields: {
    targetStudent: 'Sasaran Peserta Didik',
    prerequisites: 'Keterampilan Prasyarat',
    programs: 'Program Udacity',
    learningObjectives: 'Tujuan Pembelajaran Proyek',
    scenario: 'Skenario Proyek',
    title: 'Judul Proyek',
    overview: 'Ikhtisar Proyek',
    length: 'Durasi Proyek',
    technicalRequirements: 'Persyaratan Teknis dan Dependensi',
    projectSteps: 'Langkah-Langkah Proyek',
  },
  guidance: {
    targetStudent: 'Jelaskan peserta didik yang menjadi sasaran proyek ini',
    prerequisites: 'Sebutkan keterampilan yang dibutuhkan sebelum memulai',
    programs: 'Sebutkan program atau kursus yang telah diselesaikan peserta didik',
    learningObjectives: 'Sebutkan kemampuan peserta didik setelah menyelesaikan proyek',
    scenario: 'Jelaskan situasi dunia nyata yang disimulasikan proyek',
    title: 'Berikan judul proyek yang singkat dan deskriptif',
    overview: 'Ringkas apa yang akan dibangun atau diselidiki peserta didik',
    length: 'Perkirakan waktu penyelesaian, mis. 8 jam',
    technicalRequirements: 'Sebutkan alat, data, dan berkas awal yang dibutuhkan proyek',
    projectSteps: 'Sebutkan langkah-langkah yang diikuti peserta didik secara berurutan',
  },
  fieldHeader: 'Bagian',
  detailsHeader: 'Keterangan',
  templateHeading: 'Templat Proposal Proyek',
  notApplicable: 'T/A',
  pageLabel: 'Halaman',
  ofLabel: 'dari',
  messages: {
    invalidInput: 'Proposal harus berupa objek yang memetakan nama bagian ke teks',
    missingField: (label) => `${label} wajib diisi`,
    invalidType: (label) => `${label} harus berupa teks`,
    emptyField: (label) => `${label} tidak boleh kosong`,
    invalidLength: (label) =>
      `${label} harus berupa angka positif diikuti satuan, mis. "8 jam"`,
    unknownField: (key) => `Bagian "${key}" tidak dikenal`,
    placeholderText: (label) => `${label} masih berisi panduan templat`,
    lengthExceedsMaximum: (label, hours, max) =>
      `${label} ${hours} jam melebihi batas ${max} jam`,
    tooFewItems: (label, count, min) => `${label} berisi ${count} butir; minimal ${min} butir`,
    tooFewWords: (label, count, min) => `${label} berisi ${count} kata; minimal ${min} kata`,
    titleTooLong: (label, length, max) =>
      `${label} sepanjang ${length} karakter; maksimal ${max} karakter`,
  },
}

export function getProposalLabels(language: Lang): ProposalLabels {
  return language === 'id' ? ID : EN
}
