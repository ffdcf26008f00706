// Copyright (C) 2025 Intel Corporation
// SPDX-License-Identifier: Apache-2.0

export function validInput(): Record<string, unknown> {
  return {
    targetStudent: 'Junior network administrators',
    prerequisites: '- Networking basics\n- Linux shell',
    learningObjectives: '- Read packet captures\n- Triage alerts\n- Write a report',
    scenario: 'A retailer sees odd traffic at night.',
    title: 'Night Traffic Investigation',
    overview:
      'Students review alerts from an intrusion detection system, inspect the related packets, search the server logs and write a short report for the security team.',
    length: '10 hours',
    technicalRequirements: '- Wireshark\n- Splunk',
    projectSteps: '1. Review\n2. Investigate\n3. Report',
  }
}
