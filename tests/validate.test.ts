import test from 'node:test'
import assert from 'node:assert/strict'

import { assertValidProposal, validateProposal } from '../src/lib/proposal/validate'
import { ProposalValidationError } from '../src/lib/proposal/errors'
import { validInput } from './fixtures'

test('accepts a complete proposal and parses its length', () => {
  const result = validateProposal(validInput(), 'en')
  assert.equal(result.valid, true)
  if (!result.valid) return
  assert.deepEqual(result.projectLength, { value: 10, unit: 'hours', hours: 10 })
  assert.equal(result.proposal.title, 'Night Traffic Investigation')
  assert.equal('programs' in result.proposal, false)
})

test('trims values and drops an empty optional field', () => {
  const result = validateProposal(
    { ...validInput(), title: '  Night Traffic Investigation  ', programs: '   ' },
    'en',
  )
  assert.equal(result.valid, true)
  if (!result.valid) return
  assert.equal(result.proposal.title, 'Night Traffic Investigation')
  assert.equal(result.proposal.programs, undefined)
})

test('reports empty and missing required fields in table order', () => {
  const input = validInput()
  delete input.title
  input.scenario = '   '
  const result = validateProposal(input, 'en')
  assert.deepEqual(result.issues, [
    {
      field: 'scenario',
      code: 'empty_field',
      message: 'Project Scenario must not be empty',
      severity: 'error',
    },
    { field: 'title', code: 'missing_field', message: 'Project Title is required', severity: 'error' },
  ])
})

test('reports values that are not text', () => {
  const result = validateProposal({ ...validInput(), overview: 42, programs: 7 }, 'en')
  assert.deepEqual(
    result.issues.map((issue) => [issue.field, issue.code, issue.message]),
    [
      ['programs', 'invalid_type', 'Udacity Programs must be text'],
      ['overview', 'invalid_type', 'Project Overview must be text'],
    ],
  )
})

test('reports unknown fields after field issues', () => {
  const input = validInput()
  delete input.targetStudent
  input.budget = '100'
  const result = validateProposal(input, 'en')
  assert.deepEqual(
    result.issues.map((issue) => [issue.field, issue.code, issue.message]),
    [
      ['targetStudent', 'missing_field', 'Target Student is required'],
      ['budget', 'unknown_field', 'Unknown field "budget"'],
    ],
  )
})

test('rejects a length that is not a number followed by a unit', () => {
  const result = validateProposal({ ...validInput(), length: 'two weeks' }, 'en')
  assert.deepEqual(result.issues, [
    {
      field: 'length',
      code: 'invalid_length',
      message: 'Project Length must be a positive number followed by a unit, e.g. "8 hours"',
      severity: 'error',
    },
  ])
})

test('rejects a length too large to be a finite number', () => {
  const result = validateProposal({ ...validInput(), length: `${'9'.repeat(400)} hours` }, 'en')
  assert.equal(result.valid, false)
  assert.deepEqual(
    result.issues.map((issue) => [issue.field, issue.code]),
    [['length', 'invalid_length']],
  )
})

test('reports an empty length once', () => {
  const result = validateProposal({ ...validInput(), length: '' }, 'en')
  assert.deepEqual(
    result.issues.map((issue) => issue.code),
    ['empty_field'],
  )
})

test('rejects input that is not an object', () => {
  for (const input of [null, [], 'title']) {
    assert.deepEqual(validateProposal(input, 'en').issues, [
      {
        field: null,
        code: 'invalid_input',
        message: 'Proposal must be an object mapping field names to text',
        severity: 'error',
      },
    ])
  }
})

test('localizes messages', () => {
  const input = validInput()
  delete input.title
  const result = validateProposal(input, 'id')
  assert.equal(result.issues[0].message, 'Judul Proyek wajib diisi')
})

test('assertValidProposal throws with the issues attached', () => {
  const input = validInput()
  delete input.projectSteps
  assert.throws(
    () => assertValidProposal(input, 'en'),
    (error: unknown) =>
      error instanceof ProposalValidationError &&
      error.code === 'PROPOSAL_INVALID' &&
      error.issues.length === 1 &&
      error.issues[0].field === 'projectSteps',
  )
})
