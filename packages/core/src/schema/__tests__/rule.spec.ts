import { describe, it, expect } from 'vitest'

import { GenerationFailedError } from '../../errors'
import { extractJson, parseRuleDraft, parseRuleViolations } from '../rule'

describe('extractJson', () => {
  it('parses bare JSON', () => {
    expect(extractJson('{"title":"x"}')).toEqual({ title: 'x' })
  })

  it('tolerates fenced blocks and surrounding prose', () => {
    expect(extractJson('Here you go:\n```json\n{"title":"x"}\n```')).toEqual({ title: 'x' })
    expect(extractJson('Result: {"title":"x"} hope that helps')).toEqual({ title: 'x' })
  })

  it('throws GenerationFailedError on non-JSON text', () => {
    expect(() => extractJson('I could not find a pattern')).toThrow(GenerationFailedError)
  })
})

describe('parseRuleDraft', () => {
  const complete = {
    category: 'style',
    title: 'T',
    description: 'd',
    problems: ['p'],
    solutions: ['s'],
    examples: [],
  }

  it('accepts a complete draft and drops a null id', () => {
    expect(parseRuleDraft({ ...complete, id: null })).toEqual({ ...complete, id: undefined })
  })

  it('accepts an explicitly empty title without a category', () => {
    const draft = parseRuleDraft({ title: '  ', description: '', problems: [], solutions: [], examples: [] })
    expect(draft.title).toBe('  ')
    expect(draft.category).toBe('')
  })

  it('fails on a response with no rule fields at all', () => {
    expect(() => parseRuleDraft({})).toThrow(GenerationFailedError)
    expect(() => parseRuleDraft({ findings: [] })).toThrow(GenerationFailedError)
  })

  it('fails on a partial rule instead of filling the gaps', () => {
    expect(() => parseRuleDraft({ category: 'style', title: 'X' })).toThrow(
      /description: Required; problems: Required; solutions: Required; examples: Required/,
    )
  })

  it('requires a category once a title is given', () => {
    expect(() => parseRuleDraft({ ...complete, category: '' })).toThrow(
      'category: category is required when a title is given',
    )
  })

  it('rejects categories that would leave the rules root', () => {
    for (const category of ['../../x', 'style/nested', 'a\\b', '..']) {
      expect(() => parseRuleDraft({ ...complete, category })).toThrow(
        'category: category must not contain path separators or ".."',
      )
    }
  })

  it('rejects malformed examples', () => {
    expect(() => parseRuleDraft({ ...complete, examples: [{ scenario: 's' }] })).toThrow(
      GenerationFailedError,
    )
  })
})

describe('parseRuleViolations', () => {
  it('normalizes severity and defaults the column', () => {
    expect(
      parseRuleViolations({
        violations: [{ file_path: 'a.py', line_number: '3', rule_id: 'STYLE001', message: 'm', severity: 'Error' }],
      }),
    ).toEqual([
      { file_path: 'a.py', line_number: 3, column: 1, rule_id: 'STYLE001', message: 'm', severity: 'error', category: '' },
    ])
  })

  it('accepts a bare array', () => {
    expect(parseRuleViolations([])).toEqual([])
  })
})
