import { describe, it, expect } from 'vitest'

import { buildPrompt } from '../analysis'
import { buildCheckPrompt } from '../check'
import { buildConversionPrompt, extractRuleInfo } from '../convert'

const MARKDOWN = [
  '# Avoid mutable default arguments',
  '',
  '**ID**: FUNC003',
  '**Category**: functions',
  '',
  '## Before',
  '',
  '```python',
  'def add(item, bucket=[]):',
  '    bucket.append(item)',
  '```',
  '',
  '## After',
  '',
  '```python',
  'def add(item, bucket=None):',
  '    bucket = bucket or []',
  '```',
  '',
  '## Notes',
  '```python',
  'ignored = True',
  '```',
].join('\n')

describe('extractRuleInfo', () => {
  it('reads title, id, category and both code blocks', () => {
    expect(extractRuleInfo(MARKDOWN)).toEqual({
      title: 'Avoid mutable default arguments',
      id: 'FUNC003',
      category: 'functions',
      beforeCode: 'def add(item, bucket=[]):\n    bucket.append(item)',
      afterCode: 'def add(item, bucket=None):\n    bucket = bucket or []',
    })
  })

  it('returns empty fields when markers are missing', () => {
    expect(extractRuleInfo('Plain first line\nno markers here')).toEqual({
      title: 'Plain first line',
      id: '',
      category: '',
      beforeCode: '',
      afterCode: '',
    })
  })
})

describe('prompt builders', () => {
  it('conversion prompt carries the markdown and pins the id', () => {
    const prompt = buildConversionPrompt(MARKDOWN, extractRuleInfo(MARKDOWN))
    expect(prompt).toContain(MARKDOWN)
    expect(prompt).toContain('Keep the id "FUNC003" and the category "functions".')
  })

  it('analysis prompt is deterministic', () => {
    const commit = { message: 'm', diffText: '+x', sourceUrl: 'https://github.com/a/b/commit/1' }
    expect(buildPrompt(commit)).toBe(buildPrompt({ ...commit }))
    expect(buildPrompt(commit).endsWith('DIFF:\n+x\n')).toBe(true)
  })

  it('check prompt numbers file lines from 1', () => {
    const prompt = buildCheckPrompt([{ path: 'a.py', content: 'x = 1\ny = 2' }], [])
    expect(prompt).toContain('# FILE: a.py\n1: x = 1\n2: y = 2')
    expect(prompt).toContain('RULES:\n(none)')
  })
})
