import { parseUnifiedDiff, type RuleDraft, type RuleViolation } from '@rulesmith/core'
import { emptyDraft, type RuleProvider } from '@rulesmith/provider-types'

// None / null guards in added lines
const NULL_CHECK_RE = /\bis (?:not )?None\b|[!=]==? ?null\b|\?\./

const BOUNDARY_RULE: RuleDraft = {
  category: 'boundaries',
  title: 'Validate before dereference',
  description:
    'Check optional values where they enter a function instead of deep inside it.\n' +
    'Code past the guard can then rely on the value being present.',
  problems: [
    'AttributeError or TypeError surfaces far from the real cause',
    'Every caller repeats the same defensive checks',
  ],
  solutions: [
    'Guard optional inputs at the top of the function',
    'Return early or raise a domain error when the value is missing',
  ],
  examples: [
    {
      scenario: 'Request handler',
      before: '```python\ndef handle(req):\n    return req.user.name\n```',
      after: '```python\ndef handle(req):\n    if req.user is None:\n        raise BadRequest("user required")\n    return req.user.name\n```',
    },
  ],
}

/** Text after the last `DIFF:` marker of an analysis prompt */
function diffFromPrompt(prompt: string): string {
  const at = prompt.lastIndexOf('DIFF:\n')
  return at >= 0 ? prompt.slice(at + 'DIFF:\n'.length) : ''
}

/** Deterministic offline provider: no network, same input, same output */
export const mockProvider: RuleProvider = {
  name: 'mock',

  async generate(input) {
    const parsed = parseUnifiedDiff(diffFromPrompt(input.prompt))
    const added = Object.values(parsed.addedByFile).flat()
    if (added.some((l) => NULL_CHECK_RE.test(l.text))) {
      return structuredClone(BOUNDARY_RULE)
    }
    return emptyDraft()
  },

  async check(input) {
    const rule = input.rules.find((r) => r.category === 'style') ?? input.rules[0]
    if (!rule) return []

    const out: RuleViolation[] = []
    for (const file of input.files) {
      file.content.split(/\r?\n/).forEach((text, i) => {
        const col = text.indexOf('TODO')
        if (col < 0) return
        out.push({
          file_path: file.path,
          line_number: i + 1,
          column: col + 1,
          rule_id: rule.id,
          message: 'TODO comment left in code',
          severity: 'warning',
          category: rule.category,
        })
      })
    }
    return out
  },
}

export default mockProvider
