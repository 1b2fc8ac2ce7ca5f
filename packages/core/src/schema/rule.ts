import { z } from 'zod'

import { GenerationFailedError } from '../errors'
import type { RuleDraft, RuleViolation } from '../types'

/* ──────────────────────────────────────────────────────────────
 * Model output schemas
 * ──────────────────────────────────────────────────────────── */

export const RuleExampleSchema = z.object({
  scenario: z.string(),
  before: z.string(),
  after: z.string(),
})

// category becomes a directory name under the rules root
const UNSAFE_CATEGORY_RE = /[/\\]|\.\./

export const RuleDraftSchema = z
  .object({
    category: z
      .string()
      .trim()
      .default('')
      .refine((c) => !UNSAFE_CATEGORY_RE.test(c), { message: 'category must not contain path separators or ".."' }),
    // empty title is the "no pattern" signal, not a validation failure
    title: z.string(),
    id: z
      .string()
      .nullish()
      .transform((v) => v ?? undefined),
    description: z.string(),
    problems: z.array(z.string()),
    solutions: z.array(z.string()),
    examples: z.array(RuleExampleSchema),
  })
  .superRefine((draft, ctx) => {
    if (draft.title.trim() && !draft.category) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['category'], message: 'category is required when a title is given' })
    }
  })

export const RuleViolationSchema = z.object({
  file_path: z.string(),
  line_number: z.coerce.number().int(),
  column: z.coerce.number().int().default(1),
  rule_id: z.string(),
  message: z.string(),
  severity: z
    .string()
    .transform((s): RuleViolation['severity'] => (s.toLowerCase() === 'error' ? 'error' : 'warning')),
  category: z.string().default(''),
})

export const RuleViolationsSchema = z.object({
  violations: z.array(RuleViolationSchema).default([]),
})

/* ──────────────────────────────────────────────────────────────
 * JSON parsing: tolerate fenced blocks ```json ... ```
 * ──────────────────────────────────────────────────────────── */

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

export function extractJson(text: string): unknown {
  const t = String(text || '').trim()
  const fenced = t.match(/```(?:json)?\s*([\s\S]*?)```/i)
  const body = fenced?.[1] ?? t

  const direct = tryParse(body)
  if (direct.ok) return direct.value

  const first = body.indexOf('{')
  const last = body.lastIndexOf('}')
  if (first >= 0 && last > first) {
    const sliced = tryParse(body.slice(first, last + 1))
    if (sliced.ok) return sliced.value
  }
  throw new GenerationFailedError(`Model response is not valid JSON: ${t.slice(0, 120)}`)
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}

/** Validate a parsed model response into a RuleDraft */
export function parseRuleDraft(value: unknown): RuleDraft {
  const res = RuleDraftSchema.safeParse(value)
  if (!res.success) {
    throw new GenerationFailedError(`Model response does not match the rule schema: ${describeIssues(res.error)}`, {
      cause: res.error,
    })
  }
  return res.data
}

export function parseRuleViolations(value: unknown): RuleViolation[] {
  const res = RuleViolationsSchema.safeParse(Array.isArray(value) ? { violations: value } : value)
  if (!res.success) {
    throw new GenerationFailedError(`Model response does not match the violation schema: ${describeIssues(res.error)}`, {
      cause: res.error,
    })
  }
  return res.data.violations
}
