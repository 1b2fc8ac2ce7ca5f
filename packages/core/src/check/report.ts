import type { CheckInput, CheckReport, RuleViolation, SourceFile, StoredRule } from '../types'

/** Matching backend: a provider's `check` capability, or a stub in tests */
export type RuleChecker = (input: CheckInput) => Promise<RuleViolation[]>

function lineCount(content: string): number {
  if (!content) return 0
  const lines = content.split(/\r?\n/)
  return content.endsWith('\n') ? lines.length - 1 : lines.length
}

function compareViolations(a: RuleViolation, b: RuleViolation): number {
  return (
    a.file_path.localeCompare(b.file_path) ||
    a.line_number - b.line_number ||
    a.column - b.column ||
    a.rule_id.localeCompare(b.rule_id)
  )
}

/**
 * Drop what cannot be anchored (unknown rule, unknown file, line outside the
 * file), fill the category from the rule, order and aggregate.
 */
export function buildCheckReport(files: SourceFile[], rules: StoredRule[], raw: RuleViolation[]): CheckReport {
  const byId = new Map(rules.map((r) => [r.id, r]))
  const lines = new Map(files.map((f) => [f.path, lineCount(f.content)]))
  const seen = new Set<string>()
  const violations: RuleViolation[] = []

  for (const v of raw) {
    const rule = byId.get(v.rule_id)
    const max = lines.get(v.file_path)
    if (!rule || max === undefined) continue
    if (v.line_number < 1 || v.line_number > max) continue
    const column = Math.max(1, v.column)
    const key = `${v.file_path}:${v.line_number}:${column}:${v.rule_id}`
    if (seen.has(key)) continue
    seen.add(key)
    violations.push({ ...v, column, category: rule.category })
  }

  violations.sort(compareViolations)

  const summary_by_rule: Record<string, number> = {}
  for (const v of violations) summary_by_rule[v.rule_id] = (summary_by_rule[v.rule_id] ?? 0) + 1

  return {
    total_files_checked: files.length,
    total_violations: violations.length,
    violations,
    summary_by_rule,
  }
}

export async function checkFiles(files: SourceFile[], rules: StoredRule[], check: RuleChecker): Promise<CheckReport> {
  if (!files.length || !rules.length) return buildCheckReport(files, rules, [])
  return buildCheckReport(files, rules, await check({ files, rules }))
}
