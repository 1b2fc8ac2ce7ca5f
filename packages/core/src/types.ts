/** Commit data handed from the commit adapter to the generation step. */
export interface CommitRecord {
  readonly message: string
  /** Unified diff, UTF-8 */
  readonly diffText: string
  readonly sourceUrl: string
}

export interface CommitReference {
  owner: string
  repo: string
  /** Lowercase hex revision as it appeared in the URL */
  revision: string
}

export interface RuleExample {
  scenario: string
  before: string
  after: string
}

/**
 * Rule as returned by the model. `id` is provisional: the repository always
 * replaces it when the rule is persisted.
 */
export interface RuleDraft {
  category: string
  title: string
  id?: string
  description: string
  problems: string[]
  solutions: string[]
  examples: RuleExample[]
}

export interface Rule extends RuleDraft {
  id: string
}

/** A rule read back from the rules root */
export interface StoredRule extends Rule {
  filePath: string
}

/* ──────────────────────────────────────────────────────────────
 * Rule-checking contract (consumed by `rulesmith check`)
 * ──────────────────────────────────────────────────────────── */

export type ViolationSeverity = 'error' | 'warning'

export interface SourceFile {
  path: string
  content: string
}

export interface RuleViolation {
  file_path: string
  line_number: number
  column: number
  rule_id: string
  message: string
  severity: ViolationSeverity
  category: string
}

export interface CheckReport {
  total_files_checked: number
  total_violations: number
  violations: RuleViolation[]
  summary_by_rule: Record<string, number>
}

export interface CheckInput {
  files: SourceFile[]
  rules: StoredRule[]
}

/* ──────────────────────────────────────────────────────────────
 * Generation capability (implemented by providers)
 * ──────────────────────────────────────────────────────────── */

export interface GenerateInput {
  prompt: string
  system?: string
}

/** Anything that can turn a prompt into a RuleDraft */
export interface RuleGenerator {
  name: string
  generate(input: GenerateInput): Promise<RuleDraft>
}
