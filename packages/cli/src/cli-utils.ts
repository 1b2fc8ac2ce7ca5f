import fs from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import { bold, cyan, dim, green, red, yellow } from 'colorette'
import type { CheckReport, Rule, RuleViolation, ViolationSeverity } from '@rulesmith/core'

/** ────────────────────────────────────────────────────────────────────────────
 *  FS helpers
 *  ──────────────────────────────────────────────────────────────────────────── */

/** Resolve a (possibly relative) path against a base directory */
export function resolveRepoPath(base: string, p: string) {
  return path.isAbsolute(p) ? p : path.join(base, p)
}

/** Make file:// link for pretty output */
export const linkifyFile = (absPath: string) => pathToFileURL(absPath).href

/** Forward slashes regardless of platform (glob matching, report paths) */
export const toPosix = (p: string) => p.split(path.sep).join('/')

/** ────────────────────────────────────────────────────────────────────────────
 *  Repo root detection
 *  ────────────────────────────────────────────────────────────────────────────
 *  Rules:
 *   - If RULESMITH_REPO_ROOT is set and exists → use it
 *   - Else walk up from `start` until you find .git or .rulesmithrc.json
 *   - If not found, fall back to `start`
 */
export function findRepoRoot(start = process.cwd(), env: NodeJS.ProcessEnv = process.env): string {
  const envRoot = env.RULESMITH_REPO_ROOT
  if (envRoot && fs.existsSync(envRoot)) {
    return path.resolve(envRoot)
  }

  let dir = path.resolve(start)
  while (true) {
    const isGitRoot = fs.existsSync(path.join(dir, '.git'))
    const hasRc = fs.existsSync(path.join(dir, '.rulesmithrc.json'))
    if (isGitRoot || hasRc) return dir

    const parent = path.dirname(dir)
    if (parent === dir) {
      // reached FS root: fall back to start
      return path.resolve(start)
    }
    dir = parent
  }
}

/** ────────────────────────────────────────────────────────────────────────────
 *  Pretty console helpers (consistent UX)
 *  ──────────────────────────────────────────────────────────────────────────── */
export const ok   = (msg: string) => console.log(green('✔ ') + msg)
export const info = (msg: string) => console.log(cyan('ℹ ') + msg)
export const warn = (msg: string) => console.warn(yellow('▲ ') + msg)
export const fail = (msg: string) => console.error(red('✖ ') + msg)

/** ────────────────────────────────────────────────────────────────────────────
 *  Severity helpers (shared with check)
 *  ──────────────────────────────────────────────────────────────────────────── */
export const sevRank: Record<ViolationSeverity, number> = {
  error: 2, warning: 1,
}

export function maxSeverity(violations: { severity: ViolationSeverity }[]): ViolationSeverity | null {
  let max: ViolationSeverity | null = null
  for (const v of violations) if (!max || sevRank[v.severity] > sevRank[max]) max = v.severity
  return max
}

export function countBySeverity(violations: { severity: ViolationSeverity }[]) {
  const c = { error: 0, warning: 0 }
  for (const v of violations) c[v.severity]++
  return c
}

const sevIcon = (s: ViolationSeverity) => (s === 'error' ? red('●') : yellow('●'))

/** ────────────────────────────────────────────────────────────────────────────
 *  Unified summaries
 *  ──────────────────────────────────────────────────────────────────────────── */

export function printViolations(violations: RuleViolation[]) {
  for (const v of violations) {
    console.log(`${sevIcon(v.severity)} ${bold(`${v.file_path}:${v.line_number}:${v.column}`)}`)
    console.log(`   Rule ${v.rule_id}: ${v.message}`)
    console.log(`   ${dim(`Category: ${v.category}`)}`)
    console.log('')
  }
}

/** Print nice summary for a check run */
export function printCheckSummary(args: {
  report: CheckReport
  providerLabel: string
  rulesCount: number
  exit: { mode: 'threshold' | 'none'; exitCode: number; threshold?: ViolationSeverity; top?: ViolationSeverity | null }
}) {
  const { report, providerLabel, rulesCount, exit } = args
  const counts = countBySeverity(report.violations)

  console.log('')
  console.log(bold('Check summary'))
  console.log('  ' + cyan('provider:   ') + providerLabel)
  console.log('  ' + cyan('rules:      ') + rulesCount)
  console.log('  ' + cyan('files:      ') + report.total_files_checked)
  console.log('  ' + cyan('violations: ')
    + `${report.total_violations} `
    + dim(`(error ${counts.error}, warning ${counts.warning})`))

  const ids = Object.keys(report.summary_by_rule).sort()
  if (ids.length) {
    console.log('  ' + cyan('by rule:'))
    for (const id of ids) console.log(`    ${id}: ${report.summary_by_rule[id]}`)
  }

  const line = exit.mode === 'none'
    ? green('exit 0') + dim(' — failOn=none (never fail)')
    : (exit.exitCode ? red('exit 1') : green('exit 0')) + dim(` — failOn=${exit.threshold}, max=${exit.top ?? 'none'}`)
  console.log('  ' + cyan('exit policy: ') + line)
}

/** Print nice summary for a learned rule */
export function printLearnSummary(args: {
  repoRoot: string
  providerLabel: string
  commitUrl: string
  rule: Rule
  filePath: string
}) {
  const { repoRoot, providerLabel, commitUrl, rule, filePath } = args
  console.log('')
  console.log(bold('Learn summary'))
  console.log('  ' + cyan('provider: ') + providerLabel)
  console.log('  ' + cyan('commit:   ') + commitUrl)
  console.log('  ' + cyan('rule:     ') + `${rule.id} ${dim(`(${rule.category})`)} ${rule.title}`)
  console.log('  ' + cyan('examples: ') + rule.examples.length)
  console.log('  ' + cyan('output:   ') + `${dim(path.relative(repoRoot, filePath))} ${cyan('→')} ${dim(linkifyFile(filePath))}`)
}

/** Print a compact listing of stored rules */
export function printRulesList(rules: Rule[]) {
  for (const r of rules) {
    const first = r.description.split('\n').find((l) => l.trim()) ?? ''
    console.log(`${bold(r.id)} ${r.title}`)
    console.log(`   ${dim(`Category: ${r.category}`)}`)
    if (first) console.log(`   ${first.trim()}`)
    console.log('')
  }
}
