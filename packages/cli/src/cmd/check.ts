import fs from 'node:fs'
import path from 'node:path'
import picomatch from 'picomatch'

import {
  checkFiles,
  createLogger,
  getErrorMessage,
  loadAllRules,
  type RuleViolation,
  type SourceFile,
  type ViolationSeverity,
} from '@rulesmith/core'
import type { RuleProvider } from '@rulesmith/provider-types'

import {
  fail,
  info,
  maxSeverity,
  ok,
  printCheckSummary,
  printViolations,
  resolveRepoPath,
  sevRank,
  toPosix,
  warn,
} from '../cli-utils'
import { loadConfig, type FailOn } from '../config'
import { pickProvider } from '../providers'

export type CheckExit =
  | { mode: 'threshold'; exitCode: number; threshold: ViolationSeverity; top: ViolationSeverity | null }
  | { mode: 'none'; exitCode: 0 }

export function computeExit(violations: RuleViolation[], failOn: FailOn): CheckExit {
  if (failOn === 'none') return { mode: 'none', exitCode: 0 }
  const top = maxSeverity(violations)
  const shouldFail = top != null && sevRank[top] >= sevRank[failOn]
  return { mode: 'threshold', exitCode: shouldFail ? 1 : 0, threshold: failOn, top }
}

export type CheckCLIOptions = {
  files: string[]
  failOn?: FailOn
  json?: boolean
  category?: string
  provider?: string
  rulesDir?: string
  debug?: boolean
  cwd?: string
  env?: NodeJS.ProcessEnv
}

function readSources(files: string[], cwd: string, include: string[]): SourceFile[] {
  const isIncluded = picomatch(include, { dot: true })
  const out: SourceFile[] = []
  for (const f of files) {
    const abs = resolveRepoPath(cwd, f)
    const rel = toPosix(path.relative(cwd, abs))
    if (!fs.existsSync(abs) || !fs.statSync(abs).isFile()) {
      warn(`Not a file, skipped: ${f}`)
      continue
    }
    if (!isIncluded(rel)) {
      info(`Skipping ${rel} (not matched by check.include)`)
      continue
    }
    try {
      out.push({ path: rel, content: fs.readFileSync(abs, 'utf8') })
    } catch (e) {
      warn(`Error reading ${f}: ${getErrorMessage(e)}`)
    }
  }
  return out
}

/** `rulesmith check <files...>`; resolves to the process exit code */
export async function runCheckCLI(opts: CheckCLIOptions, deps: { provider?: RuleProvider } = {}): Promise<number> {
  const cwd = path.resolve(opts.cwd ?? process.cwd())
  const log = createLogger('check', { debug: opts.debug })

  try {
    const rc = loadConfig(
      { provider: opts.provider, rulesDir: opts.rulesDir, check: { failOn: opts.failOn } },
      { cwd, env: opts.env },
    )

    const files = readSources(opts.files, cwd, rc.check.include)
    if (!files.length) {
      info('No files to check.')
      return 0
    }

    const { rules, invalid } = loadAllRules(rc.rulesDirAbs, { category: opts.category })
    for (const bad of invalid) {
      warn(`Invalid rule file ${bad.filePath}: ${bad.errors.map((e) => `${e.path} ${e.message}`).join('; ')}`)
    }
    if (!rules.length) warn(`No rules found in ${rc.rulesDirAbs}`)

    const provider = deps.provider ?? await pickProvider(rc.provider, { options: rc.providerOptions, logger: log })
    const debug = { enabled: !!opts.debug, dir: path.join(rc.debugDirAbs, 'check') }
    const report = await checkFiles(files, rules, (input) =>
      provider.check({ ...input, options: rc.providerOptions, debug }),
    )
    const exit = computeExit(report.violations, rc.check.failOn)

    if (opts.json) {
      console.log(JSON.stringify(report, null, 2))
      return exit.exitCode
    }

    if (report.total_violations === 0) {
      ok(`No violations found in ${report.total_files_checked} files`)
    } else {
      fail(`Found ${report.total_violations} violations in ${report.total_files_checked} files`)
      console.log('')
      printViolations(report.violations)
    }
    printCheckSummary({ report, providerLabel: provider.name, rulesCount: rules.length, exit })
    return exit.exitCode
  } catch (e) {
    fail(`Check failed: ${getErrorMessage(e)}`)
    if (opts.debug && e instanceof Error && e.stack) console.error(e.stack)
    return 1
  }
}
