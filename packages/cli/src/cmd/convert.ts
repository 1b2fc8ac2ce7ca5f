import fs from 'node:fs'
import path from 'node:path'

import {
  SYSTEM_PROMPT,
  buildConversionPrompt,
  createLogger,
  extractRuleInfo,
  getErrorMessage,
  writeRule,
  type Rule,
} from '@rulesmith/core'
import type { ProviderDebug, RuleProvider } from '@rulesmith/provider-types'

import { fail, info, ok, resolveRepoPath, warn } from '../cli-utils'
import { loadConfig, type ResolvedConfig } from '../config'
import { pickProvider } from '../providers'

export type ConvertCLIOptions = {
  /** Markdown files or directories; defaults to the rules directory */
  paths?: string[]
  firstOnly?: boolean
  provider?: string
  rulesDir?: string
  debug?: boolean
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export type ConvertTally = { converted: number; skipped: number; failed: number }

/** Markdown files under the given paths, sorted, directories walked recursively */
export function collectMarkdown(paths: string[]): string[] {
  const out: string[] = []
  for (const p of paths) {
    if (!fs.existsSync(p)) continue
    if (fs.statSync(p).isDirectory()) {
      const entries = fs.readdirSync(p, { recursive: true, encoding: 'utf8' })
      for (const e of entries) if (e.endsWith('.md')) out.push(path.join(p, e))
    } else if (p.endsWith('.md')) {
      out.push(p)
    }
  }
  return [...new Set(out)].sort()
}

async function convertOne(
  file: string,
  provider: RuleProvider,
  options: { debug: ProviderDebug; providerOptions: ResolvedConfig['providerOptions'] },
): Promise<string | null> {
  const markdown = fs.readFileSync(file, 'utf8')
  const meta = extractRuleInfo(markdown)
  if (!meta.id) return null

  const draft = await provider.generate({
    prompt: buildConversionPrompt(markdown, meta),
    system: SYSTEM_PROMPT,
    options: options.providerOptions,
    debug: options.debug,
  })
  const rule: Rule = {
    ...draft,
    id: meta.id,
    category: meta.category || draft.category,
    title: draft.title.trim() || meta.title,
  }
  const out = path.join(path.dirname(file), `${path.basename(file, '.md')}.yaml`)
  // re-running regenerates the artifact
  return writeRule(rule, out, { overwrite: true })
}

/** `rulesmith convert`: markdown rule notes → YAML artifacts beside them, replacing earlier output */
export async function runConvertCLI(
  opts: ConvertCLIOptions = {},
  deps: { provider?: RuleProvider } = {},
): Promise<number> {
  const cwd = path.resolve(opts.cwd ?? process.cwd())
  const log = createLogger('convert', { debug: opts.debug })
  const tally: ConvertTally = { converted: 0, skipped: 0, failed: 0 }

  let rc: ResolvedConfig
  let provider: RuleProvider
  try {
    rc = loadConfig({ provider: opts.provider, rulesDir: opts.rulesDir }, { cwd, env: opts.env })
    provider = deps.provider ?? await pickProvider(rc.provider, { options: rc.providerOptions, logger: log })
  } catch (e) {
    fail(getErrorMessage(e))
    return 1
  }

  const roots = opts.paths?.length ? opts.paths.map((p) => resolveRepoPath(cwd, p)) : [rc.rulesDirAbs]
  const files = collectMarkdown(roots)
  info(`Found ${files.length} markdown rule files`)
  if (opts.firstOnly) info('Stopping after the first successful conversion')

  const debug = { enabled: !!opts.debug, dir: path.join(rc.debugDirAbs, 'convert') }
  for (const file of files) {
    try {
      const written = await convertOne(file, provider, { debug, providerOptions: rc.providerOptions })
      if (!written) {
        warn(`Could not extract rule ID from ${file}`)
        tally.skipped++
        continue
      }
      ok(`Converted ${path.basename(file)} → ${written}`)
      tally.converted++
      if (opts.firstOnly) break
    } catch (e) {
      fail(`Error converting ${file}: ${getErrorMessage(e)}`)
      tally.failed++
    }
  }

  console.log('')
  console.log('Conversion complete:')
  console.log(`  converted: ${tally.converted}`)
  console.log(`  skipped:   ${tally.skipped}`)
  console.log(`  failed:    ${tally.failed}`)
  return tally.failed ? 1 : 0
}
