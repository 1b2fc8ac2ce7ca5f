import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'

import { GITHUB_DEFAULTS, getErrorMessage, type Logger } from '@rulesmith/core'
import { DEFAULT_PROVIDER_OPTIONS, type ProviderOptions } from '@rulesmith/provider-types'

import { findRepoRoot, warn } from './cli-utils'
import { DEFAULT_PROVIDER, isProviderName, type ProviderName } from './providers'

export type FailOn = 'none' | 'warning' | 'error'

export const RC_FILE = '.rulesmithrc.json'

const RcSchema = z.object({
  provider: z.string().optional(),
  rulesDir: z.string().optional(),
  debugDir: z.string().optional(),
  providerOptions: z
    .object({
      model: z.string().optional(),
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
    })
    .optional(),
  github: z
    .object({
      apiUrl: z.string().url().optional(),
      timeoutMs: z.number().int().positive().optional(),
      retries: z.number().int().min(0).optional(),
    })
    .optional(),
  check: z
    .object({
      include: z.array(z.string()).optional(),
      failOn: z.enum(['none', 'warning', 'error']).optional(),
    })
    .optional(),
})

export type RulesmithRc = z.infer<typeof RcSchema>

/** Resolved configuration (absolute paths and defaults) */
export interface ResolvedConfig {
  repoRoot: string
  rcPath: string | null
  provider: ProviderName
  rulesDirAbs: string
  debugDirAbs: string
  providerOptions: Required<ProviderOptions>
  github: { apiUrl: string; timeoutMs: number; retries: number }
  check: { include: string[]; failOn: FailOn }
}

export interface LoadConfigOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  logger?: Pick<Logger, 'warn'>
}

/* ──────────────────────────────────────────────────────────────────────────── */

const defaults = {
  provider: DEFAULT_PROVIDER,
  rulesDir: 'rules',
  debugDir: '.rulesmith/debug',
  providerOptions: { ...DEFAULT_PROVIDER_OPTIONS },
  github: {
    apiUrl: GITHUB_DEFAULTS.apiUrl,
    timeoutMs: GITHUB_DEFAULTS.timeoutMs,
    retries: GITHUB_DEFAULTS.retries,
  },
  check: { include: ['**/*.py'], failOn: 'error' },
} satisfies RulesmithRc

/** Nearest .rulesmithrc.json from `startDir` up to (and including) the repo root */
function findRc(startDir: string, repoRoot: string): string | null {
  let dir = path.resolve(startDir)
  while (true) {
    const candidate = path.join(dir, RC_FILE)
    if (fs.existsSync(candidate)) return candidate
    const parent = path.dirname(dir)
    if (parent === dir) break
    if (dir === repoRoot) break
    dir = parent
  }
  const fallback = path.join(repoRoot, RC_FILE)
  return fs.existsSync(fallback) ? fallback : null
}

function readRc(p: string, log: Pick<Logger, 'warn'>): RulesmithRc {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(p, 'utf8'))
  } catch (e) {
    log.warn(`[config] cannot read ${p} (${getErrorMessage(e)}), ignored`)
    return {}
  }
  const res = RcSchema.safeParse(raw)
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    log.warn(`[config] invalid ${RC_FILE} at ${p} (${issues}), ignored`)
    return {}
  }
  return res.data
}

/** tiny helper: copy only defined (not undefined) fields */
function pickDefined<T extends object>(obj: T | undefined): Partial<T> {
  const out: Partial<T> = {}
  if (!obj) return out
  for (const key in obj) {
    if (obj[key] !== undefined) out[key] = obj[key]
  }
  return out
}

/** Deep-enough merge that ignores undefined, so CLI flags never erase rc values */
function mergeRc(base: RulesmithRc, over?: RulesmithRc): RulesmithRc {
  if (!over) return base
  return {
    ...base,
    ...pickDefined({
      provider: over.provider,
      rulesDir: over.rulesDir,
      debugDir: over.debugDir,
    }),
    providerOptions: { ...base.providerOptions, ...pickDefined(over.providerOptions) },
    github: { ...base.github, ...pickDefined(over.github) },
    check: { ...base.check, ...pickDefined(over.check) },
  }
}

function envNumber(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === '') return undefined
  const n = Number(v)
  return Number.isFinite(n) ? n : undefined
}

/** ENV → RC */
function envAsRc(env: NodeJS.ProcessEnv): RulesmithRc {
  return {
    provider: env.RULESMITH_PROVIDER || undefined,
    rulesDir: env.RULESMITH_RULES_DIR || undefined,
    debugDir: env.RULESMITH_DEBUG_DIR || undefined,
    providerOptions: {
      model: env.RULESMITH_MODEL || env.OPENAI_MODEL || undefined,
      temperature: envNumber(env.RULESMITH_TEMPERATURE),
      maxTokens: envNumber(env.RULESMITH_MAX_TOKENS),
    },
    github: {
      apiUrl: env.RULESMITH_GITHUB_API_URL || undefined,
      timeoutMs: envNumber(env.RULESMITH_GITHUB_TIMEOUT_MS),
      retries: envNumber(env.RULESMITH_GITHUB_RETRIES),
    },
  }
}

/** Provider id normalization; unknown names fall back to the default */
function sanitizeProvider(v: string | undefined, log: Pick<Logger, 'warn'>): ProviderName {
  const key = (v || '').toLowerCase()
  if (isProviderName(key)) return key
  if (key) log.warn(`[config] unknown provider "${v}", using ${DEFAULT_PROVIDER}`)
  return DEFAULT_PROVIDER
}

const cliLogger: Pick<Logger, 'warn'> = { warn: (msg) => warn(msg) }

/** Public loader: defaults <- rc(file) <- env <- cli */
export function loadConfig(cliOverrides?: RulesmithRc, opts: LoadConfigOptions = {}): ResolvedConfig {
  const cwd = opts.cwd ?? process.cwd()
  const env = opts.env ?? process.env
  const log = opts.logger ?? cliLogger

  const repoRoot = findRepoRoot(cwd, env)
  const rcPath = findRc(cwd, repoRoot)
  const fileRc = rcPath ? readRc(rcPath, log) : {}

  const merged = mergeRc(mergeRc(mergeRc(defaults, fileRc), envAsRc(env)), cliOverrides)
  const abs = (p: string) => (path.isAbsolute(p) ? p : path.join(repoRoot, p))

  const po = merged.providerOptions
  const gh = merged.github

  return {
    repoRoot,
    rcPath,
    provider: sanitizeProvider(merged.provider, log),
    rulesDirAbs: abs(merged.rulesDir ?? defaults.rulesDir),
    debugDirAbs: abs(merged.debugDir ?? defaults.debugDir),
    providerOptions: {
      model: po?.model ?? defaults.providerOptions.model,
      temperature: po?.temperature ?? defaults.providerOptions.temperature,
      maxTokens: po?.maxTokens ?? defaults.providerOptions.maxTokens,
    },
    github: {
      apiUrl: gh?.apiUrl ?? defaults.github.apiUrl,
      timeoutMs: gh?.timeoutMs ?? defaults.github.timeoutMs,
      retries: gh?.retries ?? defaults.github.retries,
    },
    check: {
      include: merged.check?.include ?? defaults.check.include,
      failOn: merged.check?.failOn ?? defaults.check.failOn,
    },
  }
}
