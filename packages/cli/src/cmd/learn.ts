import path from 'node:path'

import {
  RuleRepository,
  createLogger,
  getErrorMessage,
  learnFromCommit,
  type FetchLike,
  type RuleGenerator,
} from '@rulesmith/core'
import type { ProviderDebug, RuleProvider } from '@rulesmith/provider-types'

import { fail, info, ok, printLearnSummary } from '../cli-utils'
import { loadConfig } from '../config'
import { pickProvider } from '../providers'

export type LearnCLIOptions = {
  url: string
  provider?: string
  rulesDir?: string
  debug?: boolean
  cwd?: string
  env?: NodeJS.ProcessEnv
}

/** Test seams: a ready provider and a fetch stand-in */
export type LearnCLIDeps = {
  provider?: RuleProvider
  fetchImpl?: FetchLike
}

/** `rulesmith learn <url>`; resolves to the process exit code */
export async function runLearnCLI(opts: LearnCLIOptions, deps: LearnCLIDeps = {}): Promise<number> {
  const env = opts.env ?? process.env
  const log = createLogger('learn', { debug: opts.debug })

  try {
    const rc = loadConfig({ provider: opts.provider, rulesDir: opts.rulesDir }, { cwd: opts.cwd, env })
    const provider = deps.provider ?? await pickProvider(rc.provider, { options: rc.providerOptions, logger: log })
    const debug: ProviderDebug = { enabled: !!opts.debug, dir: path.join(rc.debugDirAbs, 'learn') }

    const generator: RuleGenerator = {
      name: provider.name,
      generate: (input) => provider.generate({ ...input, options: rc.providerOptions, debug }),
    }

    const outcome = await learnFromCommit(opts.url, {
      generator,
      repository: new RuleRepository(rc.rulesDirAbs),
      github: {
        ...rc.github,
        token: env.GITHUB_TOKEN || undefined,
        fetchImpl: deps.fetchImpl,
      },
      logger: log,
    })

    if (outcome.status === 'no-pattern') {
      info(`No clear pattern detected in ${opts.url}`)
      return 0
    }

    ok(`Created rule ${outcome.rule.id}: ${outcome.filePath}`)
    printLearnSummary({
      repoRoot: rc.repoRoot,
      providerLabel: provider.name,
      commitUrl: outcome.commit.sourceUrl,
      rule: outcome.rule,
      filePath: outcome.filePath,
    })
    return 0
  } catch (e) {
    fail(`Failed to learn from ${opts.url}: ${getErrorMessage(e)}`)
    if (opts.debug && e instanceof Error && e.stack) console.error(e.stack)
    return 1
  }
}
