import { fetchCommit, type FetchCommitOptions } from '../commit/fetch'
import { parseReference } from '../commit/parse'
import { GenerationFailedError, getErrorMessage, isRulesmithError } from '../errors'
import { silentLogger, type Logger } from '../lib/log'
import { buildPrompt } from '../prompts/analysis'
import { SYSTEM_PROMPT } from '../prompts/system'
import type { RuleRepository } from '../repo/repository'
import type { CommitRecord, Rule, RuleDraft, RuleGenerator } from '../types'

export type LearnOutcome =
  | { status: 'created'; rule: Rule; filePath: string; commit: CommitRecord }
  | { status: 'no-pattern'; commit: CommitRecord }

export interface LearnDeps {
  generator: RuleGenerator
  repository: RuleRepository
  github?: FetchCommitOptions
  /** Replaces the GitHub adapter (tests, offline fixtures) */
  loadCommit?: typeof fetchCommit
  logger?: Logger
}

async function generateDraft(generator: RuleGenerator, prompt: string): Promise<RuleDraft> {
  try {
    return await generator.generate({ prompt, system: SYSTEM_PROMPT })
  } catch (e) {
    if (isRulesmithError(e)) throw e
    throw new GenerationFailedError(`Provider "${generator.name}" failed: ${getErrorMessage(e)}`, { cause: e })
  }
}

/**
 * commit URL → parsed reference → commit record → prompt → draft → stored rule.
 *
 * An empty title means the model saw no generalizable pattern; nothing is
 * written and the outcome says so. Any failure leaves the rules root untouched.
 */
export async function learnFromCommit(url: string, deps: LearnDeps): Promise<LearnOutcome> {
  const log = deps.logger ?? silentLogger
  const ref = parseReference(url)
  log.debug(`reference ${ref.owner}/${ref.repo}@${ref.revision}`)

  const commit = await (deps.loadCommit ?? fetchCommit)(ref, { logger: log, ...deps.github })
  log.debug(`commit fetched: ${commit.diffText.length} diff chars`)

  const draft = await generateDraft(deps.generator, buildPrompt(commit))
  if (!draft.title.trim()) {
    log.info('no generalizable pattern in commit')
    return { status: 'no-pattern', commit }
  }

  const { rule, filePath } = deps.repository.save(draft)
  log.debug(`stored ${rule.id} at ${filePath}`)
  return { status: 'created', rule, filePath, commit }
}
