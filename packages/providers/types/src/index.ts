import type {
  CheckInput,
  GenerateInput,
  RuleDraft,
  RuleGenerator,
  RuleViolation,
} from '@rulesmith/core'

/**
 * Debug controls passed into a provider.
 * When `enabled`, the provider may dump prompts and raw responses into `dir`.
 */
export interface ProviderDebug {
  enabled: boolean
  /** Absolute path to a directory for debug artifacts */
  dir: string
}

/** Provider-agnostic options for LLM-like providers */
export interface ProviderOptions {
  model?: string
  temperature?: number
  maxTokens?: number
}

export const DEFAULT_PROVIDER_OPTIONS = {
  model: 'gpt-4o-mini',
  temperature: 0.2,
  maxTokens: 8000,
} as const satisfies Required<ProviderOptions>

export interface ProviderGenerateInput extends GenerateInput {
  options?: ProviderOptions
  debug?: ProviderDebug
}

export interface ProviderCheckInput extends CheckInput {
  options?: ProviderOptions
  debug?: ProviderDebug
}

/**
 * Minimal provider contract: a name, rule extraction from a prompt, and
 * rule checking over a set of source files.
 */
export interface RuleProvider extends RuleGenerator {
  name: string
  generate(input: ProviderGenerateInput): Promise<RuleDraft>
  check(input: ProviderCheckInput): Promise<RuleViolation[]>
}

/** Draft meaning "no generalizable pattern" */
export function emptyDraft(): RuleDraft {
  return { category: '', title: '', description: '', problems: [], solutions: [], examples: [] }
}
