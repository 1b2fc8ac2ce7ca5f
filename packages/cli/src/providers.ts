import type { Logger } from '@rulesmith/core'
import type { ProviderOptions, RuleProvider } from '@rulesmith/provider-types'
import { mockProvider } from '@rulesmith/provider-mock'

export interface ProviderContext {
  options: ProviderOptions
  logger: Logger
}

type ProviderFactory = (ctx: ProviderContext) => Promise<RuleProvider>

const FACTORIES = {
  mock: async () => mockProvider,
  // loaded on demand; constructing it checks OPENAI_API_KEY
  openai: async (ctx) => {
    const { createOpenAIProvider } = await import('@rulesmith/provider-openai')
    return createOpenAIProvider({ ...ctx.options, logger: ctx.logger })
  },
} satisfies Record<string, ProviderFactory>

export type ProviderName = keyof typeof FACTORIES

export const DEFAULT_PROVIDER: ProviderName = 'openai'

export function isProviderName(v: string): v is ProviderName {
  return Object.prototype.hasOwnProperty.call(FACTORIES, v)
}

export function listProviders(): ProviderName[] {
  return Object.keys(FACTORIES).filter(isProviderName).sort()
}

export async function pickProvider(name: string, ctx: ProviderContext): Promise<RuleProvider> {
  const key = name.toLowerCase()
  if (!isProviderName(key)) {
    throw new Error(`Unknown provider "${key}". Available: ${listProviders().join(', ')}`)
  }
  return FACTORIES[key](ctx)
}
