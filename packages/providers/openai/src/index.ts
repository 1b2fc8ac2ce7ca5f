import fs from 'node:fs'
import path from 'node:path'
import OpenAI from 'openai'

import {
  CHECK_SYSTEM_PROMPT,
  GenerationFailedError,
  SYSTEM_PROMPT,
  buildCheckPrompt,
  createLogger,
  extractJson,
  getErrorMessage,
  parseRuleDraft,
  parseRuleViolations,
  type Logger,
} from '@rulesmith/core'
import {
  DEFAULT_PROVIDER_OPTIONS,
  type ProviderDebug,
  type ProviderOptions,
  type RuleProvider,
} from '@rulesmith/provider-types'

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string }

export interface ChatRequest {
  model: string
  temperature: number
  max_tokens: number
  messages: ChatMessage[]
}

/** One chat completion in JSON mode; returns the message content */
export type CompleteFn = (req: ChatRequest) => Promise<string>

export interface OpenAIProviderConfig extends ProviderOptions {
  apiKey?: string
  baseURL?: string
  /** Replaces the SDK call (tests) */
  complete?: CompleteFn
  logger?: Logger
}

/* ──────────────────────────────────────────────────────────────
 * small debug helpers (write only when debug.enabled=true)
 * ──────────────────────────────────────────────────────────── */
function debugDump(log: Logger, debug: ProviderDebug | undefined, name: string, data: unknown): void {
  if (!debug?.enabled) return
  try {
    fs.mkdirSync(debug.dir, { recursive: true })
    const content = typeof data === 'string' ? data : JSON.stringify(data, null, 2)
    fs.writeFileSync(path.join(debug.dir, name), content, 'utf8')
  } catch (e) {
    log.warn(`debug dump ${name} failed: ${getErrorMessage(e)}`)
  }
}

function sdkComplete(apiKey: string, baseURL?: string): CompleteFn {
  // generation is never retried
  const client = new OpenAI({ apiKey, baseURL, maxRetries: 0 })
  return async (req) => {
    const resp = await client.chat.completions.create({
      ...req,
      response_format: { type: 'json_object' },
    })
    return resp.choices[0]?.message?.content ?? ''
  }
}

/**
 * OpenAI chat-completions provider. The API key is checked here, once, so a
 * missing credential fails at command start rather than mid-run.
 */
export function createOpenAIProvider(config: OpenAIProviderConfig = {}): RuleProvider {
  const log = config.logger ?? createLogger('provider-openai')
  const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY
  if (!config.complete && !apiKey) {
    throw new GenerationFailedError('OPENAI_API_KEY is required for the openai provider (env var not set).')
  }
  const complete = config.complete ?? sdkComplete(apiKey ?? '', config.baseURL)

  function request(system: string, user: string, options?: ProviderOptions): ChatRequest {
    return {
      model: options?.model ?? config.model ?? DEFAULT_PROVIDER_OPTIONS.model,
      temperature: options?.temperature ?? config.temperature ?? DEFAULT_PROVIDER_OPTIONS.temperature,
      max_tokens: options?.maxTokens ?? config.maxTokens ?? DEFAULT_PROVIDER_OPTIONS.maxTokens,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
    }
  }

  async function call(req: ChatRequest, debug: ProviderDebug | undefined, tag: string): Promise<unknown> {
    debugDump(log, debug, `${tag}.01.system.txt`, req.messages[0]?.content ?? '')
    debugDump(log, debug, `${tag}.02.user.txt`, req.messages[1]?.content ?? '')

    let content: string
    try {
      content = await complete(req)
    } catch (e) {
      throw new GenerationFailedError(`OpenAI request failed (${req.model}): ${getErrorMessage(e)}`, { cause: e })
    }
    debugDump(log, debug, `${tag}.11.response.content.txt`, content)
    log.debug(`${tag}: ${content.length} chars from ${req.model}`)

    return extractJson(content)
  }

  return {
    name: 'openai',

    async generate(input) {
      const req = request(input.system ?? SYSTEM_PROMPT, input.prompt, input.options)
      const draft = parseRuleDraft(await call(req, input.debug, 'generate'))
      debugDump(log, input.debug, 'generate.21.draft.json', draft)
      return draft
    },

    async check(input) {
      const req = request(CHECK_SYSTEM_PROMPT, buildCheckPrompt(input.files, input.rules), input.options)
      return parseRuleViolations(await call(req, input.debug, 'check'))
    },
  }
}
