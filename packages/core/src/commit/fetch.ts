import { z } from 'zod'

import { UpstreamUnavailableError, getErrorMessage } from '../errors'
import { silentLogger, type Logger } from '../lib/log'
import type { CommitRecord, CommitReference } from '../types'
import { commitWebUrl } from './parse'

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface FetchCommitOptions {
  /** GitHub REST base URL */
  apiUrl?: string
  /** Optional bearer token; without it GitHub applies unauthenticated rate limits */
  token?: string
  /** Per-request timeout */
  timeoutMs?: number
  /** Extra attempts after a transient failure (network error, timeout, 429, 5xx) */
  retries?: number
  retryDelayMs?: number
  fetchImpl?: FetchLike
  logger?: Logger
}

export const GITHUB_DEFAULTS = {
  apiUrl: 'https://api.github.com',
  apiVersion: '2022-11-28',
  timeoutMs: 30_000,
  retries: 1,
  retryDelayMs: 500,
} as const

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504])

const COMMIT_META_SCHEMA = z.object({
  commit: z.object({
    message: z.string(),
  }),
})

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Strip bearer tokens from anything we are about to print */
export function redactToken(message: string, token?: string): string {
  let out = message.replace(/Bearer\s+[A-Za-z0-9_\-.]+/gi, 'Bearer ***')
  if (token) out = out.split(token).join('***')
  return out
}

function buildHeaders(accept: string, token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: accept,
    'User-Agent': 'rulesmith',
    'X-GitHub-Api-Version': GITHUB_DEFAULTS.apiVersion,
  }
  if (token) headers.Authorization = `Bearer ${token}`
  return headers
}

async function requestWithRetry(
  url: string,
  accept: string,
  opts: Required<Pick<FetchCommitOptions, 'timeoutMs' | 'retries' | 'retryDelayMs' | 'fetchImpl' | 'logger'>> & { token?: string },
): Promise<Response> {
  let lastError: unknown = null

  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    const canRetry = attempt < opts.retries
    try {
      const res = await opts.fetchImpl(url, {
        method: 'GET',
        headers: buildHeaders(accept, opts.token),
        signal: AbortSignal.timeout(opts.timeoutMs),
      })
      if (RETRYABLE_STATUS.has(res.status) && canRetry) {
        opts.logger.debug(`GET ${url} → ${res.status}, retrying`)
        await sleep(opts.retryDelayMs)
        continue
      }
      return res
    } catch (e) {
      lastError = e
      if (canRetry) {
        opts.logger.debug(`GET ${url} failed (${getErrorMessage(e)}), retrying`)
        await sleep(opts.retryDelayMs)
        continue
      }
    }
  }

  throw new UpstreamUnavailableError(url, redactToken(getErrorMessage(lastError), opts.token), { cause: lastError })
}

async function ensureOk(res: Response, url: string, token?: string): Promise<Response> {
  if (res.ok) return res
  const body = await res.text().catch((e: unknown) => getErrorMessage(e))
  throw new UpstreamUnavailableError(
    url,
    `${res.status} ${redactToken(body.slice(0, 200), token)}`.trim(),
    { status: res.status },
  )
}

/**
 * Fetch commit message and diff: one JSON read, one read negotiated as
 * `application/vnd.github.diff`. Both carry the optional bearer token.
 */
export async function fetchCommit(ref: CommitReference, options: FetchCommitOptions = {}): Promise<CommitRecord> {
  const apiUrl = (options.apiUrl ?? GITHUB_DEFAULTS.apiUrl).replace(/\/+$/, '')
  const url = `${apiUrl}/repos/${ref.owner}/${ref.repo}/commits/${ref.revision}`
  const reqOpts = {
    token: options.token || undefined,
    timeoutMs: options.timeoutMs ?? GITHUB_DEFAULTS.timeoutMs,
    retries: Math.max(0, options.retries ?? GITHUB_DEFAULTS.retries),
    retryDelayMs: options.retryDelayMs ?? GITHUB_DEFAULTS.retryDelayMs,
    fetchImpl: options.fetchImpl ?? ((u: string, init: RequestInit) => fetch(u, init)),
    logger: options.logger ?? silentLogger,
  }

  reqOpts.logger.debug(`fetching commit metadata ${url}`)
  const metaRes = await ensureOk(await requestWithRetry(url, 'application/vnd.github+json', reqOpts), url, reqOpts.token)

  let raw: unknown
  try {
    raw = await metaRes.json()
  } catch (e) {
    throw new UpstreamUnavailableError(url, `invalid JSON body (${getErrorMessage(e)})`, { cause: e })
  }
  const meta = COMMIT_META_SCHEMA.safeParse(raw)
  if (!meta.success) {
    throw new UpstreamUnavailableError(url, `unexpected response shape: ${meta.error.message}`)
  }

  reqOpts.logger.debug(`fetching commit diff ${url}`)
  const diffRes = await ensureOk(await requestWithRetry(url, 'application/vnd.github.diff', reqOpts), url, reqOpts.token)
  const diffText = await diffRes.text()

  return {
    message: meta.data.commit.message,
    diffText,
    sourceUrl: commitWebUrl(ref),
  }
}
