import { describe, it, expect, vi } from 'vitest'

import { UpstreamUnavailableError } from '../../errors'
import { fetchCommit, redactToken } from '../fetch'

const REF = { owner: 'acme', repo: 'shop', revision: 'abc123' }
const API = 'https://api.github.com/repos/acme/shop/commits/abc123'
const DIFF = 'diff --git a/app.py b/app.py\n+print("hi")\n'

function accept(init: RequestInit): string | null {
  return new Headers(init.headers).get('Accept')
}

function githubStub() {
  return vi.fn(async (_url: string, init: RequestInit) =>
    accept(init) === 'application/vnd.github.diff'
      ? new Response(DIFF, { status: 200 })
      : new Response(JSON.stringify({ sha: 'abc123', commit: { message: 'Guard user lookup' } }), { status: 200 }),
  )
}

describe('fetchCommit', () => {
  it('reads metadata then diff and builds the commit record', async () => {
    const fetchImpl = githubStub()
    const commit = await fetchCommit(REF, { fetchImpl })

    expect(commit).toEqual({
      message: 'Guard user lookup',
      diffText: DIFF,
      sourceUrl: 'https://github.com/acme/shop/commit/abc123',
    })
    expect(fetchImpl).toHaveBeenCalledTimes(2)
    expect(fetchImpl.mock.calls.map((c) => c[0])).toEqual([API, API])
    expect(fetchImpl.mock.calls.map((c) => accept(c[1]))).toEqual([
      'application/vnd.github+json',
      'application/vnd.github.diff',
    ])
  })

  it('sends the bearer token on both reads', async () => {
    const fetchImpl = githubStub()
    await fetchCommit(REF, { fetchImpl, token: 'test-secret' })

    const auth = fetchImpl.mock.calls.map((c) => new Headers(c[1].headers).get('Authorization'))
    expect(auth).toEqual(['Bearer test-secret', 'Bearer test-secret'])
  })

  it('omits Authorization without a token', async () => {
    const fetchImpl = githubStub()
    await fetchCommit(REF, { fetchImpl })
    expect(new Headers(fetchImpl.mock.calls[0]?.[1].headers).has('Authorization')).toBe(false)
  })

  it('honours a custom API base URL', async () => {
    const fetchImpl = githubStub()
    await fetchCommit(REF, { fetchImpl, apiUrl: 'https://ghe.example.test/api/v3/' })
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://ghe.example.test/api/v3/repos/acme/shop/commits/abc123')
  })

  it('fails on a 404 without retrying', async () => {
    const fetchImpl = vi.fn(async () => new Response('Not Found', { status: 404 }))

    const err = await fetchCommit(REF, { fetchImpl, retryDelayMs: 0 }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(UpstreamUnavailableError)
    expect(err).toMatchObject({ status: 404, url: API })
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  it('retries a 503 once and then succeeds', async () => {
    const ok = githubStub()
    const fetchImpl = vi
      .fn(ok)
      .mockImplementationOnce(async () => new Response('unavailable', { status: 503 }))

    const commit = await fetchCommit(REF, { fetchImpl, retryDelayMs: 0 })
    expect(commit.message).toBe('Guard user lookup')
    expect(fetchImpl).toHaveBeenCalledTimes(3)
  })

  it('gives up after the configured retries', async () => {
    const fetchImpl = vi.fn(async () => new Response('unavailable', { status: 503 }))

    const err = await fetchCommit(REF, { fetchImpl, retries: 1, retryDelayMs: 0 }).catch((e: unknown) => e)
    expect(err).toMatchObject({ code: 'UPSTREAM_UNAVAILABLE', status: 503 })
    expect(fetchImpl).toHaveBeenCalledTimes(2)
  })

  it('wraps transport errors and redacts the token', async () => {
    const fetchImpl = vi.fn(async (): Promise<Response> => {
      throw new Error('socket hang up (Bearer test-secret)')
    })

    const err = await fetchCommit(REF, { fetchImpl, token: 'test-secret', retryDelayMs: 0 }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(UpstreamUnavailableError)
    expect(err instanceof Error ? err.message : '').toBe(
      `GitHub API request failed for ${API}: socket hang up (Bearer ***)`,
    )
    expect(fetchImpl).toHaveBeenCalledTimes(2)
  })

  it('rejects metadata without commit.message', async () => {
    const fetchImpl = vi.fn(async () => new Response(JSON.stringify({ sha: 'abc123' }), { status: 200 }))

    await expect(fetchCommit(REF, { fetchImpl })).rejects.toThrow(/unexpected response shape/)
  })
})

describe('redactToken', () => {
  it('masks bearer headers and the raw token', () => {
    expect(redactToken('Authorization: Bearer abc.def-1 and test-secret', 'test-secret')).toBe(
      'Authorization: Bearer *** and ***',
    )
  })
})
