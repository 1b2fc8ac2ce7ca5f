import fs from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { loadRuleFile } from '@rulesmith/core'
import type { RuleProvider } from '@rulesmith/provider-types'

import { runLearnCLI } from '../learn'
import { captureConsole, makeSandbox, type Sandbox } from '../../__tests__/helpers/sandbox'

const COMMIT_URL = 'https://github.com/acme/shop/commit/abc123'

const NULL_GUARD_DIFF = [
  'diff --git a/shop/users.py b/shop/users.py',
  '--- a/shop/users.py',
  '+++ b/shop/users.py',
  '@@ -1,2 +1,4 @@',
  ' def display_name(user):',
  '+    if user is None:',
  '+        return ""',
  '     return user.name',
  '',
].join('\n')

const RENAME_DIFF = [
  'diff --git a/shop/users.py b/shop/users.py',
  '--- a/shop/users.py',
  '+++ b/shop/users.py',
  '@@ -1,1 +1,1 @@',
  '-def dn(user):',
  '+def display_name(user):',
  '',
].join('\n')

function githubStub(diff: string) {
  return vi.fn(async (_url: string, init: RequestInit) =>
    new Headers(init.headers).get('Accept') === 'application/vnd.github.diff'
      ? new Response(diff, { status: 200 })
      : new Response(JSON.stringify({ sha: 'abc123', commit: { message: 'Guard user lookup' } }), { status: 200 }),
  )
}

describe('runLearnCLI', () => {
  let sbx: Sandbox
  let con: ReturnType<typeof captureConsole>

  beforeEach(() => {
    sbx = makeSandbox('rulesmith-learn-')
    con = captureConsole()
  })

  afterEach(() => {
    con.restore()
    sbx.cleanup()
  })

  it('stores the learned rule under its category with the next id', async () => {
    const fetchImpl = githubStub(NULL_GUARD_DIFF)
    const code = await runLearnCLI(
      { url: COMMIT_URL, provider: 'mock', cwd: sbx.root, env: sbx.env },
      { fetchImpl },
    )

    const file = path.join(sbx.root, 'rules', 'boundaries', '001-bnd001.yaml')
    expect(code).toBe(0)
    expect(fetchImpl).toHaveBeenCalledTimes(2)
    expect(con.out).toContain(`✔ Created rule BND001: ${file}`)

    const text = fs.readFileSync(file, 'utf8')
    expect(text.split('\n').slice(0, 3)).toEqual(['title: Validate before dereference', 'id: BND001', 'description: |-'])
    expect(loadRuleFile(file)).toMatchObject({ id: 'BND001', category: 'boundaries', title: 'Validate before dereference' })
  })

  it('numbers a second rule after the first', async () => {
    const opts = { url: COMMIT_URL, provider: 'mock', cwd: sbx.root, env: sbx.env }
    await runLearnCLI(opts, { fetchImpl: githubStub(NULL_GUARD_DIFF) })
    await runLearnCLI(opts, { fetchImpl: githubStub(NULL_GUARD_DIFF) })

    expect(fs.readdirSync(path.join(sbx.root, 'rules', 'boundaries')).sort()).toEqual([
      '001-bnd001.yaml',
      '002-bnd002.yaml',
    ])
  })

  it('sends GITHUB_TOKEN as a bearer token', async () => {
    const fetchImpl = githubStub(NULL_GUARD_DIFF)
    await runLearnCLI(
      { url: COMMIT_URL, provider: 'mock', cwd: sbx.root, env: { ...sbx.env, GITHUB_TOKEN: 'test-secret' } },
      { fetchImpl },
    )
    expect(new Headers(fetchImpl.mock.calls[0]?.[1].headers).get('Authorization')).toBe('Bearer test-secret')
  })

  it('reports no pattern and writes nothing', async () => {
    const code = await runLearnCLI(
      { url: COMMIT_URL, provider: 'mock', cwd: sbx.root, env: sbx.env },
      { fetchImpl: githubStub(RENAME_DIFF) },
    )
    expect(code).toBe(0)
    expect(con.out).toContain(`ℹ No clear pattern detected in ${COMMIT_URL}`)
    expect(fs.existsSync(path.join(sbx.root, 'rules'))).toBe(false)
  })

  it('fails on a URL that is not a commit', async () => {
    const fetchImpl = githubStub(NULL_GUARD_DIFF)
    const bad = 'https://github.com/acme/shop/pull/12'
    const code = await runLearnCLI({ url: bad, provider: 'mock', cwd: sbx.root, env: sbx.env }, { fetchImpl })

    expect(code).toBe(1)
    expect(fetchImpl).not.toHaveBeenCalled()
    expect(con.stderr()).toContain(`✖ Failed to learn from ${bad}:`)
  })

  it('fails when GitHub answers 404', async () => {
    const fetchImpl = vi.fn(async () => new Response('Not Found', { status: 404 }))
    const code = await runLearnCLI({ url: COMMIT_URL, provider: 'mock', cwd: sbx.root, env: sbx.env }, { fetchImpl })

    expect(code).toBe(1)
    expect(con.stderr()).toContain('404 Not Found')
    expect(fs.existsSync(path.join(sbx.root, 'rules'))).toBe(false)
  })

  it('wraps a provider failure and leaves the rules root untouched', async () => {
    const provider: RuleProvider = {
      name: 'broken',
      generate: vi.fn(async () => {
        throw new Error('socket hang up')
      }),
      check: vi.fn(async () => []),
    }
    const code = await runLearnCLI(
      { url: COMMIT_URL, cwd: sbx.root, env: sbx.env },
      { provider, fetchImpl: githubStub(NULL_GUARD_DIFF) },
    )

    expect(code).toBe(1)
    expect(con.stderr()).toContain('Provider "broken" failed: socket hang up')
    expect(fs.existsSync(path.join(sbx.root, 'rules'))).toBe(false)
  })

  it('passes provider options and the debug dir to the provider', async () => {
    const generate = vi.fn<RuleProvider['generate']>(async () => ({
      category: '', title: '', description: '', problems: [], solutions: [], examples: [],
    }))
    const provider: RuleProvider = { name: 'spy', generate, check: vi.fn(async () => []) }

    await runLearnCLI(
      { url: COMMIT_URL, debug: true, cwd: sbx.root, env: { ...sbx.env, RULESMITH_MODEL: 'gpt-4o' } },
      { provider, fetchImpl: githubStub(NULL_GUARD_DIFF) },
    )

    const input = generate.mock.calls[0]?.[0]
    expect(input?.options?.model).toBe('gpt-4o')
    expect(input?.debug).toEqual({ enabled: true, dir: path.join(sbx.root, '.rulesmith/debug', 'learn') })
    expect(input?.prompt).toContain('COMMIT URL:\nhttps://github.com/acme/shop/commit/abc123')
  })
})
