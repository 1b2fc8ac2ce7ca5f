import fs from 'node:fs'
import path from 'node:path'

import { parse } from 'yaml'

import { getErrorMessage } from '../errors'
import { validateArtifact, type ArtifactIssue } from '../schema/artifact'
import type { StoredRule } from '../types'

export interface InvalidArtifact {
  filePath: string
  errors: ArtifactIssue[]
}

export interface LoadedRules {
  rules: StoredRule[]
  invalid: InvalidArtifact[]
}

function listDirs(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isDirectory() && !d.name.startsWith('.'))
    .map((d) => d.name)
    .sort()
}

/** Read a single artifact; `category` comes from its parent directory */
export function loadRuleFile(filePath: string): StoredRule | InvalidArtifact {
  let data: unknown
  try {
    data = parse(fs.readFileSync(filePath, 'utf8'))
  } catch (e) {
    return { filePath, errors: [{ path: '(file)', message: getErrorMessage(e) }] }
  }
  const res = validateArtifact(data)
  if (!res.ok) return { filePath, errors: res.errors }
  return { ...res.artifact, category: path.basename(path.dirname(filePath)), filePath }
}

/**
 * Load every `<rulesRoot>/<category>/*.yaml` artifact, sorted by category
 * then file name. Files that fail the artifact schema are reported, not thrown.
 */
export function loadAllRules(rulesRoot: string, opts: { category?: string } = {}): LoadedRules {
  const out: LoadedRules = { rules: [], invalid: [] }
  if (!fs.existsSync(rulesRoot)) return out

  const categories = opts.category ? [opts.category] : listDirs(rulesRoot)
  for (const category of categories) {
    const dir = path.join(rulesRoot, category)
    if (!fs.existsSync(dir)) continue
    const files = fs.readdirSync(dir).filter((f) => f.endsWith('.yaml')).sort()
    for (const f of files) {
      const loaded = loadRuleFile(path.join(dir, f))
      if ('errors' in loaded) out.invalid.push(loaded)
      else out.rules.push(loaded)
    }
  }
  return out
}
