import fs from 'node:fs'
import path from 'node:path'

import { CATEGORY_PREFIXES, formatRuleId, prefixFor, type CategoryPrefixes } from '../categories'
import { PersistenceFailedError, getErrorMessage } from '../errors'
import { writeRule } from '../serialize/yaml'
import type { Rule, RuleDraft } from '../types'

export interface AssignedIdentity {
  rule: Rule
  number: number
  directory: string
}

const NUMBERED_FILE_RE = /^(\d+)-/

/**
 * Category-scoped store of rule artifacts under `rulesRoot`.
 *
 * Numbering is a directory scan (`max + 1`, gaps never reused), so at most
 * one writer may target a category directory at a time. The prefix table is
 * fixed at construction and never mutated.
 */
export class RuleRepository {
  readonly rulesRoot: string
  private readonly prefixes: CategoryPrefixes

  constructor(rulesRoot: string, prefixes: CategoryPrefixes = CATEGORY_PREFIXES) {
    this.rulesRoot = path.resolve(rulesRoot)
    this.prefixes = Object.freeze({ ...prefixes })
  }

  /** Unknown categories are used literally as the directory name */
  resolveCategoryDirectory(category: string): string {
    return path.join(this.rulesRoot, category)
  }

  nextNumber(directory: string): number {
    let names: string[]
    try {
      if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) return 1
      names = fs.readdirSync(directory)
    } catch (e) {
      throw new PersistenceFailedError(directory, getErrorMessage(e), { cause: e })
    }
    let max = 0
    for (const name of names) {
      if (!name.endsWith('.yaml')) continue
      const m = NUMBERED_FILE_RE.exec(name)
      if (m && m[1]) max = Math.max(max, Number.parseInt(m[1], 10))
    }
    return max + 1
  }

  /** Any id on the draft is discarded */
  assignIdentity(draft: RuleDraft): AssignedIdentity {
    const directory = this.resolveCategoryDirectory(draft.category)
    const number = this.nextNumber(directory)
    const id = formatRuleId(prefixFor(draft.category, this.prefixes), number)
    return { rule: { ...draft, id }, number, directory }
  }

  /** `<category>/<NNN>-<id lowercased>.yaml`; creates the category directory */
  materializePath(rule: Rule, number: number): string {
    const directory = this.resolveCategoryDirectory(rule.category)
    try {
      fs.mkdirSync(directory, { recursive: true })
    } catch (e) {
      throw new PersistenceFailedError(directory, getErrorMessage(e), { cause: e })
    }
    return path.join(directory, `${String(number).padStart(3, '0')}-${rule.id.toLowerCase()}.yaml`)
  }

  save(draft: RuleDraft): { rule: Rule; filePath: string } {
    const { rule, number } = this.assignIdentity(draft)
    const filePath = this.materializePath(rule, number)
    writeRule(rule, filePath)
    return { rule, filePath }
  }
}
