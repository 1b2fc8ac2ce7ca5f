import { Document, Scalar, visit } from 'yaml'

import { PersistenceFailedError, getErrorMessage } from '../errors'
import { atomicWrite } from '../repo/io'
import type { RuleArtifact } from '../schema/artifact'
import type { Rule } from '../types'

/**
 * Render a record as YAML: keys in insertion order, every string holding a
 * newline as a block literal, no line folding, Unicode left as-is.
 */
export function serialize(record: object): string {
  const doc = new Document(record)
  visit(doc, {
    Scalar(_key, node) {
      if (typeof node.value === 'string' && node.value.includes('\n')) {
        node.type = Scalar.BLOCK_LITERAL
      }
    },
  })
  return doc.toString({ lineWidth: 0, minContentWidth: 0 })
}

/** Fixed key order of an artifact; `category` is carried by the directory */
export function toArtifact(rule: Rule): RuleArtifact {
  return {
    title: rule.title,
    id: rule.id,
    description: rule.description,
    problems: [...rule.problems],
    solutions: [...rule.solutions],
    examples: rule.examples.map((e) => ({ scenario: e.scenario, before: e.before, after: e.after })),
  }
}

/**
 * Persist a rule to `filePath`. The text is fully rendered before anything
 * touches the disk. An existing file is kept unless `overwrite` is set.
 */
export function writeRule(rule: Rule, filePath: string, opts: { overwrite?: boolean } = {}): string {
  const text = serialize(toArtifact(rule))
  try {
    atomicWrite(filePath, text, { overwrite: opts.overwrite ?? false })
  } catch (e) {
    throw new PersistenceFailedError(filePath, getErrorMessage(e), { cause: e })
  }
  return filePath
}
