import Ajv2020 from 'ajv/dist/2020.js'

import type { RuleExample } from '../types'
import artifactSchema from './rule-artifact.schema.json'

/** On-disk shape of a rule (`category` lives in the directory name) */
export interface RuleArtifact {
  title: string
  id: string
  description: string
  problems: string[]
  solutions: string[]
  examples: RuleExample[]
}

export interface ArtifactIssue {
  path: string
  message: string
}

export type ArtifactCheck =
  | { ok: true; artifact: RuleArtifact }
  | { ok: false; errors: ArtifactIssue[] }

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validate = ajv.compile<RuleArtifact>(artifactSchema)

/** Validate a parsed YAML document against rule-artifact.schema.json */
export function validateArtifact(data: unknown): ArtifactCheck {
  if (validate(data)) return { ok: true, artifact: data }
  return {
    ok: false,
    errors: (validate.errors ?? []).map((e) => ({
      path: e.instancePath || '(root)',
      message: e.message ?? 'invalid',
    })),
  }
}
