import { RULE_CATEGORIES } from '../categories'
import type { CommitRecord } from '../types'
import { RULE_DETAILS_PROMPT } from './system'

/**
 * Commit → rule extraction prompt. Deterministic: same commit, same text.
 * Commit message, URL and diff are embedded verbatim.
 */
export function buildPrompt(commit: CommitRecord): string {
  return [
    RULE_DETAILS_PROMPT,
    '',
    'Given a git diff showing before/after changes, decide whether it contains a clear style',
    'improvement that generalizes into a coding rule.',
    '',
    'Focus on:',
    '- code organization and structure',
    '- naming conventions',
    '- function and class design',
    '- error handling',
    '- performance',
    '- readability',
    '',
    'Generate a rule ONLY for a clear, generalizable pattern of good taste, not for a plain bug fix.',
    'If there is no such pattern, return the full JSON shape with every field present, an empty "title" and empty lists.',
    '',
    `For the category, choose from: ${RULE_CATEGORIES.join(', ')}`,
    '',
    'COMMIT MESSAGE:',
    commit.message,
    '',
    'COMMIT URL:',
    commit.sourceUrl,
    '',
    'DIFF:',
    commit.diffText,
    '',
  ].join('\n')
}
