import { InvalidReferenceError } from '../errors'
import type { CommitReference } from '../types'

// owner / repo / (commit|commits) / lowercase-hex revision ending the path segment
const COMMIT_URL_PATTERNS: readonly RegExp[] = [
  /github\.com\/([^/\s]+)\/([^/\s]+)\/commit\/([a-f0-9]+)(?=$|[/?#])/,
  /github\.com\/([^/\s]+)\/([^/\s]+)\/commits\/([a-f0-9]+)(?=$|[/?#])/,
]

/**
 * Split a GitHub commit URL into owner, repository and revision.
 * Pure: never touches the network.
 */
export function parseReference(url: string): CommitReference {
  for (const re of COMMIT_URL_PATTERNS) {
    const m = re.exec(url)
    if (m && m[1] && m[2] && m[3]) {
      return { owner: m[1], repo: m[2], revision: m[3] }
    }
  }
  throw new InvalidReferenceError(url)
}

export function commitWebUrl(ref: CommitReference): string {
  return `https://github.com/${ref.owner}/${ref.repo}/commit/${ref.revision}`
}
