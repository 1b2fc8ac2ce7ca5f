export interface DiffLine {
  /** 1-based line number on the side the line belongs to */
  line: number
  text: string
}

export interface DiffHunk {
  oldStart: number
  oldLines: number
  newStart: number
  newLines: number
  header: string
  added: DiffLine[]
  removed: DiffLine[]
}

export interface FileDiff {
  filePath: string
  hunks: DiffHunk[]
}

export interface ParsedDiff {
  files: string[]
  addedByFile: Record<string, DiffLine[]>
  removedByFile: Record<string, DiffLine[]>
}

const HUNK_HEADER_RE = /^@@\s+-(\d+)(?:,(\d+))?\s+\+(\d+)(?:,(\d+))?\s+@@/
// destination path; deleted files show up as `+++ /dev/null` and are keyed by their `--- a/` path
const NEW_FILE_RE = /^\+\+\+\s+b\/(.+)$/
const OLD_FILE_RE = /^---\s+a\/(.+)$/

/**
 * Walk a unified diff (as served by `application/vnd.github.diff`) and
 * collect hunks per file with added and removed lines numbered on their side.
 */
export function parseFileDiffs(diff: string): FileDiff[] {
  const files: FileDiff[] = []
  let current: FileDiff | null = null
  let hunk: DiffHunk | null = null
  let oldPath: string | null = null
  let oldCursor = 0
  let newCursor = 0

  for (const line of diff.split(/\r?\n/)) {
    if (line.startsWith('diff --git ')) {
      current = null
      hunk = null
      oldPath = null
      continue
    }

    const om = OLD_FILE_RE.exec(line)
    if (om && om[1] && !hunk) {
      oldPath = om[1].trim()
      continue
    }

    if (line.startsWith('+++ ') && !hunk) {
      const nm = NEW_FILE_RE.exec(line)
      const filePath = nm && nm[1] ? nm[1].trim() : oldPath
      if (filePath) {
        current = { filePath, hunks: [] }
        files.push(current)
      }
      continue
    }

    const hm = HUNK_HEADER_RE.exec(line)
    if (hm && current) {
      hunk = {
        oldStart: Number(hm[1]),
        oldLines: Number(hm[2] ?? '1'),
        newStart: Number(hm[3]),
        newLines: Number(hm[4] ?? '1'),
        header: line,
        added: [],
        removed: [],
      }
      current.hunks.push(hunk)
      oldCursor = hunk.oldStart
      newCursor = hunk.newStart
      continue
    }

    if (!hunk) continue

    if (line.startsWith('+')) {
      hunk.added.push({ line: newCursor, text: line.slice(1) })
      newCursor++
    } else if (line.startsWith('-')) {
      hunk.removed.push({ line: oldCursor, text: line.slice(1) })
      oldCursor++
    } else if (line.startsWith(' ')) {
      oldCursor++
      newCursor++
    } else if (line.startsWith('\\')) {
      // "\ No newline at end of file"
      continue
    } else {
      hunk = null
    }
  }

  return files
}

export function parseUnifiedDiff(diff: string): ParsedDiff {
  const out: ParsedDiff = { files: [], addedByFile: {}, removedByFile: {} }
  for (const f of parseFileDiffs(diff)) {
    if (!out.files.includes(f.filePath)) out.files.push(f.filePath)
    const added = (out.addedByFile[f.filePath] ??= [])
    const removed = (out.removedByFile[f.filePath] ??= [])
    for (const h of f.hunks) {
      added.push(...h.added)
      removed.push(...h.removed)
    }
  }
  return out
}
