import { describe, it, expect } from 'vitest'

import { parseFileDiffs, parseUnifiedDiff } from '../parse'

const DIFF = [
  'diff --git a/app/users.py b/app/users.py',
  'index 1111111..2222222 100644',
  '--- a/app/users.py',
  '+++ b/app/users.py',
  '@@ -10,3 +10,4 @@ def load(uid):',
  '     user = repo.get(uid)',
  '-    return user.name',
  '+    if user is None:',
  '+        return None',
  '+    return user.name',
  '@@ -40 +41 @@',
  '-x = 1',
  '+x = 2',
  'diff --git a/old.py b/old.py',
  'deleted file mode 100644',
  '--- a/old.py',
  '+++ /dev/null',
  '@@ -1,2 +0,0 @@',
  '-import os',
  '-print(os.name)',
  '',
].join('\n')

describe('parseFileDiffs', () => {
  it('numbers added and removed lines on their own side', () => {
    const files = parseFileDiffs(DIFF)
    expect(files.map((f) => f.filePath)).toEqual(['app/users.py', 'old.py'])

    const hunks = files[0]?.hunks ?? []
    expect(hunks).toHaveLength(2)
    expect(hunks[0]?.added).toEqual([
      { line: 11, text: '    if user is None:' },
      { line: 12, text: '        return None' },
      { line: 13, text: '    return user.name' },
    ])
    expect(hunks[0]?.removed).toEqual([{ line: 11, text: '    return user.name' }])
    expect(hunks[1]).toMatchObject({ oldStart: 40, oldLines: 1, newStart: 41, newLines: 1 })
    expect(hunks[1]?.added).toEqual([{ line: 41, text: 'x = 2' }])
  })

  it('keys deleted files by their old path', () => {
    const old = parseFileDiffs(DIFF)[1]
    expect(old?.hunks[0]?.added).toEqual([])
    expect(old?.hunks[0]?.removed.map((l) => l.text)).toEqual(['import os', 'print(os.name)'])
  })
})

describe('parseUnifiedDiff', () => {
  it('flattens hunks per file', () => {
    const parsed = parseUnifiedDiff(DIFF)
    expect(parsed.files).toEqual(['app/users.py', 'old.py'])
    expect(parsed.addedByFile['app/users.py']?.map((l) => l.line)).toEqual([11, 12, 13, 41])
    expect(parsed.removedByFile['old.py']).toHaveLength(2)
  })

  it('returns empty maps for an empty diff', () => {
    expect(parseUnifiedDiff('')).toEqual({ files: [], addedByFile: {}, removedByFile: {} })
  })
})
