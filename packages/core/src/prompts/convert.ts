import { RULE_DETAILS_PROMPT } from './system'

export interface MarkdownRuleInfo {
  title: string
  id: string
  category: string
  beforeCode: string
  afterCode: string
}

function fieldValue(lines: string[], label: string): string {
  const marker = `**${label}**:`
  const line = lines.find((l) => l.startsWith(marker))
  return line ? line.slice(marker.length).trim() : ''
}

function fencedBlockAfter(lines: string[], start: number): string {
  const body: string[] = []
  for (let j = start + 1; j < lines.length; j++) {
    const l = lines[j] ?? ''
    if (l.trim().startsWith('```')) break
    body.push(l)
  }
  return body.join('\n')
}

/**
 * Pull the fixed fields out of a markdown rule note:
 * `# Title`, `**ID**: X`, `**Category**: y`, and the python blocks
 * under `## Before` / `## After`. Missing fields come back empty.
 */
export function extractRuleInfo(markdown: string): MarkdownRuleInfo {
  const lines = markdown.trim().split(/\r?\n/)
  const first = lines[0] ?? ''
  const title = first.startsWith('#') ? first.replace(/^#+/, '').trim() : first.trim()

  let section: 'before' | 'after' | null = null
  let beforeCode = ''
  let afterCode = ''

  lines.forEach((line, i) => {
    const t = line.trim()
    if (t === '## Before') { section = 'before'; return }
    if (t === '## After') { section = 'after'; return }
    if (line.startsWith('##')) { section = null; return }
    if (!t.startsWith('```python')) return
    if (section === 'before') beforeCode = fencedBlockAfter(lines, i)
    else if (section === 'after') afterCode = fencedBlockAfter(lines, i)
  })

  return {
    title,
    id: fieldValue(lines, 'ID'),
    category: fieldValue(lines, 'Category'),
    beforeCode,
    afterCode,
  }
}

export function buildConversionPrompt(markdown: string, info: MarkdownRuleInfo): string {
  return [
    RULE_DETAILS_PROMPT,
    '',
    'Convert this markdown rule into the rule JSON shape:',
    '',
    markdown,
    '',
    `Keep the id "${info.id}"${info.category ? ` and the category "${info.category}"` : ''}.`,
    'Write a thorough description, specific problems and actionable solutions.',
    'Keep the original before/after example as the first example, then add new ones from other domains.',
    '',
  ].join('\n')
}
