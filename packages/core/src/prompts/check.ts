import type { SourceFile, StoredRule } from '../types'

function numbered(content: string): string {
  return content
    .split(/\r?\n/)
    .map((text, i) => `${i + 1}: ${text}`)
    .join('\n')
}

function ruleDigest(rule: StoredRule): string {
  const lines = [`- id: ${rule.id}`, `  category: ${rule.category}`, `  title: ${rule.title}`]
  const summary = rule.description.split('\n').find((l) => l.trim())
  if (summary) lines.push(`  summary: ${summary.trim()}`)
  for (const s of rule.solutions.slice(0, 5)) lines.push(`  do: ${s}`)
  return lines.join('\n')
}

export const CHECK_SYSTEM_PROMPT = [
  'You are a strict code reviewer applying a fixed set of coding rules.',
  'Report only violations of the listed RULES that are evident in the listed FILES.',
  'Return a single JSON object: {"violations": [...]}. If nothing violates a rule, return {"violations": []}.',
].join('\n')

export function buildCheckPrompt(files: SourceFile[], rules: StoredRule[]): string {
  const rulesSection = rules.length ? rules.map(ruleDigest).join('\n') : '(none)'
  const filesSection = files.map((f) => `# FILE: ${f.path}\n${numbered(f.content)}`).join('\n\n')

  return [
    'STRICT CONSTRAINTS:',
    '- rule_id must be one of the RULES ids exactly.',
    '- file_path must be one of the FILES paths exactly.',
    '- line_number is 1-based and points at a line shown under that file.',
    '- severity is "error" for clear violations, "warning" for judgement calls.',
    '',
    'RULES:',
    rulesSection,
    '',
    'FILES:',
    filesSection,
    '',
    'Return ONLY valid JSON:',
    '{',
    '  "violations": [',
    '    { "file_path": "...", "line_number": 1, "column": 1, "rule_id": "...",',
    '      "message": "...", "severity": "error|warning", "category": "..." }',
    '  ]',
    '}',
  ].join('\n')
}
