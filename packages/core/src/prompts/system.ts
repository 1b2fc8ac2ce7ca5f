import { RULE_CATEGORIES } from '../categories'

/** Upper bound on examples per rule; keeps responses inside the token cap */
export const MAX_EXAMPLES = 10

export const SYSTEM_PROMPT = [
  'You are an expert Python developer and technical writer specializing in code quality.',
  'You have deep experience with open source Python projects and real-world development trade-offs.',
  'Your writing is clear, practical and actionable.',
  'You always answer with a single JSON object and nothing else.',
].join('\n')

/**
 * Definition of a rule record. Shared by commit analysis and markdown
 * conversion so both produce the same artifact shape.
 */
export const RULE_DETAILS_PROMPT = [
  '<RuleDefinition>',
  'A rule describes one Python coding practice. It contains:',
  '1. title: short imperative sentence',
  '2. id: provisional identifier (it will be replaced when the rule is stored)',
  '3. description: what the rule is about, one or more paragraphs',
  '4. problems: specific things that go wrong when the rule is violated',
  '5. solutions: concrete steps and practices that satisfy the rule',
  `6. examples: between 3 and ${MAX_EXAMPLES} realistic before/after pairs from different domains`,
  '   (web handlers, data processing, tests, CLI tools, database access, I/O, HTTP clients,',
  '   configuration, logging and error handling, async code)',
  '',
  'Examples use ONLY Python code, fenced as ```python blocks inside the before/after strings.',
  'Keep line breaks inside code; do not collapse examples onto one line.',
  '',
  'JSON shape:',
  '{',
  '  "category": "<one category>",',
  '  "title": "Use comments to explain why, not what",',
  '  "id": "COM001",',
  '  "description": "Comments should explain intent...",',
  '  "problems": ["They duplicate what the code already says"],',
  '  "solutions": ["Document assumptions and constraints"],',
  '  "examples": [',
  '    {',
  '      "scenario": "Incrementing index",',
  '      "before": "```python\\n# add 1 to i\\ni += 1\\n```",',
  '      "after": "```python\\n# Compensate for zero-based index\\ni += 1\\n```"',
  '    }',
  '  ]',
  '}',
  `Allowed categories: ${RULE_CATEGORIES.join(', ')}`,
  '</RuleDefinition>',
].join('\n')
