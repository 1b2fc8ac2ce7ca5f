export const RULE_CATEGORIES = [
  'boundaries',
  'concurrency',
  'control_flow',
  'functions',
  'naming',
  'performance',
  'refactoring',
  'structure',
  'style',
  'testing',
] as const

export type RuleCategory = (typeof RULE_CATEGORIES)[number]

export type CategoryPrefixes = Readonly<Record<string, string>>

export const FALLBACK_PREFIX = 'MISC'

/** Category → rule id prefix. Closed table; anything else maps to MISC. */
export const CATEGORY_PREFIXES: CategoryPrefixes = Object.freeze({
  boundaries: 'BND',
  concurrency: 'CON',
  control_flow: 'CTRL',
  functions: 'FUNC',
  naming: 'NAME',
  performance: 'PERF',
  refactoring: 'REF',
  structure: 'STRUCT',
  style: 'STYLE',
  testing: 'TEST',
} satisfies Record<RuleCategory, string>)

export function isKnownCategory(category: string): category is RuleCategory {
  return (RULE_CATEGORIES as readonly string[]).includes(category)
}

export function prefixFor(category: string, prefixes: CategoryPrefixes = CATEGORY_PREFIXES): string {
  return Object.prototype.hasOwnProperty.call(prefixes, category)
    ? (prefixes[category] ?? FALLBACK_PREFIX)
    : FALLBACK_PREFIX
}

/** `STYLE` + 7 → `STYLE007` */
export function formatRuleId(prefix: string, number: number): string {
  return `${prefix}${String(number).padStart(3, '0')}`
}
