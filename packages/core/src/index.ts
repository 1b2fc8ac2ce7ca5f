export * from './types'
export * from './errors'
export * from './categories'

export { createLogger, isDebugEnabled, silentLogger, type Logger } from './lib/log'

export { parseReference, commitWebUrl } from './commit/parse'
export { fetchCommit, redactToken, GITHUB_DEFAULTS, type FetchCommitOptions, type FetchLike } from './commit/fetch'

export { parseFileDiffs, parseUnifiedDiff, type DiffLine, type DiffHunk, type FileDiff, type ParsedDiff } from './diff/parse'

export { SYSTEM_PROMPT, RULE_DETAILS_PROMPT, MAX_EXAMPLES } from './prompts/system'
export { buildPrompt } from './prompts/analysis'
export { extractRuleInfo, buildConversionPrompt, type MarkdownRuleInfo } from './prompts/convert'
export { buildCheckPrompt, CHECK_SYSTEM_PROMPT } from './prompts/check'

export {
  RuleDraftSchema,
  RuleExampleSchema,
  RuleViolationSchema,
  RuleViolationsSchema,
  extractJson,
  parseRuleDraft,
  parseRuleViolations,
} from './schema/rule'
export { validateArtifact, type RuleArtifact, type ArtifactIssue, type ArtifactCheck } from './schema/artifact'

export { serialize, toArtifact, writeRule } from './serialize/yaml'

export { atomicWrite } from './repo/io'
export { RuleRepository, type AssignedIdentity } from './repo/repository'
export { loadAllRules, loadRuleFile, type LoadedRules, type InvalidArtifact } from './repo/load'

export { learnFromCommit, type LearnDeps, type LearnOutcome } from './pipeline/learn'
export { checkFiles, buildCheckReport, type RuleChecker } from './check/report'
