import { getErrorMessage, loadAllRules } from '@rulesmith/core'

import { fail, info, printRulesList, warn } from '../cli-utils'
import { loadConfig } from '../config'

export type RulesCLIOptions = {
  category?: string
  rulesDir?: string
  json?: boolean
  cwd?: string
  env?: NodeJS.ProcessEnv
}

/** `rulesmith rules`: list stored rules, report artifacts that fail the schema */
export function runRulesCLI(opts: RulesCLIOptions = {}): number {
  try {
    const rc = loadConfig({ rulesDir: opts.rulesDir }, { cwd: opts.cwd, env: opts.env })
    const { rules, invalid } = loadAllRules(rc.rulesDirAbs, { category: opts.category })

    if (opts.json) {
      console.log(JSON.stringify(rules.map(({ id, title, category, filePath }) => ({ id, title, category, filePath })), null, 2))
    } else if (!rules.length) {
      info(`No rules found in ${rc.rulesDirAbs}${opts.category ? ` (category ${opts.category})` : ''}`)
    } else {
      console.log(`Available rules (${rules.length} total):`)
      console.log('')
      printRulesList(rules)
    }

    for (const bad of invalid) {
      warn(`Invalid rule file ${bad.filePath}: ${bad.errors.map((e) => `${e.path} ${e.message}`).join('; ')}`)
    }
    return 0
  } catch (e) {
    fail(`Error loading rules: ${getErrorMessage(e)}`)
    return 1
  }
}
