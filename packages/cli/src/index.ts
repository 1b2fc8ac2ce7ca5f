import path from 'node:path'
import { Command, Option } from 'commander'
import { bold, dim } from 'colorette'
import { config as loadEnv } from 'dotenv'

import { fail, findRepoRoot } from './cli-utils'
import { runCheckCLI } from './cmd/check'
import { runConvertCLI } from './cmd/convert'
import { runLearnCLI } from './cmd/learn'
import { runRulesCLI } from './cmd/rules'
import type { FailOn } from './config'
import { DEFAULT_PROVIDER, listProviders } from './providers'

// ────────────────────────────────────────────────────────────────────────────────
// Repo root (.git | .rulesmithrc.json | fallback)
// ────────────────────────────────────────────────────────────────────────────────
const REPO_ROOT = findRepoRoot()

loadEnv({ path: path.join(REPO_ROOT, '.env') })
loadEnv()

const program = new Command()
  .name('rulesmith')
  .description(`${bold('rulesmith')} — learn code rules from commits, check code against them`)
  .version('0.1.0')

program.showHelpAfterError()
program.showSuggestionAfterError()

const providerOption = () => new Option('--provider <name>', `provider: ${listProviders().join('|')}`)

// ────────────────────────────────────────────────────────────────────────────────
// learn
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('learn')
  .description('Extract a rule from a GitHub commit and store it under the rules directory')
  .argument('<url>', 'commit URL: https://github.com/<owner>/<repo>/commit/<sha>')
  .addOption(providerOption())
  .option('--rules-dir <dir>', 'rules root (abs or repo-root relative)')
  .option('--debug', 'verbose logs and provider dumps', false)
  .action(async (url: string, opts: { provider?: string; rulesDir?: string; debug?: boolean }) => {
    process.exitCode = await runLearnCLI({ url, ...opts })
  })

// ────────────────────────────────────────────────────────────────────────────────
// check
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('check')
  .description('Check source files against the stored rules')
  .argument('<files...>', 'files to check')
  .addOption(new Option('--fail-on <level>', 'exit policy').choices(['none', 'warning', 'error']))
  .option('--json', 'print the report as JSON', false)
  .option('--category <name>', 'only rules from this category')
  .addOption(providerOption())
  .option('--rules-dir <dir>', 'rules root (abs or repo-root relative)')
  .option('--debug', 'verbose logs and provider dumps', false)
  .action(async (files: string[], opts: {
    failOn?: FailOn
    json?: boolean
    category?: string
    provider?: string
    rulesDir?: string
    debug?: boolean
  }) => {
    process.exitCode = await runCheckCLI({ files, ...opts })
  })

// ────────────────────────────────────────────────────────────────────────────────
// rules
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('rules')
  .description('List stored rules')
  .option('--category <name>', 'only rules from this category')
  .option('--rules-dir <dir>', 'rules root (abs or repo-root relative)')
  .option('--json', 'print id/title/category/file as JSON', false)
  .action((opts: { category?: string; rulesDir?: string; json?: boolean }) => {
    process.exitCode = runRulesCLI(opts)
  })

// ────────────────────────────────────────────────────────────────────────────────
// convert
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('convert')
  .description('Convert markdown rule notes to YAML artifacts (written beside each .md)')
  .argument('[paths...]', 'markdown files or directories (default: rules directory)')
  .option('--first-only', 'stop after the first successful conversion', false)
  .addOption(providerOption())
  .option('--rules-dir <dir>', 'rules root (abs or repo-root relative)')
  .option('--debug', 'verbose logs and provider dumps', false)
  .action(async (paths: string[], opts: { firstOnly?: boolean; provider?: string; rulesDir?: string; debug?: boolean }) => {
    process.exitCode = await runConvertCLI({ paths, ...opts })
  })

// ────────────────────────────────────────────────────────────────────────────────
// providers
// ────────────────────────────────────────────────────────────────────────────────
program
  .command('providers')
  .description('List available providers')
  .action(() => {
    for (const name of listProviders()) {
      console.log(name === DEFAULT_PROVIDER ? `${name} ${dim('(default)')}` : name)
    }
  })

// help footer
program.addHelpText(
  'afterAll',
  `
${dim('Config sources (priority high→low):')} CLI ${bold('>')} ENV ${bold('>')} .rulesmithrc.json ${bold('>')} defaults
Repo root: ${dim(REPO_ROOT)}
`,
)

// run
program.parseAsync().catch((e: unknown) => {
  fail(e instanceof Error ? e.stack ?? e.message : String(e))
  process.exit(1)
})
