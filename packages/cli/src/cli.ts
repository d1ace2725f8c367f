import cac from 'cac'
import { compareCommand } from './commands/compare.js'
import { presetsCommand, tiersCommand, type ListCommandOptions } from './commands/list.js'
import { CLI_DEFAULTS } from './constants.js'
import { printError } from './output/console.js'
import type { CompareCommandOptions } from './utils/options.js'

const VERSION = '0.1.0'
const cli = cac('polyprompt')

function exitWith(code: number): void {
  process.exitCode = code
}

cli
  .command('[systemPrompt] [userPrompt]', 'Send the prompt to every provider and compare')
  .option('--provider <name>', 'Call a single provider (claude, openai, gemini, perplexity, searchgpt)')
  .option('--compare', 'Compare all providers of the active subset (default)')
  .option('--realtime', 'Compare the providers with live web access (perplexity, searchgpt)')
  .option('--synthesize', 'Combine the responses into one answer (comparison mode only)')
  .option('--tier <name>', 'Quality/cost tier (default from config: economy)')
  .option('--preset <name>', 'Use a named system prompt; the single prompt is then the user prompt')
  .option('--max-tokens <n>', 'Maximum output tokens per response (default: 1024)')
  .option('--temperature <t>', 'Sampling temperature between 0 and 2 (default: 0.7)')
  .option('--num-calls <n>', 'Calls per provider with the same prompt (default: 1)')
  .option('--concurrency <n>', 'Maximum requests in flight (default: 3)')
  .option('--timeout <ms>', 'Per-request timeout in milliseconds (default: 60000)')
  .option('-o, --output <path>', 'Save the JSON report to a file')
  .option('--json', 'Print the JSON report instead of the console view')
  .option('-c, --config <path>', `Config file (default: ${CLI_DEFAULTS.DEFAULT_CONFIG_FILE} if present)`)
  .option('-e, --env-file <path>', 'Path to env file', { default: CLI_DEFAULTS.DEFAULT_ENV_FILE })
  .option('-v, --verbose', 'Print progress and retries to stderr')
  .option('--mock', 'Use mock providers (no API calls)')
  .action(
    async (
      systemPrompt: string | undefined,
      userPrompt: string | undefined,
      options: CompareCommandOptions
    ) => {
      const controller = new AbortController()
      const abort = () => controller.abort()
      process.once('SIGINT', abort)
      process.once('SIGTERM', abort)

      try {
        const positionals = [systemPrompt, userPrompt].filter(
          (value): value is string => value !== undefined
        )
        exitWith(await compareCommand(positionals, options, { signal: controller.signal }))
      } finally {
        process.off('SIGINT', abort)
        process.off('SIGTERM', abort)
      }
    }
  )

cli
  .command('tiers', 'Show the available quality/cost tiers')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: ListCommandOptions) => {
    exitWith(await tiersCommand(options))
  })

cli
  .command('presets', 'Show the system prompt presets')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: ListCommandOptions) => {
    exitWith(await presetsCommand(options))
  })

cli.help()
cli.version(VERSION)

try {
  cli.parse(process.argv, { run: false })
  await cli.runMatchedCommand()
} catch (error) {
  printError(error instanceof Error ? error : new Error(String(error)))
  exitWith(1)
}
