import {
  Invoker,
  buildComparisonReport,
  resolveTier,
  runComparison,
  synthesize,
  type Env,
  type Sleeper,
  type SynthesisOutcome,
} from '@polyprompt/core'
import { loadConfig } from '../config/index.js'
import { CLI_DEFAULTS } from '../constants.js'
import { formatReport, formatRunHeader, printError, printLines } from '../output/console.js'
import { createConsoleLogger, type LineWriter } from '../output/logger.js'
import { reportToJson, saveReport } from '../output/report.js'
import { loadEnvFile } from '../utils/env.js'
import { resolveRunSettings, type CompareCommandOptions } from '../utils/options.js'
import { initializeProviders } from '../utils/provider-factory.js'

/** Process-level dependencies, replaceable in tests. */
export interface CompareContext {
  cwd?: string
  env?: Env
  /** Aborted on SIGINT/SIGTERM by the CLI entry point */
  signal?: AbortSignal
  sleeper?: Sleeper
  now?: () => Date
  /** Destination of log lines; stderr by default */
  log?: LineWriter
}

/**
 * Run one comparison (or single-provider run) and print or save the report.
 *
 * @returns the process exit code: 0 when the run completed, even with provider
 * failures; 1 on configuration or usage errors; 130 when interrupted
 */
export async function compareCommand(
  positionals: readonly string[],
  options: CompareCommandOptions,
  context: CompareContext = {}
): Promise<number> {
  const cwd = context.cwd ?? process.cwd()
  const now = context.now ?? (() => new Date())

  try {
    loadEnvFile(options.envFile, cwd)
    const { config } = await loadConfig(options.config, cwd)
    const settings = resolveRunSettings(positionals, options, config)
    const tier = resolveTier(config, settings.tier, settings.providers)

    const logger = createConsoleLogger({ verbose: settings.verbose, write: context.log })
    const registry = initializeProviders({
      providers: settings.synthesize
        ? [...settings.providers, tier.synthesis.provider]
        : settings.providers,
      env: context.env ?? process.env,
      requestTimeoutMs: settings.requestTimeoutMs,
      logger,
      mock: settings.mock,
    })
    const invoker = new Invoker({
      registry,
      pricing: config.pricing,
      sleeper: context.sleeper,
      logger,
    })

    if (!settings.json) {
      printLines(formatRunHeader(settings, tier))
    }

    const startedAt = now()
    const results = await runComparison({
      invoker,
      tier,
      providers: settings.providers,
      systemPrompt: settings.systemPrompt,
      userPrompt: settings.userPrompt,
      maxTokens: settings.maxTokens,
      temperature: settings.temperature,
      numCalls: settings.numCalls,
      concurrency: settings.concurrency,
      signal: context.signal,
    })

    let synthesis: SynthesisOutcome | undefined
    if (settings.synthesize) {
      synthesis = await synthesize({
        invoker,
        target: tier.synthesis,
        userPrompt: settings.userPrompt,
        results,
        numCalls: settings.numCalls,
        maxTokens: settings.maxTokens,
        temperature: settings.temperature,
        signal: context.signal,
        logger,
      })
    }

    const report = buildComparisonReport(results, {
      tier: tier.name,
      systemPrompt: settings.systemPrompt,
      userPrompt: settings.userPrompt,
      numCalls: settings.numCalls,
      maxTokens: settings.maxTokens,
      temperature: settings.temperature,
      startedAt,
      finishedAt: now(),
      synthesis,
      notes: synthesis?.status === 'skipped' ? [synthesis.reason] : [],
    })

    if (settings.json) {
      console.log(reportToJson(report))
    } else {
      printLines(formatReport(report))
    }

    if (settings.output) {
      const outputPath = await saveReport(report, settings.output, cwd)
      if (!settings.json) {
        console.log(`\n  Results saved to: ${outputPath}`)
      }
    }
  } catch (error) {
    printError(error instanceof Error ? error : new Error(String(error)))
    return 1
  }

  return context.signal?.aborted ? CLI_DEFAULTS.EXIT_INTERRUPTED : 0
}
