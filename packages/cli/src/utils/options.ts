import { z } from 'zod'
import {
  ConfigError,
  ConfigErrorCode,
  PROVIDER_NAMES,
  REALTIME_PROVIDERS,
  STANDARD_PROVIDERS,
  resolveSystemPrompt,
  type CompareConfig,
  type ProviderName,
} from '@polyprompt/core'

/**
 * Options of the default command as cac hands them over. cac converts
 * numeric-looking values to numbers, so those arrive as either type.
 */
export interface CompareCommandOptions {
  provider?: string
  compare?: boolean
  realtime?: boolean
  synthesize?: boolean
  tier?: string
  preset?: string
  maxTokens?: number | string
  temperature?: number | string
  numCalls?: number | string
  concurrency?: number | string
  timeout?: number | string
  output?: string
  json?: boolean
  config?: string
  envFile?: string
  verbose?: boolean
  mock?: boolean
}

export type RunMode = 'single' | 'compare'

/** Fully resolved settings of one comparison run. */
export interface RunSettings {
  mode: RunMode
  /** Providers in selection order */
  providers: ProviderName[]
  tier: string
  systemPrompt: string
  userPrompt: string
  /** Name of the preset the system prompt came from */
  preset?: string
  maxTokens: number
  temperature: number
  numCalls: number
  concurrency: number
  requestTimeoutMs: number
  synthesize: boolean
  output?: string
  json: boolean
  verbose: boolean
  mock: boolean
}

const positiveInt = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .positive('must be a positive integer')

const optionsSchema = z.object({
  provider: z
    .enum(PROVIDER_NAMES, {
      errorMap: () => ({ message: `must be one of ${PROVIDER_NAMES.join(', ')}` }),
    })
    .optional(),
  tier: z.string().min(1).optional(),
  preset: z.string().min(1).optional(),
  maxTokens: positiveInt.optional(),
  temperature: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .min(0, 'must be between 0 and 2')
    .max(2, 'must be between 0 and 2')
    .optional(),
  numCalls: positiveInt.optional(),
  concurrency: positiveInt.optional(),
  timeout: positiveInt.optional(),
})

function toFlag(key: PropertyKey): string {
  return `--${String(key).replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`
}

export function usageError(message: string, context?: Record<string, unknown>): ConfigError {
  return new ConfigError(message, { code: ConfigErrorCode.INVALID_CONFIG, context })
}

interface Prompts {
  systemPrompt: string
  userPrompt: string
  preset?: string
}

function resolvePrompts(
  positionals: readonly string[],
  preset: string | undefined,
  config: CompareConfig
): Prompts {
  const prompts = positionals.filter((value) => value.trim() !== '')

  if (preset !== undefined) {
    if (prompts.length !== 1) {
      throw usageError('With --preset, pass exactly one prompt: the user prompt')
    }
    return { systemPrompt: resolveSystemPrompt(config, preset), userPrompt: prompts[0], preset }
  }

  if (prompts.length !== 2) {
    throw usageError(
      'Both a system prompt and a user prompt are required.\n\n' +
        'Usage:\n' +
        '  polyprompt "<system prompt>" "<user prompt>"\n' +
        '  polyprompt --preset <name> "<user prompt>"'
    )
  }
  return { systemPrompt: prompts[0], userPrompt: prompts[1] }
}

/**
 * Validate the default command's arguments and fill in configured defaults.
 *
 * `--provider` selects single-provider mode unless `--compare` is also given,
 * in which case the provider is ignored and the full subset is compared.
 *
 * @throws {ConfigError} INVALID_CONFIG for invalid usage, UNKNOWN_PRESET for an unknown preset
 */
export function resolveRunSettings(
  positionals: readonly string[],
  options: CompareCommandOptions,
  config: CompareConfig
): RunSettings {
  const result = optionsSchema.safeParse(options)
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.map(toFlag).join('.')} ${issue.message}`
    )
    throw usageError(`Invalid options: ${issues.join('; ')}`, { issues })
  }

  const parsed = result.data
  const mode: RunMode = parsed.provider !== undefined && !options.compare ? 'single' : 'compare'
  const synthesize = options.synthesize ?? false

  if (synthesize && mode === 'single') {
    throw usageError('--synthesize compares several providers and cannot be used with --provider')
  }

  let providers: ProviderName[]
  if (mode === 'single' && parsed.provider !== undefined) {
    providers = [parsed.provider]
  } else {
    providers = [...(options.realtime ? REALTIME_PROVIDERS : STANDARD_PROVIDERS)]
  }

  const defaults = config.defaults

  return {
    mode,
    providers,
    tier: parsed.tier ?? defaults.tier,
    ...resolvePrompts(positionals, parsed.preset, config),
    maxTokens: parsed.maxTokens ?? defaults.maxTokens,
    temperature: parsed.temperature ?? defaults.temperature,
    numCalls: parsed.numCalls ?? defaults.numCalls,
    concurrency: parsed.concurrency ?? defaults.concurrency,
    requestTimeoutMs: parsed.timeout ?? defaults.requestTimeoutMs,
    synthesize,
    output: options.output,
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    mock: options.mock ?? false,
  }
}
