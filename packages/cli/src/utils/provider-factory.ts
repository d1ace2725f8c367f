import {
  PROVIDER_LABELS,
  createProviderRegistry,
  type CompletionProvider,
  type Env,
  type Logger,
  type ProviderName,
  type ProviderRegistry,
} from '@polyprompt/core'
import { MockProvider, mock } from '@polyprompt/core/testing'

export interface InitializeProvidersOptions {
  providers: readonly ProviderName[]
  env: Env
  requestTimeoutMs: number
  logger: Logger
  /** Answer from in-process mock models instead of calling provider APIs */
  mock?: boolean
}

/**
 * Build the provider registry for a run.
 * Creates mock providers in test mode, or real providers from the environment's API keys.
 *
 * @throws {ConfigError} MISSING_API_KEY before any provider is constructed
 */
export function initializeProviders(options: InitializeProvidersOptions): ProviderRegistry {
  const providers = [...new Set(options.providers)]

  if (options.mock) {
    return new Map(
      providers.map((name): [ProviderName, CompletionProvider] => [
        name,
        new MockProvider({
          name,
          modelFactory: mock.echo(PROVIDER_LABELS[name]),
          requestTimeoutMs: options.requestTimeoutMs,
          logger: options.logger,
        }),
      ])
    )
  }

  return createProviderRegistry({
    providers,
    env: options.env,
    requestTimeoutMs: options.requestTimeoutMs,
    logger: options.logger,
  })
}
