/**
 * Provider registry: a lookup table from provider name to implementation,
 * built once at startup from credentials.
 *
 * @module provider/registry
 */

import { ConfigError, ConfigErrorCode } from '../errors';
import type { Logger } from '../observability/logger';
import { createClaudeProvider } from './anthropic';
import type { BaseProviderOptions } from './base-provider';
import { createGeminiProvider } from './google';
import { createOpenAIProvider } from './openai';
import { createPerplexityProvider } from './perplexity';
import { createSearchGPTProvider, createSerperSearchClient } from './searchgpt';
import type { CompletionProvider, ProviderName, ProviderRegistry } from './types';

/**
 * Environment variables holding each provider's credentials, in lookup order.
 * searchgpt needs both an OpenAI and a Serper key.
 */
export const PROVIDER_ENV_KEYS: Readonly<Record<ProviderName, readonly (readonly string[])[]>> = {
  claude: [['ANTHROPIC_API_KEY']],
  openai: [['OPENAI_API_KEY']],
  gemini: [['GOOGLE_API_KEY', 'GEMINI_API_KEY', 'GOOGLE_GENERATIVE_AI_API_KEY']],
  perplexity: [['PERPLEXITY_API_KEY']],
  searchgpt: [['OPENAI_API_KEY'], ['SERPER_API_KEY']],
};

export type Env = Readonly<Record<string, string | undefined>>;

export interface ProviderRegistryOptions {
  providers: readonly ProviderName[];
  env: Env;
  requestTimeoutMs?: number;
  logger?: Logger;
  /** Used by the web search client; defaults to the global fetch */
  fetch?: typeof globalThis.fetch;
}

function firstDefined(env: Env, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Reads one key per credential group, failing on the first missing one.
 *
 * @throws {ConfigError} MISSING_API_KEY naming the variables that were tried
 */
export function requireApiKeys(provider: ProviderName, env: Env): string[] {
  return PROVIDER_ENV_KEYS[provider].map((names) => {
    const value = firstDefined(env, names);
    if (value === undefined) {
      throw new ConfigError(
        `Missing API key for ${provider}: set ${names.join(' or ')}`,
        {
          code: ConfigErrorCode.MISSING_API_KEY,
          context: { provider, variables: names },
        }
      );
    }
    return value;
  });
}

function createProvider(
  provider: ProviderName,
  keys: string[],
  options: ProviderRegistryOptions
): CompletionProvider {
  const base: BaseProviderOptions = {
    requestTimeoutMs: options.requestTimeoutMs,
    logger: options.logger,
  };
  const [apiKey, secondKey] = keys;

  switch (provider) {
    case 'claude':
      return createClaudeProvider({ ...base, apiKey });
    case 'openai':
      return createOpenAIProvider({ ...base, apiKey });
    case 'gemini':
      return createGeminiProvider({ ...base, apiKey });
    case 'perplexity':
      return createPerplexityProvider({ ...base, apiKey });
    case 'searchgpt':
      return createSearchGPTProvider({
        ...base,
        apiKey,
        search: createSerperSearchClient({ apiKey: secondKey, fetch: options.fetch }),
      });
  }
}

/**
 * Build the registry for the selected providers.
 *
 * Every credential is checked before any provider is constructed, so a
 * missing key fails the run before any network call.
 *
 * @throws {ConfigError} MISSING_API_KEY
 */
export function createProviderRegistry(options: ProviderRegistryOptions): ProviderRegistry {
  const keys = options.providers.map((provider) => requireApiKeys(provider, options.env));

  return new Map(
    options.providers.map((provider, index): [ProviderName, CompletionProvider] => [
      provider,
      createProvider(provider, keys[index], options),
    ])
  );
}

/**
 * @throws {ConfigError} UNKNOWN_PROVIDER when the registry has no such provider
 */
export function getProvider(registry: ProviderRegistry, name: ProviderName): CompletionProvider {
  const provider = registry.get(name);
  if (!provider) {
    throw new ConfigError(`Provider '${name}' is not registered`, {
      code: ConfigErrorCode.UNKNOWN_PROVIDER,
      context: { provider: name, registered: [...registry.keys()] },
    });
  }
  return provider;
}
