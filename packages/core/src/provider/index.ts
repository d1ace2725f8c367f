export {
  PROVIDER_NAMES,
  STANDARD_PROVIDERS,
  REALTIME_PROVIDERS,
  PROVIDER_LABELS,
  isProviderName,
  type ProviderName,
  type CompletionRequest,
  type CompletionResponse,
  type CompletionProvider,
  type ProviderRegistry,
} from './types';

export { BaseProvider, DEFAULT_REQUEST_TIMEOUT_MS, type BaseProviderOptions } from './base-provider';

export { createClaudeProvider, type ClaudeProviderConfig } from './anthropic';
export { createOpenAIProvider, type OpenAIProviderConfig } from './openai';
export { createGeminiProvider, type GeminiProviderConfig } from './google';
export {
  createPerplexityProvider,
  PERPLEXITY_BASE_URL,
  type PerplexityProviderConfig,
} from './perplexity';
export {
  createSearchGPTProvider,
  createSerperSearchClient,
  buildSearchPrompt,
  SERPER_ENDPOINT,
  type SearchGPTProviderConfig,
  type SerperSearchConfig,
  type WebSearchClient,
  type WebSearchResult,
} from './searchgpt';

export {
  createProviderRegistry,
  getProvider,
  requireApiKeys,
  PROVIDER_ENV_KEYS,
  type Env,
  type ProviderRegistryOptions,
} from './registry';

export {
  RateLimitError,
  OverloadedError,
  TimeoutError,
  AuthenticationError,
  InvalidRequestError,
  ContentPolicyError,
  CancelledError,
  classifyProviderError,
  type RateLimitErrorContext,
  type OverloadedErrorContext,
  type TimeoutErrorContext,
  type RequestErrorContext,
} from './errors';
