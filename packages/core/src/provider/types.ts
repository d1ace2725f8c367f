import type { TokenUsage } from '../pricing';

export const PROVIDER_NAMES = ['claude', 'openai', 'gemini', 'perplexity', 'searchgpt'] as const;

/** Closed set of providers the comparison can call. */
export type ProviderName = (typeof PROVIDER_NAMES)[number];

/** Providers compared by default. */
export const STANDARD_PROVIDERS: readonly ProviderName[] = ['claude', 'openai', 'gemini'];

/** Providers with live web access, selected by realtime mode. */
export const REALTIME_PROVIDERS: readonly ProviderName[] = ['perplexity', 'searchgpt'];

export const PROVIDER_LABELS: Readonly<Record<ProviderName, string>> = {
  claude: 'Claude',
  openai: 'OpenAI',
  gemini: 'Gemini',
  perplexity: 'Perplexity',
  searchgpt: 'SearchGPT',
};

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/** Parameters of a single completion call. */
export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionResponse {
  text: string;
  /** Undefined when the provider did not report token counts */
  usage?: TokenUsage;
}

/**
 * The one capability the comparison needs from a provider.
 *
 * Implementations reject with a classified `ProviderError`
 * (transient or permanent), never with a raw SDK error.
 */
export interface CompletionProvider {
  readonly name: ProviderName;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
}

/** Lookup table from provider name to implementation, built once at startup. */
export type ProviderRegistry = ReadonlyMap<ProviderName, CompletionProvider>;
