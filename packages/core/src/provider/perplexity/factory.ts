import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

import { BaseProvider, type BaseProviderOptions } from '../base-provider';

export const PERPLEXITY_BASE_URL = 'https://api.perplexity.ai';

export interface PerplexityProviderConfig extends BaseProviderOptions {
  apiKey: string;
  baseURL?: string;
}

/**
 * Perplexity speaks the OpenAI chat-completions protocol, so it is served
 * by the OpenAI SDK pointed at Perplexity's endpoint.
 */
class PerplexityProvider extends BaseProvider {
  readonly name = 'perplexity' as const;
  private readonly client: ReturnType<typeof createOpenAI>;

  constructor(config: PerplexityProviderConfig) {
    super(config);
    this.client = createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL ?? PERPLEXITY_BASE_URL,
      name: 'perplexity',
    });
  }

  protected languageModel(modelId: string): LanguageModel {
    // the responses API is OpenAI-only
    return this.client.chat(modelId);
  }
}

export function createPerplexityProvider(config: PerplexityProviderConfig): BaseProvider {
  return new PerplexityProvider(config);
}
