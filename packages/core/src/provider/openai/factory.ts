import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

import { BaseProvider, type BaseProviderOptions } from '../base-provider';

export interface OpenAIProviderConfig extends BaseProviderOptions {
  apiKey: string;
  baseURL?: string;
  organization?: string;
}

class OpenAIProvider extends BaseProvider {
  readonly name = 'openai' as const;
  private readonly openai: ReturnType<typeof createOpenAI>;

  constructor(config: OpenAIProviderConfig) {
    super(config);
    this.openai = createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      organization: config.organization,
    });
  }

  protected languageModel(modelId: string): LanguageModel {
    return this.openai(modelId);
  }
}

export function createOpenAIProvider(config: OpenAIProviderConfig): BaseProvider {
  return new OpenAIProvider(config);
}
