import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';

import { BaseProvider, type BaseProviderOptions } from '../base-provider';

export interface GeminiProviderConfig extends BaseProviderOptions {
  apiKey: string;
  baseURL?: string;
}

class GeminiProvider extends BaseProvider {
  readonly name = 'gemini' as const;
  private readonly google: ReturnType<typeof createGoogleGenerativeAI>;

  constructor(config: GeminiProviderConfig) {
    super(config);
    this.google = createGoogleGenerativeAI({ apiKey: config.apiKey, baseURL: config.baseURL });
  }

  protected languageModel(modelId: string): LanguageModel {
    return this.google(modelId);
  }
}

export function createGeminiProvider(config: GeminiProviderConfig): BaseProvider {
  return new GeminiProvider(config);
}
