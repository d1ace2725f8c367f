import { createAnthropic } from '@ai-sdk/anthropic';
import type { LanguageModel } from 'ai';

import { BaseProvider, type BaseProviderOptions } from '../base-provider';

export interface ClaudeProviderConfig extends BaseProviderOptions {
  apiKey: string;
  baseURL?: string;
}

class ClaudeProvider extends BaseProvider {
  readonly name = 'claude' as const;
  private readonly anthropic: ReturnType<typeof createAnthropic>;

  constructor(config: ClaudeProviderConfig) {
    super(config);
    this.anthropic = createAnthropic({ apiKey: config.apiKey, baseURL: config.baseURL });
  }

  protected languageModel(modelId: string): LanguageModel {
    return this.anthropic(modelId);
  }
}

export function createClaudeProvider(config: ClaudeProviderConfig): BaseProvider {
  return new ClaudeProvider(config);
}
