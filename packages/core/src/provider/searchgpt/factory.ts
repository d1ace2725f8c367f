import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

import { toError } from '../../errors';
import { compileTemplate } from '../../prompt/template';
import { BaseProvider, type BaseProviderOptions } from '../base-provider';
import type { CompletionRequest } from '../types';
import type { WebSearchClient, WebSearchResult } from './web-search';

export interface SearchGPTProviderConfig extends BaseProviderOptions {
  /** OpenAI API key */
  apiKey: string;
  baseURL?: string;
  search: WebSearchClient;
}

const renderSearchPrompt = compileTemplate<{ results: WebSearchResult[]; question: string }>(
  `Recent web search results:

{{#each results}}
{{add @index 1}}. {{title}}
   {{snippet}}
   Source: {{link}}

{{/each}}
User Question: {{question}}

Please provide a comprehensive answer using the above search results and your knowledge. Include relevant sources when appropriate.`,
  'searchgpt-prompt'
);

/**
 * Builds the search-augmented user prompt. Without results the question is sent unchanged.
 */
export function buildSearchPrompt(question: string, results: WebSearchResult[]): string {
  return results.length === 0 ? question : renderSearchPrompt({ results, question });
}

/**
 * OpenAI chat model whose user prompt is enriched with live web search results.
 */
class SearchGPTProvider extends BaseProvider {
  readonly name = 'searchgpt' as const;
  private readonly openai: ReturnType<typeof createOpenAI>;
  private readonly searchClient: WebSearchClient;

  constructor(config: SearchGPTProviderConfig) {
    super(config);
    this.openai = createOpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    this.searchClient = config.search;
  }

  protected languageModel(modelId: string): LanguageModel {
    return this.openai.chat(modelId);
  }

  protected override async prepareUserPrompt(
    request: CompletionRequest,
    signal: AbortSignal
  ): Promise<string> {
    try {
      const results = await this.searchClient.search(request.userPrompt, signal);
      return buildSearchPrompt(request.userPrompt, results);
    } catch (error) {
      this.logger.log?.('warn', 'Web search failed; sending the prompt without search results', {
        provider: this.name,
        error: toError(error).message,
      });
      return request.userPrompt;
    }
  }
}

export function createSearchGPTProvider(config: SearchGPTProviderConfig): BaseProvider {
  return new SearchGPTProvider(config);
}
