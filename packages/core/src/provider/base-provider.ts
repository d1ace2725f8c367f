import { generateText, type LanguageModel } from 'ai';

import { toError, type ProviderError } from '../errors';
import type { Logger } from '../observability/logger';
import { noopLogger } from '../observability/logger';
import { toTokenUsage } from '../pricing';
import { combineSignals } from '../utils/signals';
import { CancelledError, ContentPolicyError, TimeoutError, classifyProviderError } from './errors';
import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  ProviderName,
} from './types';

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export interface BaseProviderOptions {
  /** Per-attempt timeout; expiry surfaces as a transient TimeoutError */
  requestTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Abstract base class for providers backed by an AI SDK language model.
 *
 * Runs one `generateText` call per `complete()`, with the SDK's own retries
 * disabled so the invoker owns the retry policy. Every failure leaves as a
 * classified `ProviderError`.
 */
export abstract class BaseProvider implements CompletionProvider {
  abstract readonly name: ProviderName;

  protected readonly requestTimeoutMs: number;
  protected readonly logger: Logger;

  constructor(options: BaseProviderOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? noopLogger;
  }

  /** Resolve a model identifier to an AI SDK language model. */
  protected abstract languageModel(modelId: string): LanguageModel;

  /**
   * Hook for providers that rewrite the user prompt before sending it
   * (search-augmented providers). Must not reject.
   */
  protected async prepareUserPrompt(request: CompletionRequest, _signal: AbortSignal): Promise<string> {
    return request.userPrompt;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const timeoutSignal = AbortSignal.timeout(this.requestTimeoutMs);
    const combined = signal ? combineSignals(signal, timeoutSignal) : undefined;
    const abortSignal = combined?.signal ?? timeoutSignal;

    try {
      const prompt = await this.prepareUserPrompt(request, abortSignal);

      const result = await generateText({
        model: this.languageModel(request.model),
        system: request.systemPrompt,
        prompt,
        maxOutputTokens: request.maxTokens,
        temperature: request.temperature,
        maxRetries: 0,
        abortSignal,
      }).catch((error: unknown) => {
        throw this.toProviderError(error, request, signal, timeoutSignal);
      });

      if (result.finishReason === 'content-filter') {
        throw new ContentPolicyError('response was withheld by the provider', {
          context: { provider: this.name, model: request.model },
        });
      }

      return { text: result.text, usage: toTokenUsage(result.usage) };
    } finally {
      combined?.dispose();
    }
  }

  private toProviderError(
    error: unknown,
    request: CompletionRequest,
    signal: AbortSignal | undefined,
    timeoutSignal: AbortSignal
  ): ProviderError {
    const context = { provider: this.name, model: request.model };

    if (signal?.aborted) {
      return new CancelledError({ cause: toError(error), context });
    }
    if (timeoutSignal.aborted) {
      return new TimeoutError(this.requestTimeoutMs, { cause: toError(error), context });
    }
    return classifyProviderError(error, context);
  }
}
