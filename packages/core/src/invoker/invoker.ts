import type { ProviderError } from '../errors';
import type { Logger } from '../observability/logger';
import { noopLogger } from '../observability/logger';
import { calculateCost, getModelPricing, type PriceTable } from '../pricing';
import { getProvider } from '../provider/registry';
import type { CompletionRequest, ProviderRegistry } from '../provider/types';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../retry/policy';
import { runWithRetry } from '../retry/run';
import { timerSleeper, type Sleeper } from '../retry/sleeper';
import type { InvocationError, InvocationRequest, InvocationResult } from './types';

export interface InvokerOptions {
  registry: ProviderRegistry;
  pricing: PriceTable;
  retryPolicy?: RetryPolicy;
  sleeper?: Sleeper;
  logger?: Logger;
  /** Millisecond clock used for latency; injectable for tests */
  now?: () => number;
}

function toInvocationError(error: ProviderError): InvocationError {
  return { message: error.message, kind: error.kind, code: error.code };
}

/**
 * Performs one request against one provider and normalizes the outcome.
 *
 * Provider failures never reject: they become error results after the retry
 * policy has run its course. A `ConfigError` (unregistered provider, unpriced
 * model) does reject, before any network call.
 *
 * @example
 * ```typescript
 * const invoker = new Invoker({ registry, pricing: config.pricing });
 * const result = await invoker.invoke(request, controller.signal);
 * if (result.status === 'success') {
 *   console.log(result.text, result.cost?.total);
 * }
 * ```
 */
export class Invoker {
  private readonly registry: ProviderRegistry;
  private readonly pricing: PriceTable;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleeper: Sleeper;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: InvokerOptions) {
    this.registry = options.registry;
    this.pricing = options.pricing;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleeper = options.sleeper ?? timerSleeper;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  async invoke(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResult> {
    const provider = getProvider(this.registry, request.provider);
    const modelPricing = getModelPricing(this.pricing, request.model);
    const { provider: name, model, repeatIndex } = request;

    const completion: CompletionRequest = {
      model,
      systemPrompt: request.systemPrompt,
      userPrompt: request.userPrompt,
      maxTokens: request.maxTokens,
      temperature: request.temperature,
    };

    const startTime = this.now();
    this.logger.onInvocationStart?.({
      type: 'invocation_start',
      provider: name,
      model,
      repeatIndex,
      timestamp: startTime,
    });

    const outcome = await runWithRetry(
      (_attempt, attemptSignal) => provider.complete(completion, attemptSignal),
      {
        policy: this.retryPolicy,
        sleeper: this.sleeper,
        signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.onRetry?.({
            type: 'invocation_retry',
            provider: name,
            model,
            repeatIndex,
            attempt,
            delayMs,
            error,
            timestamp: this.now(),
          });
        },
      }
    );

    const endTime = this.now();
    const base = {
      provider: name,
      model,
      repeatIndex,
      latencyMs: endTime - startTime,
      attempts: outcome.attempts,
      retries: Math.max(outcome.attempts - 1, 0),
    };

    const result: InvocationResult =
      outcome.type === 'succeeded'
        ? {
            ...base,
            status: 'success',
            text: outcome.value.text,
            usage: outcome.value.usage,
            cost: calculateCost(outcome.value.usage, modelPricing),
          }
        : { ...base, status: 'error', error: toInvocationError(outcome.error) };

    this.logger.onInvocationEnd?.({ type: 'invocation_end', result, timestamp: endTime });
    return result;
  }
}
