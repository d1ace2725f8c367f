/**
 * Fan-out of one prompt to every selected provider.
 *
 * @module comparison/aggregator
 */

import { ConfigError, ConfigErrorCode } from '../errors';
import type { Invoker } from '../invoker/invoker';
import { createInvocationRequest, type InvocationRequest, type InvocationResult } from '../invoker/types';
import type { ProviderName } from '../provider/types';
import type { ResolvedTier } from '../tiers/resolver';
import { createSemaphore } from '../utils/semaphore';

export interface ComparisonPlan {
  tier: ResolvedTier;
  /** Providers in selection order; results follow this order */
  providers: readonly ProviderName[];
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
  /** Repeats per provider */
  numCalls: number;
  /** Maximum invocations in flight at once */
  concurrency: number;
}

export interface RunComparisonOptions extends ComparisonPlan {
  invoker: Pick<Invoker, 'invoke'>;
  signal?: AbortSignal;
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`, {
      code: ConfigErrorCode.INVALID_CONFIG,
      context: { [name]: value },
    });
  }
}

/**
 * One request per provider per repeat, grouped by provider in selection
 * order and then by repeat index.
 *
 * @throws {ConfigError} MISSING_MODEL when the tier has no model for a selected provider
 */
export function planInvocations(plan: ComparisonPlan): InvocationRequest[] {
  assertPositiveInteger(plan.numCalls, 'numCalls');

  return plan.providers.flatMap((provider) => {
    const resolved = plan.tier.models.get(provider);
    if (!resolved) {
      throw new ConfigError(`Tier '${plan.tier.name}' defines no model for provider '${provider}'`, {
        code: ConfigErrorCode.MISSING_MODEL,
        context: { tier: plan.tier.name, provider },
      });
    }

    return Array.from({ length: plan.numCalls }, (_, repeatIndex) =>
      createInvocationRequest({
        provider,
        model: resolved.model,
        systemPrompt: plan.systemPrompt,
        userPrompt: plan.userPrompt,
        maxTokens: plan.maxTokens,
        temperature: plan.temperature,
        repeatIndex,
      })
    );
  });
}

/**
 * Run every planned invocation, at most `concurrency` at a time.
 *
 * Resolves once all invocations settled. Results keep the planned order
 * regardless of completion order; provider failures are error results, so
 * the array always has `providers.length × numCalls` entries.
 *
 * @example
 * ```typescript
 * const results = await runComparison({
 *   invoker,
 *   tier: resolveTier(config, 'economy'),
 *   providers: ['claude', 'openai', 'gemini'],
 *   systemPrompt: 'You are a helpful assistant.',
 *   userPrompt: 'Explain recursion.',
 *   maxTokens: 1024,
 *   temperature: 0.7,
 *   numCalls: 1,
 *   concurrency: 3,
 * });
 * ```
 */
export async function runComparison(options: RunComparisonOptions): Promise<InvocationResult[]> {
  assertPositiveInteger(options.concurrency, 'concurrency');

  const requests = planInvocations(options);
  const semaphore = createSemaphore(options.concurrency);

  return Promise.all(
    requests.map((request) => semaphore.run(() => options.invoker.invoke(request, options.signal)))
  );
}
