/**
 * Cost calculation functions.
 *
 * @module pricing/calculator
 *
 * NOTE: Cost calculations use standard JavaScript floating-point arithmetic.
 * Round only when presenting values, never before summing.
 */

import type { LanguageModelUsage } from 'ai';
import { ConfigError, ConfigErrorCode } from '../errors';
import type { CostResult, ModelPricing, PriceTable, TokenUsage } from './types';

const TOKENS_PER_MILLION = 1_000_000;

/**
 * Look up the price pair of a model.
 *
 * @throws {ConfigError} MISSING_PRICE when the table has no entry for the model
 */
export function getModelPricing(table: PriceTable, model: string): ModelPricing {
  if (!Object.hasOwn(table, model)) {
    throw new ConfigError(`No price entry for model '${model}'`, {
      code: ConfigErrorCode.MISSING_PRICE,
      context: { model, pricedModels: Object.keys(table) },
    });
  }
  return table[model];
}

function validateUsage(usage: TokenUsage): void {
  const { inputTokens, outputTokens } = usage;

  if (!Number.isFinite(inputTokens) || !Number.isFinite(outputTokens)) {
    throw new Error('Token counts must be finite numbers');
  }

  if (inputTokens < 0 || outputTokens < 0) {
    throw new Error('Token counts must be non-negative');
  }
}

/**
 * Calculate cost from token counts.
 *
 * Returns `undefined` when usage is unavailable: a provider that did not
 * report tokens has an unknown cost, not a zero one.
 *
 * @throws Error if token counts are negative or non-finite
 *
 * @example
 * ```typescript
 * const cost = calculateCost(
 *   { inputTokens: 1000, outputTokens: 500, totalTokens: 1500 },
 *   { inputPricePerMillion: 0.15, outputPricePerMillion: 0.6 }
 * );
 * console.log(cost?.total); // 0.00045
 * ```
 */
export function calculateCost(
  usage: TokenUsage | undefined,
  pricing: ModelPricing
): CostResult | undefined {
  if (!usage) {
    return undefined;
  }

  validateUsage(usage);

  const inputCost = (usage.inputTokens / TOKENS_PER_MILLION) * pricing.inputPricePerMillion;
  const outputCost = (usage.outputTokens / TOKENS_PER_MILLION) * pricing.outputPricePerMillion;

  return {
    total: inputCost + outputCost,
    inputCost,
    outputCost,
  };
}

/**
 * Convert AI SDK usage into TokenUsage.
 *
 * Returns `undefined` unless both input and output counts were reported.
 */
export function toTokenUsage(usage: LanguageModelUsage | undefined): TokenUsage | undefined {
  const inputTokens = usage?.inputTokens;
  const outputTokens = usage?.outputTokens;

  if (
    inputTokens === undefined ||
    outputTokens === undefined ||
    !Number.isFinite(inputTokens) ||
    !Number.isFinite(outputTokens)
  ) {
    return undefined;
  }

  return {
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
  };
}

/**
 * Cost per 1000 tokens, or `undefined` when no tokens were counted.
 */
export function costPerThousandTokens(cost: number, totalTokens: number): number | undefined {
  if (totalTokens <= 0) {
    return undefined;
  }
  return (cost / totalTokens) * 1000;
}
