/**
 * Pricing types for cost calculation.
 *
 * @module pricing/types
 */

/**
 * Pricing for a specific model in USD per million tokens.
 *
 * @example
 * ```typescript
 * const gpt4oMini: ModelPricing = {
 *   inputPricePerMillion: 0.15,
 *   outputPricePerMillion: 0.6,
 * };
 * ```
 */
export interface ModelPricing {
  inputPricePerMillion: number;
  outputPricePerMillion: number;
}

/**
 * Model identifier to price pair. Immutable once loaded.
 */
export type PriceTable = Readonly<Record<string, ModelPricing>>;

/**
 * Token counts reported by a provider for one call.
 * Only constructed when both input and output counts were reported.
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of cost calculation, in USD.
 */
export interface CostResult {
  total: number;
  inputCost: number;
  outputCost: number;
}
