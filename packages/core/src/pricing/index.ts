/**
 * Pricing module for cost calculation.
 *
 * @example
 * ```typescript
 * import { calculateCost, getModelPricing, DEFAULT_PRICE_TABLE } from '@polyprompt/core';
 *
 * const pricing = getModelPricing(DEFAULT_PRICE_TABLE, 'gpt-4o-mini');
 * const cost = calculateCost({ inputTokens: 1000, outputTokens: 500, totalTokens: 1500 }, pricing);
 * ```
 *
 * @module pricing
 */

export type { ModelPricing, PriceTable, TokenUsage, CostResult } from './types';

export {
  getModelPricing,
  calculateCost,
  toTokenUsage,
  costPerThousandTokens,
} from './calculator';

export { DEFAULT_PRICE_TABLE } from './defaults';
