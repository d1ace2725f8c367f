/**
 * Built-in price table (USD per million tokens).
 *
 * Covers every model referenced by the built-in tiers. A config file can
 * override any entry or add new ones.
 *
 * @module pricing/defaults
 */

import type { PriceTable } from './types';

export const DEFAULT_PRICE_TABLE: PriceTable = {
  // Anthropic
  'claude-3-5-haiku-20241022': { inputPricePerMillion: 0.8, outputPricePerMillion: 4.0 },
  'claude-3-5-sonnet-20241022': { inputPricePerMillion: 3.0, outputPricePerMillion: 15.0 },
  'claude-sonnet-4-20250514': { inputPricePerMillion: 3.0, outputPricePerMillion: 15.0 },

  // OpenAI (also serves searchgpt)
  'gpt-4o-mini': { inputPricePerMillion: 0.15, outputPricePerMillion: 0.6 },
  'gpt-4o': { inputPricePerMillion: 2.5, outputPricePerMillion: 10.0 },
  'gpt-4': { inputPricePerMillion: 30.0, outputPricePerMillion: 60.0 },

  // Google
  'gemini-1.5-flash': { inputPricePerMillion: 0.075, outputPricePerMillion: 0.3 },
  'gemini-1.5-pro': { inputPricePerMillion: 1.25, outputPricePerMillion: 5.0 },
  'gemini-2.5-flash': { inputPricePerMillion: 0.3, outputPricePerMillion: 2.5 },

  // Perplexity
  sonar: { inputPricePerMillion: 1.0, outputPricePerMillion: 1.0 },
  'sonar-pro': { inputPricePerMillion: 3.0, outputPricePerMillion: 15.0 },
};
