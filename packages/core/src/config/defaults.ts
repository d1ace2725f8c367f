import { DEFAULT_PRICE_TABLE } from '../pricing/defaults';
import type { BuiltInTierName, CompareConfig, RunDefaults, TierDefinition } from './types';

export const DEFAULT_TIERS: Readonly<Record<BuiltInTierName, TierDefinition>> = {
  economy: {
    description: 'Fast, low-cost models for quick comparisons',
    models: {
      claude: 'claude-3-5-haiku-20241022',
      openai: 'gpt-4o-mini',
      gemini: 'gemini-1.5-flash',
      perplexity: 'sonar',
      searchgpt: 'gpt-4o-mini',
    },
    synthesis: { provider: 'claude', model: 'claude-3-5-haiku-20241022' },
  },
  mid: {
    description: 'Low-cost comparison models with a stronger synthesis model',
    models: {
      claude: 'claude-3-5-haiku-20241022',
      openai: 'gpt-4o-mini',
      gemini: 'gemini-1.5-flash',
      perplexity: 'sonar',
      searchgpt: 'gpt-4o-mini',
    },
    synthesis: { provider: 'claude', model: 'claude-3-5-sonnet-20241022' },
  },
  luxury: {
    description: 'Flagship models for the highest quality answers',
    models: {
      claude: 'claude-3-5-sonnet-20241022',
      openai: 'gpt-4',
      gemini: 'gemini-1.5-pro',
      perplexity: 'sonar-pro',
      searchgpt: 'gpt-4o',
    },
    synthesis: { provider: 'claude', model: 'claude-3-5-sonnet-20241022' },
  },
};

export const DEFAULT_SYSTEM_PROMPTS: Readonly<Record<string, string>> = {
  default: 'You are a helpful assistant.',
  concise: 'You are a helpful assistant. Answer in three sentences or fewer.',
  expert:
    'You are a domain expert. Give a precise, technically accurate answer and state any assumptions you make.',
  tutor:
    'You are a patient tutor. Explain the answer step by step for someone new to the topic.',
  critic:
    'You are a careful reviewer. Point out weaknesses, risks and missing considerations in the question or its premise before answering.',
};

export const DEFAULT_RUN_DEFAULTS: RunDefaults = {
  tier: 'economy',
  maxTokens: 1024,
  temperature: 0.7,
  numCalls: 1,
  concurrency: 3,
  requestTimeoutMs: 60_000,
};

export const DEFAULT_COMPARE_CONFIG: CompareConfig = {
  tiers: DEFAULT_TIERS,
  pricing: DEFAULT_PRICE_TABLE,
  systemPrompts: DEFAULT_SYSTEM_PROMPTS,
  defaults: DEFAULT_RUN_DEFAULTS,
};
