import type { PriceTable } from '../pricing';
import type { ProviderName } from '../provider/types';

/** Built-in tier names. User configuration may add more. */
export type BuiltInTierName = 'economy' | 'mid' | 'luxury';

export interface SynthesisTarget {
  provider: ProviderName;
  model: string;
}

/**
 * A named bundle of provider-to-model mappings plus the model used to
 * combine the providers' answers.
 */
export interface TierDefinition {
  description: string;
  models: Partial<Record<ProviderName, string>>;
  synthesis: SynthesisTarget;
}

export interface RunDefaults {
  tier: string;
  maxTokens: number;
  temperature: number;
  numCalls: number;
  concurrency: number;
  requestTimeoutMs: number;
}

/**
 * Everything a comparison run reads from static configuration.
 * Built once at startup and passed by reference; never mutated.
 */
export interface CompareConfig {
  tiers: Readonly<Record<string, TierDefinition>>;
  pricing: PriceTable;
  systemPrompts: Readonly<Record<string, string>>;
  defaults: RunDefaults;
}
