import type { InvocationResult } from '../invoker/types';
import type { ProviderName } from '../provider/types';
import type { SynthesisOutcome } from '../synthesis/types';

/** Per-provider aggregate over one run. */
export interface ProviderSummary {
  provider: ProviderName;
  model: string;
  calls: number;
  successes: number;
  failures: number;
  /** Sums over successful results that reported tokens */
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  /** Sum of available costs of successful results */
  totalCost: number;
  /** totalCost over the successful results with a cost; undefined when there are none */
  averageCostPerCall?: number;
  /** Undefined when no tokens were reported; such providers are not ranked */
  costPer1kTokens?: number;
  averageLatencyMs: number;
}

export interface EfficiencyEntry {
  provider: ProviderName;
  costPer1kTokens: number;
}

export interface EfficiencyRanking {
  mostEfficient: EfficiencyEntry;
  leastEfficient: EfficiencyEntry;
  /** How much more the least efficient provider costs, relative to the most efficient */
  differencePercent?: number;
}

export interface RunMetadata {
  tier: string;
  providers: ProviderName[];
  systemPrompt: string;
  userPrompt: string;
  numCalls: number;
  maxTokens: number;
  temperature: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

/**
 * Everything one run produced. Built once, read-only afterwards.
 */
export interface ComparisonReport {
  metadata: RunMetadata;
  results: InvocationResult[];
  summaries: ProviderSummary[];
  /** Comparison results only; excludes synthesis */
  totalCost: number;
  synthesisCost?: number;
  /** totalCost plus the available synthesis cost */
  grandTotalCost: number;
  efficiency?: EfficiencyRanking;
  synthesis?: SynthesisOutcome;
  notes: string[];
}
