/**
 * Derives summaries, totals and the efficiency ranking from invocation results.
 *
 * @module comparison/report
 */

import { isSuccess, type InvocationResult } from '../invoker/types';
import { costPerThousandTokens } from '../pricing';
import type { ProviderName } from '../provider/types';
import type { SynthesisOutcome } from '../synthesis/types';
import type {
  ComparisonReport,
  EfficiencyEntry,
  EfficiencyRanking,
  ProviderSummary,
} from './types';

export interface BuildReportOptions {
  tier: string;
  systemPrompt: string;
  userPrompt: string;
  numCalls: number;
  maxTokens: number;
  temperature: number;
  startedAt: Date;
  finishedAt: Date;
  synthesis?: SynthesisOutcome;
  notes?: readonly string[];
}

function groupByProvider(results: readonly InvocationResult[]): Map<ProviderName, InvocationResult[]> {
  const groups = new Map<ProviderName, InvocationResult[]>();
  for (const result of results) {
    const group = groups.get(result.provider);
    if (group) {
      group.push(result);
    } else {
      groups.set(result.provider, [result]);
    }
  }
  return groups;
}

export function summarizeProvider(
  provider: ProviderName,
  results: readonly InvocationResult[]
): ProviderSummary {
  const successes = results.filter(isSuccess);
  const metered = successes.filter((result) => result.usage !== undefined);
  const costed = successes.flatMap((result) => (result.cost ? [result.cost.total] : []));

  let inputTokens = 0;
  let outputTokens = 0;
  let totalTokens = 0;
  for (const { usage } of metered) {
    if (usage) {
      inputTokens += usage.inputTokens;
      outputTokens += usage.outputTokens;
      totalTokens += usage.totalTokens;
    }
  }

  const totalCost = costed.reduce((sum, cost) => sum + cost, 0);
  const latency = results.reduce((sum, result) => sum + result.latencyMs, 0);

  return {
    provider,
    model: results[0]?.model ?? '',
    calls: results.length,
    successes: successes.length,
    failures: results.length - successes.length,
    inputTokens,
    outputTokens,
    totalTokens,
    totalCost,
    averageCostPerCall: costed.length > 0 ? totalCost / costed.length : undefined,
    costPer1kTokens: costPerThousandTokens(totalCost, totalTokens),
    averageLatencyMs: results.length > 0 ? latency / results.length : 0,
  };
}

/**
 * Rank providers by cost per 1000 tokens.
 *
 * Providers without a rate are skipped. Ties keep the earlier provider for
 * both ends, so identical inputs always rank identically.
 */
export function rankEfficiency(summaries: readonly ProviderSummary[]): EfficiencyRanking | undefined {
  let most: EfficiencyEntry | undefined;
  let least: EfficiencyEntry | undefined;

  for (const { provider, costPer1kTokens } of summaries) {
    if (costPer1kTokens === undefined) {
      continue;
    }
    const entry = { provider, costPer1kTokens };
    if (!most || costPer1kTokens < most.costPer1kTokens) {
      most = entry;
    }
    if (!least || costPer1kTokens > least.costPer1kTokens) {
      least = entry;
    }
  }

  if (!most || !least) {
    return undefined;
  }

  return {
    mostEfficient: most,
    leastEfficient: least,
    differencePercent:
      most.costPer1kTokens > 0
        ? ((least.costPer1kTokens - most.costPer1kTokens) / most.costPer1kTokens) * 100
        : undefined,
  };
}

function synthesisCostOf(outcome: SynthesisOutcome | undefined): number | undefined {
  if (outcome?.status !== 'completed' || !isSuccess(outcome.result)) {
    return undefined;
  }
  return outcome.result.cost?.total;
}

/**
 * Build the report of one run. Never fails on provider errors: a run where
 * every invocation failed still yields a report, with empty totals.
 */
export function buildComparisonReport(
  results: readonly InvocationResult[],
  options: BuildReportOptions
): ComparisonReport {
  const groups = groupByProvider(results);
  const summaries = [...groups].map(([provider, group]) => summarizeProvider(provider, group));
  const totalCost = summaries.reduce((sum, summary) => sum + summary.totalCost, 0);
  const synthesisCost = synthesisCostOf(options.synthesis);

  return {
    metadata: {
      tier: options.tier,
      providers: [...groups.keys()],
      systemPrompt: options.systemPrompt,
      userPrompt: options.userPrompt,
      numCalls: options.numCalls,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
      startedAt: options.startedAt.toISOString(),
      finishedAt: options.finishedAt.toISOString(),
      durationMs: options.finishedAt.getTime() - options.startedAt.getTime(),
    },
    results: [...results],
    summaries,
    totalCost,
    synthesisCost,
    grandTotalCost: totalCost + (synthesisCost ?? 0),
    efficiency: rankEfficiency(summaries),
    synthesis: options.synthesis,
    notes: [...(options.notes ?? [])],
  };
}
