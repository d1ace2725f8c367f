import { describe, expect, it } from 'vitest';

import type { InvocationResult } from '../invoker/types';
import { createFailureResult, createSuccessResult, createUsage } from '../testing/fixtures';
import { buildComparisonReport, rankEfficiency, summarizeProvider, type BuildReportOptions } from './report';

const options: BuildReportOptions = {
  tier: 'economy',
  systemPrompt: 'You are a helpful assistant.',
  userPrompt: 'Explain recursion.',
  numCalls: 1,
  maxTokens: 1024,
  temperature: 0.7,
  startedAt: new Date('2025-01-01T10:00:00.000Z'),
  finishedAt: new Date('2025-01-01T10:00:02.500Z'),
};

const claude = createSuccessResult({
  provider: 'claude',
  model: 'claude-3-5-haiku-20241022',
  usage: createUsage(1000, 500),
  price: [0.8, 4.0],
});
const openai = createSuccessResult({
  provider: 'openai',
  model: 'gpt-4o-mini',
  usage: createUsage(1000, 500),
  price: [0.15, 0.6],
});
const geminiWithoutUsage = createSuccessResult({ provider: 'gemini', model: 'gemini-1.5-flash' });

describe('summarizeProvider', () => {
  it('should sum tokens and costs over successful results', () => {
    const results: InvocationResult[] = [
      openai,
      createSuccessResult({ repeatIndex: 1, usage: createUsage(2000, 1000), price: [0.15, 0.6] }),
      createFailureResult({ repeatIndex: 2 }),
    ];

    const summary = summarizeProvider('openai', results);

    expect(summary).toMatchObject({
      provider: 'openai',
      model: 'gpt-4o-mini',
      calls: 3,
      successes: 2,
      failures: 1,
      inputTokens: 3000,
      outputTokens: 1500,
      totalTokens: 4500,
      averageLatencyMs: 100,
    });
    expect(summary.totalCost).toBeCloseTo(0.00135, 12);
    expect(summary.averageCostPerCall).toBeCloseTo(0.000675, 12);
    expect(summary.costPer1kTokens).toBeCloseTo(0.0003, 12);
  });

  it('should leave rates undefined when no tokens were reported', () => {
    const summary = summarizeProvider('gemini', [geminiWithoutUsage]);

    expect(summary.totalTokens).toBe(0);
    expect(summary.totalCost).toBe(0);
    expect(summary.averageCostPerCall).toBeUndefined();
    expect(summary.costPer1kTokens).toBeUndefined();
  });
});

describe('rankEfficiency', () => {
  it('should pick the cheapest and most expensive rates', () => {
    const ranking = rankEfficiency([
      summarizeProvider('claude', [claude]),
      summarizeProvider('openai', [openai]),
      summarizeProvider('gemini', [geminiWithoutUsage]),
    ]);

    expect(ranking?.mostEfficient.provider).toBe('openai');
    expect(ranking?.mostEfficient.costPer1kTokens).toBeCloseTo(0.0003, 12);
    expect(ranking?.leastEfficient.provider).toBe('claude');
    expect(ranking?.leastEfficient.costPer1kTokens).toBeCloseTo(0.0028 / 1.5, 12);
    expect(ranking?.differencePercent).toBeCloseTo(522.2222, 3);
  });

  it('should resolve ties in favour of the earlier provider at both ends', () => {
    const cost = { total: 1, inputCost: 0.5, outputCost: 0.5 };
    const summaries = [
      summarizeProvider('gemini', [
        createSuccessResult({ provider: 'gemini', usage: createUsage(500, 500), cost }),
      ]),
      summarizeProvider('claude', [
        createSuccessResult({ provider: 'claude', usage: createUsage(500, 500), cost }),
      ]),
    ];

    const first = rankEfficiency(summaries);
    const second = rankEfficiency(summaries);

    expect(first).toEqual({
      mostEfficient: { provider: 'gemini', costPer1kTokens: 1 },
      leastEfficient: { provider: 'gemini', costPer1kTokens: 1 },
      differencePercent: 0,
    });
    expect(second).toEqual(first);
  });

  it('should return undefined when no provider reported tokens', () => {
    expect(rankEfficiency([summarizeProvider('gemini', [geminiWithoutUsage])])).toBeUndefined();
  });
});

describe('buildComparisonReport', () => {
  it('should total only the available costs and skip unmetered providers in the ranking', () => {
    const report = buildComparisonReport([claude, openai, geminiWithoutUsage], options);

    expect(report.totalCost).toBeCloseTo(0.0028 + 0.00045, 12);
    expect(report.grandTotalCost).toBe(report.totalCost);
    expect(report.summaries.map((s) => s.provider)).toEqual(['claude', 'openai', 'gemini']);
    expect(report.efficiency?.mostEfficient.provider).toBe('openai');
    expect(report.efficiency?.leastEfficient.provider).toBe('claude');
  });

  it('should total three repeats as the sum of their costs', () => {
    const results = [0, 1, 2].map((repeatIndex) =>
      createSuccessResult({
        repeatIndex,
        usage: createUsage(1000 * (repeatIndex + 1), 500),
        price: [0.15, 0.6],
      })
    );

    const report = buildComparisonReport(results, { ...options, numCalls: 3 });

    const sum = results.reduce((total, result) => total + (result.cost?.total ?? 0), 0);
    expect(report.results.map((r) => r.repeatIndex)).toEqual([0, 1, 2]);
    expect(report.totalCost).toBeCloseTo(sum, 15);
  });

  it('should record run metadata', () => {
    const report = buildComparisonReport([openai], options);

    expect(report.metadata).toEqual({
      tier: 'economy',
      providers: ['openai'],
      systemPrompt: 'You are a helpful assistant.',
      userPrompt: 'Explain recursion.',
      numCalls: 1,
      maxTokens: 1024,
      temperature: 0.7,
      startedAt: '2025-01-01T10:00:00.000Z',
      finishedAt: '2025-01-01T10:00:02.500Z',
      durationMs: 2500,
    });
  });

  it('should still build a report when every invocation failed', () => {
    const report = buildComparisonReport(
      [
        createFailureResult({ provider: 'claude' }),
        createFailureResult({ provider: 'openai' }),
      ],
      { ...options, notes: ['Synthesis skipped: no provider returned a successful response.'] }
    );

    expect(report.totalCost).toBe(0);
    expect(report.efficiency).toBeUndefined();
    expect(report.summaries.map((s) => [s.provider, s.failures])).toEqual([
      ['claude', 1],
      ['openai', 1],
    ]);
    expect(report.notes).toEqual([
      'Synthesis skipped: no provider returned a successful response.',
    ]);
  });

  it('should report synthesis cost separately and include it in the grand total', () => {
    const synthesisResult = createSuccessResult({
      provider: 'claude',
      model: 'claude-3-5-haiku-20241022',
      usage: createUsage(2000, 1000),
      price: [0.8, 4.0],
    });

    const report = buildComparisonReport([openai], {
      ...options,
      synthesis: { status: 'completed', result: synthesisResult },
    });

    expect(report.totalCost).toBeCloseTo(0.00045, 12);
    expect(report.synthesisCost).toBeCloseTo(0.0056, 12);
    expect(report.grandTotalCost).toBeCloseTo(0.00605, 12);
  });
});
