import { describe, expect, it } from 'vitest';

import { ConfigError, ConfigErrorCode } from '../errors';
import { DEFAULT_PRICE_TABLE } from '../pricing';
import { AuthenticationError, OverloadedError, RateLimitError } from '../provider/errors';
import type { ProviderRegistry } from '../provider/types';
import { createTestRequest, createUsage } from '../testing/fixtures';
import { createRecordingLogger } from '../testing/logger';
import { createScriptedProvider, type ScriptStep } from '../testing/scripted-provider';
import { createRecordingSleeper } from '../testing/sleeper';
import { Invoker, type InvokerOptions } from './invoker';

function setup(steps: ScriptStep[], options: Partial<InvokerOptions> = {}) {
  const provider = createScriptedProvider('openai', steps);
  const registry: ProviderRegistry = new Map([['openai', provider]]);
  const sleeper = createRecordingSleeper();
  const invoker = new Invoker({
    registry,
    pricing: DEFAULT_PRICE_TABLE,
    sleeper: sleeper.sleep,
    ...options,
  });
  return { provider, sleeper, invoker };
}

describe('Invoker', () => {
  it('should return text, usage and cost on success', async () => {
    const { invoker, provider } = setup([{ text: 'Paris.', usage: createUsage(1000, 500) }]);

    const result = await invoker.invoke(createTestRequest());

    expect(result).toMatchObject({
      status: 'success',
      provider: 'openai',
      model: 'gpt-4o-mini',
      repeatIndex: 0,
      text: 'Paris.',
      usage: { inputTokens: 1000, outputTokens: 500, totalTokens: 1500 },
      attempts: 1,
      retries: 0,
    });
    expect(result.status === 'success' && result.cost?.total).toBeCloseTo(0.00045, 10);
    expect(provider.calls).toEqual([
      {
        model: 'gpt-4o-mini',
        systemPrompt: 'You are a helpful assistant.',
        userPrompt: 'What is the capital of France?',
        maxTokens: 1024,
        temperature: 0.7,
      },
    ]);
  });

  it('should retry three transient failures and report retry count 3', async () => {
    const { invoker, sleeper } = setup([
      new RateLimitError(),
      new OverloadedError(529),
      new RateLimitError(),
      { text: 'Paris.', usage: createUsage(10, 2) },
    ]);

    const result = await invoker.invoke(createTestRequest());

    expect(result).toMatchObject({ status: 'success', attempts: 4, retries: 3 });
    expect(sleeper.delays).toEqual([1000, 2000, 4000]);
  });

  it('should include backoff time in latency', async () => {
    let clock = 0;
    const provider = createScriptedProvider('openai', [
      new RateLimitError(),
      { text: 'Paris.', usage: createUsage(10, 2) },
    ]);
    const invoker = new Invoker({
      registry: new Map([['openai', provider]]),
      pricing: DEFAULT_PRICE_TABLE,
      sleeper: async (ms) => {
        clock += ms;
      },
      now: () => clock,
    });

    const result = await invoker.invoke(createTestRequest());

    expect(result.latencyMs).toBe(1000);
  });

  it('should return an error result after one attempt on a permanent failure', async () => {
    const { invoker, provider, sleeper } = setup([new AuthenticationError('invalid key')]);

    const result = await invoker.invoke(createTestRequest());

    expect(result).toMatchObject({
      status: 'error',
      attempts: 1,
      retries: 0,
      error: {
        message: 'Authentication failed: invalid key',
        kind: 'permanent',
        code: 'AUTH_ERROR',
      },
    });
    expect(provider.calls).toHaveLength(1);
    expect(sleeper.delays).toEqual([]);
  });

  it('should return the last transient error once retries are exhausted', async () => {
    const { invoker, provider } = setup([new OverloadedError(503)]);

    const result = await invoker.invoke(createTestRequest());

    expect(result).toMatchObject({
      status: 'error',
      attempts: 4,
      retries: 3,
      error: { kind: 'transient', code: 'OVERLOADED' },
    });
    expect(provider.calls).toHaveLength(4);
  });

  it('should leave usage and cost undefined when tokens are not reported', async () => {
    const { invoker } = setup([{ text: 'Paris.' }]);

    const result = await invoker.invoke(createTestRequest());

    expect(result.status).toBe('success');
    expect(result.status === 'success' && result.usage).toBeUndefined();
    expect(result.status === 'success' && result.cost).toBeUndefined();
  });

  it('should end as cancelled when aborted during backoff', async () => {
    const controller = new AbortController();
    const provider = createScriptedProvider('openai', [new RateLimitError()]);
    const sleeper = createRecordingSleeper(() => controller.abort());
    const invoker = new Invoker({
      registry: new Map([['openai', provider]]),
      pricing: DEFAULT_PRICE_TABLE,
      sleeper: sleeper.sleep,
    });

    const result = await invoker.invoke(createTestRequest(), controller.signal);

    expect(result).toMatchObject({
      status: 'error',
      attempts: 1,
      error: { kind: 'cancelled', code: 'CANCELLED', message: 'Request cancelled' },
    });
    expect(provider.calls).toHaveLength(1);
  });

  it('should reject an unpriced model before calling the provider', async () => {
    const { invoker, provider } = setup([{ text: 'unused' }]);

    await expect(invoker.invoke(createTestRequest({ model: 'gpt-unpriced' }))).rejects.toMatchObject({
      code: ConfigErrorCode.MISSING_PRICE,
    });
    expect(provider.calls).toHaveLength(0);
  });

  it('should reject a provider missing from the registry', async () => {
    const { invoker } = setup([{ text: 'unused' }]);

    await expect(invoker.invoke(createTestRequest({ provider: 'claude' }))).rejects.toBeInstanceOf(
      ConfigError
    );
  });

  it('should report start, retry and end events', async () => {
    const recording = createRecordingLogger();
    const { invoker } = setup([new RateLimitError(), { text: 'ok' }], {
      logger: recording.logger,
    });

    await invoker.invoke(createTestRequest({ repeatIndex: 2 }));

    expect(recording.types()).toEqual(['invocation_start', 'invocation_retry', 'invocation_end']);
    expect(recording.events[1]).toMatchObject({
      provider: 'openai',
      repeatIndex: 2,
      attempt: 1,
      delayMs: 1000,
    });
  });
});
