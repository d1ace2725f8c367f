import { describe, expect, it } from 'vitest';
import { APICallError } from 'ai';
import { MockLanguageModelV3 } from 'ai/test';

import { ProviderErrorCode } from '../errors';
import { mock } from '../testing/mock';
import { MockProvider } from '../testing/mock-provider';
import {
  AuthenticationError,
  CancelledError,
  ContentPolicyError,
  RateLimitError,
  TimeoutError,
} from './errors';
import type { CompletionRequest } from './types';

const request: CompletionRequest = {
  model: 'gpt-4o-mini',
  systemPrompt: 'You are terse.',
  userPrompt: 'Name a prime number.',
  maxTokens: 64,
  temperature: 0.2,
};

describe('BaseProvider.complete', () => {
  it('should return text and token usage', async () => {
    const provider = new MockProvider({ model: mock.text('7', { usage: mock.usage(12, 1) }) });

    const response = await provider.complete(request);

    expect(response).toEqual({
      text: '7',
      usage: { inputTokens: 12, outputTokens: 1, totalTokens: 13 },
    });
    expect(provider.getCalls().map((call) => call.modelId)).toEqual(['gpt-4o-mini']);
  });

  it('should leave usage undefined when the provider reports no tokens', async () => {
    const provider = new MockProvider({ model: mock.text('7', { usage: mock.noUsage() }) });

    const response = await provider.complete(request);

    expect(response.usage).toBeUndefined();
  });

  it('should forward prompts and sampling settings to the model', async () => {
    const model = mock.text('7');
    const provider = new MockProvider({ model });

    await provider.complete(request);

    expect(model.doGenerateCalls).toHaveLength(1);
    const call = model.doGenerateCalls[0];
    expect(call.maxOutputTokens).toBe(64);
    expect(call.temperature).toBe(0.2);
    expect(call.prompt[0]).toEqual({ role: 'system', content: 'You are terse.' });
  });

  it('should classify HTTP errors', async () => {
    const provider = new MockProvider({
      name: 'claude',
      model: mock.error(
        new APICallError({
          message: 'Too Many Requests',
          url: 'https://api.example.test',
          requestBodyValues: {},
          statusCode: 429,
          responseHeaders: { 'retry-after': '3' },
        })
      ),
    });

    const error = await provider.complete(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({
      retryAfter: 3,
      context: { provider: 'claude', model: 'gpt-4o-mini', statusCode: 429 },
    });
  });

  it('should not retry inside the SDK', async () => {
    const model = mock.error(
      new APICallError({
        message: 'Unauthorized',
        url: 'https://api.example.test',
        requestBodyValues: {},
        statusCode: 401,
      })
    );
    const provider = new MockProvider({ model });

    await expect(provider.complete(request)).rejects.toBeInstanceOf(AuthenticationError);
    expect(model.doGenerateCalls).toHaveLength(1);
  });

  it('should reject a content-filtered response as a policy error', async () => {
    const provider = new MockProvider({
      model: mock.text('', { finishReason: { unified: 'content-filter', raw: 'SAFETY' } }),
    });

    await expect(provider.complete(request)).rejects.toBeInstanceOf(ContentPolicyError);
  });

  it('should report a caller abort as cancelled', async () => {
    const controller = new AbortController();
    const model = new MockLanguageModelV3({
      doGenerate: async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      },
    });
    const provider = new MockProvider({ model });

    const error = await provider.complete(request, controller.signal).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ code: ProviderErrorCode.CANCELLED, kind: 'cancelled' });
  });

  it('should report an expired request timeout as a transient timeout', async () => {
    const model = new MockLanguageModelV3({
      doGenerate: (options) =>
        new Promise((_resolve, reject) => {
          options.abortSignal?.addEventListener('abort', () => reject(new Error('aborted')), {
            once: true,
          });
        }),
    });
    const provider = new MockProvider({ model, requestTimeoutMs: 20 });

    const error = await provider.complete(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'Request timed out after 20ms', isRetryable: true });
  });
});
