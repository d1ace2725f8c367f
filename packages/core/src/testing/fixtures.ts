import type {
    InvocationFailure,
    InvocationRequest,
    InvocationSuccess,
} from '../invoker/types';
import type { TokenUsage } from '../pricing';

export function createUsage(inputTokens: number, outputTokens: number): TokenUsage {
    return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
}

export function createTestRequest(overrides?: Partial<InvocationRequest>): InvocationRequest {
    return {
        provider: 'openai',
        model: 'gpt-4o-mini',
        systemPrompt: 'You are a helpful assistant.',
        userPrompt: 'What is the capital of France?',
        maxTokens: 1024,
        temperature: 0.7,
        repeatIndex: 0,
        ...overrides,
    };
}

/**
 * Successful result whose cost is derived from `usage` at the given prices.
 */
export function createSuccessResult(
    overrides: Partial<Omit<InvocationSuccess, 'status'>> & { price?: [number, number] } = {}
): InvocationSuccess {
    const { price, ...fields } = overrides;
    const result: InvocationSuccess = {
        status: 'success',
        provider: 'openai',
        model: 'gpt-4o-mini',
        repeatIndex: 0,
        latencyMs: 100,
        attempts: 1,
        retries: 0,
        text: 'Paris.',
        ...fields,
    };

    if (price && result.usage && !('cost' in fields)) {
        const inputCost = (result.usage.inputTokens / 1_000_000) * price[0];
        const outputCost = (result.usage.outputTokens / 1_000_000) * price[1];
        result.cost = { total: inputCost + outputCost, inputCost, outputCost };
    }
    return result;
}

export function createFailureResult(
    overrides: Partial<Omit<InvocationFailure, 'status'>> = {}
): InvocationFailure {
    return {
        status: 'error',
        provider: 'openai',
        model: 'gpt-4o-mini',
        repeatIndex: 0,
        latencyMs: 100,
        attempts: 1,
        retries: 0,
        error: { message: 'Authentication failed', kind: 'permanent', code: 'AUTH_ERROR' },
        ...overrides,
    };
}
