import type { FailureKind } from '../errors';
import type { CostResult, TokenUsage } from '../pricing';
import type { ProviderName } from '../provider/types';

/**
 * One request to one provider. Frozen after creation.
 */
export interface InvocationRequest {
  readonly provider: ProviderName;
  readonly model: string;
  readonly systemPrompt: string;
  readonly userPrompt: string;
  readonly maxTokens: number;
  readonly temperature: number;
  /** 0-based repeat index within the run */
  readonly repeatIndex: number;
}

/** User-facing description of a failed invocation. */
export interface InvocationError {
  message: string;
  kind: FailureKind;
  code: string;
}

interface InvocationResultBase {
  provider: ProviderName;
  model: string;
  repeatIndex: number;
  /** Wall-clock time from the first attempt to completion, including backoff */
  latencyMs: number;
  attempts: number;
  retries: number;
}

export interface InvocationSuccess extends InvocationResultBase {
  status: 'success';
  text: string;
  /** Undefined when the provider reported no token counts */
  usage?: TokenUsage;
  /** Undefined (unavailable, not zero) when usage is undefined */
  cost?: CostResult;
}

export interface InvocationFailure extends InvocationResultBase {
  status: 'error';
  error: InvocationError;
}

export type InvocationResult = InvocationSuccess | InvocationFailure;

export function isSuccess(result: InvocationResult): result is InvocationSuccess {
  return result.status === 'success';
}

export function createInvocationRequest(fields: InvocationRequest): InvocationRequest {
  return Object.freeze({ ...fields });
}
