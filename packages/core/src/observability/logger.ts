import type { ProviderError } from '../errors';
import type { InvocationResult } from '../invoker/types';
import type { ProviderName } from '../provider/types';

/**
 * Logger interface for observability.
 * All methods are optional - implement only the events you care about.
 *
 * @example
 * ```typescript
 * const myLogger: Logger = {
 *   onRetry(event) {
 *     console.error(`${event.provider}: retry ${event.attempt} in ${event.delayMs}ms`);
 *   },
 *   onInvocationEnd(event) {
 *     console.error(`${event.result.provider}: ${event.result.latencyMs}ms`);
 *   },
 * };
 * ```
 */
export interface Logger {
  onInvocationStart?(event: InvocationStartEvent): void;
  onRetry?(event: InvocationRetryEvent): void;
  onInvocationEnd?(event: InvocationEndEvent): void;
  onSynthesisSkipped?(event: SynthesisSkippedEvent): void;
  log?(level: LogLevel, message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface InvocationStartEvent {
  type: 'invocation_start';
  provider: ProviderName;
  model: string;
  repeatIndex: number;
  timestamp: number;
}

/**
 * Event emitted before each backoff sleep.
 *
 * `attempt` is the attempt that just failed (1-based).
 */
export interface InvocationRetryEvent {
  type: 'invocation_retry';
  provider: ProviderName;
  model: string;
  repeatIndex: number;
  attempt: number;
  delayMs: number;
  error: ProviderError;
  timestamp: number;
}

export interface InvocationEndEvent {
  type: 'invocation_end';
  result: InvocationResult;
  timestamp: number;
}

export interface SynthesisSkippedEvent {
  type: 'synthesis_skipped';
  reason: string;
  timestamp: number;
}

export const noopLogger: Logger = {};

export function createLogger(handlers: Partial<Logger>): Logger {
  return handlers;
}
