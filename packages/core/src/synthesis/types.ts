import type { InvocationResult } from '../invoker/types';

/**
 * What became of a requested synthesis. A failed synthesis call is a
 * completed outcome whose result has `status: 'error'`.
 */
export type SynthesisOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'completed'; result: InvocationResult };
