import type { Invoker } from '../invoker/invoker';
import {
  createInvocationRequest,
  isSuccess,
  type InvocationResult,
  type InvocationSuccess,
} from '../invoker/types';
import type { Logger } from '../observability/logger';
import { noopLogger } from '../observability/logger';
import { compileTemplate } from '../prompt/template';
import { PROVIDER_LABELS } from '../provider/types';
import type { ResolvedModel } from '../tiers/resolver';
import type { SynthesisOutcome } from './types';

export const SYNTHESIS_SKIPPED_NOTE =
  'Synthesis skipped: no provider returned a successful response.';

export const SYNTHESIZER_SYSTEM_PROMPT =
  'You are an expert synthesizer. Combine insights from multiple AI responses into one coherent, comprehensive answer.';

interface SynthesisPromptInput {
  question: string;
  responseCount: number;
  multipleCalls: boolean;
  responses: Array<{ label: string; repeatIndex: number; text: string }>;
}

const renderSynthesisPrompt = compileTemplate<SynthesisPromptInput>(
  `Based on the following {{responseCount}} AI responses to the same question, create a synthesized answer that combines the best insights from all of them.

Original Question: {{question}}

{{#each responses}}
{{label}}{{#if ../multipleCalls}} (call {{add repeatIndex 1}}){{/if}} Response: {{text}}

{{/each}}
Synthesize these into one comprehensive response that captures the best elements from all responses while maintaining coherence and eliminating redundancy.`,
  'synthesis-prompt'
);

/**
 * Embed the question and each successful response, labelled by provider
 * (and by call number when each provider was called more than once).
 */
export function buildSynthesisPrompt(
  question: string,
  successes: readonly InvocationSuccess[],
  numCalls: number
): string {
  return renderSynthesisPrompt({
    question,
    responseCount: successes.length,
    multipleCalls: numCalls > 1,
    responses: successes.map((result) => ({
      label: PROVIDER_LABELS[result.provider],
      repeatIndex: result.repeatIndex,
      text: result.text,
    })),
  });
}

export interface SynthesizeOptions {
  invoker: Pick<Invoker, 'invoke'>;
  target: Pick<ResolvedModel, 'provider' | 'model'>;
  userPrompt: string;
  /** Settled comparison results */
  results: readonly InvocationResult[];
  numCalls: number;
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Combine the successful comparison responses with one more model call.
 *
 * Skips, rather than fails, when no comparison invocation succeeded. The
 * synthesis call goes through the invoker, so it gets the same retry and
 * cost accounting as any comparison call.
 */
export async function synthesize(options: SynthesizeOptions): Promise<SynthesisOutcome> {
  const logger = options.logger ?? noopLogger;
  const successes = options.results.filter(isSuccess);

  if (successes.length === 0) {
    logger.onSynthesisSkipped?.({
      type: 'synthesis_skipped',
      reason: SYNTHESIS_SKIPPED_NOTE,
      timestamp: Date.now(),
    });
    return { status: 'skipped', reason: SYNTHESIS_SKIPPED_NOTE };
  }

  const request = createInvocationRequest({
    provider: options.target.provider,
    model: options.target.model,
    systemPrompt: SYNTHESIZER_SYSTEM_PROMPT,
    userPrompt: buildSynthesisPrompt(options.userPrompt, successes, options.numCalls),
    maxTokens: options.maxTokens,
    temperature: options.temperature,
    repeatIndex: 0,
  });

  return { status: 'completed', result: await options.invoker.invoke(request, options.signal) };
}
