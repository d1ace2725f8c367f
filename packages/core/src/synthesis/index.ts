export {
  synthesize,
  buildSynthesisPrompt,
  SYNTHESIS_SKIPPED_NOTE,
  SYNTHESIZER_SYSTEM_PROMPT,
  type SynthesizeOptions,
} from './synthesizer';
export type { SynthesisOutcome } from './types';
