export type {
  BuiltInTierName,
  CompareConfig,
  RunDefaults,
  SynthesisTarget,
  TierDefinition,
} from './types';

export {
  DEFAULT_COMPARE_CONFIG,
  DEFAULT_RUN_DEFAULTS,
  DEFAULT_SYSTEM_PROMPTS,
  DEFAULT_TIERS,
} from './defaults';

export {
  compareConfigSchema,
  configFileSchema,
  createCompareConfig,
  parseConfigFile,
  type ConfigFileInput,
} from './schema';

export { listSystemPrompts, resolveSystemPrompt, type SystemPromptPreset } from './presets';
