import { ConfigError, ConfigErrorCode } from '../errors';
import type { CompareConfig } from './types';

export interface SystemPromptPreset {
  name: string;
  prompt: string;
}

export function listSystemPrompts(config: CompareConfig): SystemPromptPreset[] {
  return Object.entries(config.systemPrompts).map(([name, prompt]) => ({ name, prompt }));
}

/**
 * Look up a named system prompt.
 *
 * @throws {ConfigError} UNKNOWN_PRESET when no preset has that name
 */
export function resolveSystemPrompt(config: CompareConfig, name: string): string {
  if (!Object.hasOwn(config.systemPrompts, name)) {
    throw new ConfigError(`Unknown system prompt preset '${name}'`, {
      code: ConfigErrorCode.UNKNOWN_PRESET,
      context: { preset: name, availablePresets: Object.keys(config.systemPrompts) },
    });
  }
  return config.systemPrompts[name];
}
