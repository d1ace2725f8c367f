/**
 * Zod schemas for the configuration document.
 *
 * Two shapes exist: the file schema accepts a partial document (every key
 * optional, price pairs as `[input, output]` tuples) that is deep-merged
 * over the built-in defaults; the full schema validates the merged result.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { ConfigError, ConfigErrorCode } from '../errors';
import { PROVIDER_NAMES } from '../provider/types';
import type { CompareConfig } from './types';

const providerNameSchema = z.enum(PROVIDER_NAMES);

const priceSchema = z.number().finite().nonnegative();

const modelPricingSchema = z
  .object({
    inputPricePerMillion: priceSchema,
    outputPricePerMillion: priceSchema,
  })
  .strict();

const priceEntrySchema = z.union([
  z
    .tuple([priceSchema, priceSchema])
    .transform(([inputPricePerMillion, outputPricePerMillion]) => ({
      inputPricePerMillion,
      outputPricePerMillion,
    })),
  modelPricingSchema,
]);

const runDefaultsSchema = z
  .object({
    tier: z.string().min(1),
    maxTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
    numCalls: z.number().int().positive(),
    concurrency: z.number().int().positive(),
    requestTimeoutMs: z.number().int().positive(),
  })
  .strict();

const tierFileSchema = z
  .object({
    description: z.string().optional(),
    models: z.record(providerNameSchema, z.string().min(1)).optional(),
    synthesis: z
      .union([
        z
          .string()
          .min(1)
          .transform((model) => ({ model })),
        z
          .object({
            model: z.string().min(1).optional(),
            provider: providerNameSchema.optional(),
          })
          .strict(),
      ])
      .optional(),
  })
  .strict();

function normalizeAliases(value: unknown): unknown {
  if (value === null || value === undefined) {
    return {};
  }
  if (typeof value !== 'object' || Array.isArray(value) || !('system_prompts' in value)) {
    return value;
  }
  const hasCanonical = 'systemPrompts' in value;
  return Object.fromEntries(
    Object.entries(value).flatMap(([key, entry]): Array<[string, unknown]> => {
      if (key !== 'system_prompts') {
        return [[key, entry]];
      }
      return hasCanonical ? [] : [['systemPrompts', entry]];
    })
  );
}

/**
 * Schema of a user configuration file. An empty document is accepted.
 */
export const configFileSchema = z.preprocess(
  normalizeAliases,
  z
    .object({
      tiers: z.record(z.string(), tierFileSchema).optional(),
      pricing: z.record(z.string(), priceEntrySchema).optional(),
      systemPrompts: z.record(z.string(), z.string().min(1)).optional(),
      defaults: runDefaultsSchema.partial().optional(),
    })
    .strict()
);

export type ConfigFileInput = z.output<typeof configFileSchema>;

/**
 * Schema of a complete configuration, after merging.
 */
export const compareConfigSchema = z.object({
  tiers: z.record(
    z.string(),
    z.object({
      description: z.string().default(''),
      models: z.record(providerNameSchema, z.string().min(1)),
      synthesis: z.object({
        provider: providerNameSchema.default('claude'),
        model: z.string().min(1),
      }),
    })
  ),
  pricing: z.record(z.string(), modelPricingSchema),
  systemPrompts: z.record(z.string(), z.string().min(1)),
  defaults: runDefaultsSchema,
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function invalidConfig(error: z.ZodError, source: string | undefined): ConfigError {
  const prefix = source ? `Invalid configuration in ${source}` : 'Invalid configuration';
  return new ConfigError(`${prefix}: ${formatIssues(error)}`, {
    code: ConfigErrorCode.INVALID_CONFIG,
    context: {
      source,
      issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    },
  });
}

/**
 * Validate a parsed configuration document (the contents of a YAML or JSON file).
 *
 * @throws {ConfigError} INVALID_CONFIG listing every zod issue path
 */
export function parseConfigFile(document: unknown, source?: string): ConfigFileInput {
  const result = configFileSchema.safeParse(document);
  if (!result.success) {
    throw invalidConfig(result.error, source);
  }
  return result.data;
}

/**
 * Validate a complete configuration and check its cross references.
 *
 * @throws {ConfigError} INVALID_CONFIG on schema violations, UNKNOWN_TIER when
 * the default tier is not defined
 */
export function createCompareConfig(input: unknown, source?: string): CompareConfig {
  const result = compareConfigSchema.safeParse(input);
  if (!result.success) {
    throw invalidConfig(result.error, source);
  }

  const config = result.data;

  if (!Object.hasOwn(config.tiers, config.defaults.tier)) {
    throw new ConfigError(`Default tier '${config.defaults.tier}' is not defined`, {
      code: ConfigErrorCode.UNKNOWN_TIER,
      context: { tier: config.defaults.tier, availableTiers: Object.keys(config.tiers) },
    });
  }

  return config;
}
