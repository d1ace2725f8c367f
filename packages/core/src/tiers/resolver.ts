/**
 * Tier resolution: abstract quality tier to concrete, priced models.
 *
 * @module tiers/resolver
 */

import type { CompareConfig, TierDefinition } from '../config/types';
import { ConfigError, ConfigErrorCode, toError } from '../errors';
import { getModelPricing, type ModelPricing } from '../pricing';
import { isProviderName, type ProviderName } from '../provider/types';

export interface ResolvedModel {
  provider: ProviderName;
  model: string;
  pricing: ModelPricing;
}

export interface ResolvedTier {
  name: string;
  description: string;
  /** Selected providers in selection order */
  models: ReadonlyMap<ProviderName, ResolvedModel>;
  synthesis: ResolvedModel;
}

export interface TierSummary extends TierDefinition {
  name: string;
}

function getTier(config: CompareConfig, tierName: string): TierDefinition {
  if (!Object.hasOwn(config.tiers, tierName)) {
    const availableTiers = Object.keys(config.tiers);
    throw new ConfigError(
      `Unknown tier '${tierName}'. Available tiers: ${availableTiers.join(', ')}`,
      {
        code: ConfigErrorCode.UNKNOWN_TIER,
        context: { tier: tierName, availableTiers },
      }
    );
  }
  return config.tiers[tierName];
}

function resolveModel(
  config: CompareConfig,
  tierName: string,
  provider: ProviderName,
  model: string
): ResolvedModel {
  try {
    return { provider, model, pricing: getModelPricing(config.pricing, model) };
  } catch (error) {
    throw new ConfigError(
      `Tier '${tierName}' uses model '${model}' for ${provider}, which has no price entry`,
      {
        code: ConfigErrorCode.MISSING_PRICE,
        cause: toError(error),
        context: { tier: tierName, provider, model },
      }
    );
  }
}

/**
 * Resolve a tier into priced models for the selected providers.
 *
 * Pure: performs no I/O, so a bad tier fails before any network call.
 *
 * @param providers - Providers to resolve; defaults to every provider the tier defines
 * @throws {ConfigError} UNKNOWN_TIER, MISSING_MODEL or MISSING_PRICE
 *
 * @example
 * ```typescript
 * const tier = resolveTier(config, 'economy', ['claude', 'openai']);
 * tier.models.get('openai')?.model; // 'gpt-4o-mini'
 * ```
 */
export function resolveTier(
  config: CompareConfig,
  tierName: string,
  providers?: readonly ProviderName[]
): ResolvedTier {
  const tier = getTier(config, tierName);
  const definedProviders = Object.keys(tier.models).filter(isProviderName);
  const selected = providers ?? definedProviders;

  const models = new Map<ProviderName, ResolvedModel>();
  for (const provider of selected) {
    const model = tier.models[provider];
    if (model === undefined) {
      throw new ConfigError(`Tier '${tierName}' defines no model for provider '${provider}'`, {
        code: ConfigErrorCode.MISSING_MODEL,
        context: { tier: tierName, provider, definedProviders },
      });
    }
    models.set(provider, resolveModel(config, tierName, provider, model));
  }

  return {
    name: tierName,
    description: tier.description,
    models,
    synthesis: resolveModel(config, tierName, tier.synthesis.provider, tier.synthesis.model),
  };
}

/**
 * Tier definitions in declaration order.
 */
export function listTiers(config: CompareConfig): TierSummary[] {
  return Object.entries(config.tiers).map(([name, tier]) => ({ name, ...tier }));
}
