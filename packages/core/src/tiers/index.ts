export { listTiers, resolveTier } from './resolver';
export type { ResolvedModel, ResolvedTier, TierSummary } from './resolver';
