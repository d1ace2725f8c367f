// @polyprompt/core
// Send one prompt to several model providers and compare answers, latency and cost

// =============================================================================
// Errors
// =============================================================================

export * from './errors';

// =============================================================================
// Configuration & Tiers
// =============================================================================

export * from './config';
export * from './tiers';

// =============================================================================
// Pricing
// =============================================================================

export * from './pricing';

// =============================================================================
// Providers
// =============================================================================

export * from './provider';

// =============================================================================
// Retry & Invocation
// =============================================================================

export * from './retry';
export * from './invoker';

// =============================================================================
// Comparison & Synthesis
// =============================================================================

export * from './comparison';
export * from './synthesis';

// =============================================================================
// Observability
// =============================================================================

export * from './observability';

// =============================================================================
// Utilities
// =============================================================================

export * from './utils';
export * from './prompt';
