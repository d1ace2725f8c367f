export { createPerplexityProvider, PERPLEXITY_BASE_URL, type PerplexityProviderConfig } from './factory';
