export { createSearchGPTProvider, buildSearchPrompt, type SearchGPTProviderConfig } from './factory';
export {
  createSerperSearchClient,
  SERPER_ENDPOINT,
  type SerperSearchConfig,
  type WebSearchClient,
  type WebSearchResult,
} from './web-search';
