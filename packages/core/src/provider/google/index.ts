export { createGeminiProvider, type GeminiProviderConfig } from './factory';
