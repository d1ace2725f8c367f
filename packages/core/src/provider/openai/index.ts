export { createOpenAIProvider, type OpenAIProviderConfig } from './factory';
