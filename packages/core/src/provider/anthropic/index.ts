export { createClaudeProvider, type ClaudeProviderConfig } from './factory';
