export {
  loadConfig,
  loadConfigFile,
  mergeWithDefaults,
  resolveConfigPath,
  type LoadedConfig,
} from './loader.js'
