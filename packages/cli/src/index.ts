export { compareCommand, type CompareContext } from './commands/compare.js'
export { presetsCommand, tiersCommand, type ListCommandOptions } from './commands/list.js'
export { loadConfig, mergeWithDefaults, type LoadedConfig } from './config/index.js'
export {
  resolveRunSettings,
  type CompareCommandOptions,
  type RunMode,
  type RunSettings,
} from './utils/options.js'
export { saveReport, reportToJson } from './output/report.js'
export { createConsoleLogger, type ConsoleLoggerOptions } from './output/logger.js'
