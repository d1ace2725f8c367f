import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import merge from 'lodash/merge'
import { parse as parseYaml } from 'yaml'
import {
  ConfigError,
  ConfigErrorCode,
  DEFAULT_COMPARE_CONFIG,
  createCompareConfig,
  parseConfigFile,
  type CompareConfig,
  type ConfigFileInput,
} from '@polyprompt/core'
import { CLI_DEFAULTS } from '../constants.js'

export interface LoadedConfig {
  config: CompareConfig
  /** Absolute path of the file read, or undefined when only built-in defaults apply */
  path?: string
}

export function resolveConfigPath(
  configPath: string = CLI_DEFAULTS.DEFAULT_CONFIG_FILE,
  cwd: string = process.cwd()
): string {
  return resolve(cwd, configPath)
}

/**
 * Deep-merge a validated user file over the built-in configuration.
 * Tier model maps and price tables merge key by key; scalars in the file win.
 */
export function mergeWithDefaults(input: ConfigFileInput, source?: string): CompareConfig {
  const merged = merge({}, DEFAULT_COMPARE_CONFIG, input)
  return createCompareConfig(merged, source)
}

export async function loadConfigFile(absolutePath: string): Promise<CompareConfig> {
  let document: unknown
  try {
    document = parseYaml(await readFile(absolutePath, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Failed to read config file ${absolutePath}: ${message}`, {
      code: ConfigErrorCode.INVALID_CONFIG,
      cause: error instanceof Error ? error : undefined,
      context: { path: absolutePath },
    })
  }

  return mergeWithDefaults(parseConfigFile(document, absolutePath), absolutePath)
}

/**
 * Load the run configuration.
 *
 * An explicit path must exist. Without one, `polyprompt.config.yaml` in `cwd`
 * is used when present, and the built-in defaults otherwise.
 *
 * @throws {ConfigError} CONFIG_NOT_FOUND, INVALID_CONFIG
 */
export async function loadConfig(
  configPath?: string,
  cwd: string = process.cwd()
): Promise<LoadedConfig> {
  const absolutePath = resolveConfigPath(configPath, cwd)

  if (!existsSync(absolutePath)) {
    if (configPath === undefined) {
      return { config: DEFAULT_COMPARE_CONFIG }
    }
    throw new ConfigError(
      `Config file not found: ${configPath}\n\n` +
        `Create a ${CLI_DEFAULTS.DEFAULT_CONFIG_FILE} file or check the --config path.`,
      {
        code: ConfigErrorCode.CONFIG_NOT_FOUND,
        context: { path: absolutePath },
      }
    )
  }

  return { config: await loadConfigFile(absolutePath), path: absolutePath }
}
