import { existsSync } from 'node:fs'
import { resolve } from 'node:path'
import { config as loadDotenv } from 'dotenv'
import { CLI_DEFAULTS } from '../constants.js'

/**
 * Load variables from an env file into `process.env`.
 * Variables already set in the environment win; a missing file is not an error.
 *
 * @returns the names of the variables that were added
 */
export function loadEnvFile(
  filePath: string = CLI_DEFAULTS.DEFAULT_ENV_FILE,
  cwd: string = process.cwd()
): string[] {
  const absolutePath = resolve(cwd, filePath)

  if (!existsSync(absolutePath)) {
    return []
  }

  const before = new Set(Object.keys(process.env))
  const result = loadDotenv({ path: absolutePath, override: false })
  if (result.error) {
    throw result.error
  }

  return Object.keys(result.parsed ?? {}).filter((key) => !before.has(key))
}
