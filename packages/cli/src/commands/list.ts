import { listSystemPrompts, listTiers } from '@polyprompt/core'
import { loadConfig } from '../config/index.js'
import { formatPresets, formatTiers, printError, printLines } from '../output/console.js'

export interface ListCommandOptions {
  config?: string
}

/** Print the tiers of the active configuration. */
export async function tiersCommand(
  options: ListCommandOptions,
  cwd: string = process.cwd()
): Promise<number> {
  try {
    const { config } = await loadConfig(options.config, cwd)
    printLines(formatTiers(listTiers(config)))
    return 0
  } catch (error) {
    printError(error instanceof Error ? error : new Error(String(error)))
    return 1
  }
}

/** Print the system prompt presets of the active configuration. */
export async function presetsCommand(
  options: ListCommandOptions,
  cwd: string = process.cwd()
): Promise<number> {
  try {
    const { config } = await loadConfig(options.config, cwd)
    printLines(formatPresets(listSystemPrompts(config)))
    return 0
  } catch (error) {
    printError(error instanceof Error ? error : new Error(String(error)))
    return 1
  }
}
