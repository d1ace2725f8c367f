import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import type { ComparisonReport } from '@polyprompt/core'

export function reportToJson(report: ComparisonReport): string {
  return JSON.stringify(report, null, 2)
}

/**
 * Write the report as JSON, creating parent directories as needed.
 *
 * @returns the absolute path written
 */
export async function saveReport(
  report: ComparisonReport,
  outputPath: string,
  cwd: string = process.cwd()
): Promise<string> {
  const absolutePath = resolve(cwd, outputPath)
  await mkdir(dirname(absolutePath), { recursive: true })
  await writeFile(absolutePath, `${reportToJson(report)}\n`, 'utf-8')
  return absolutePath
}
