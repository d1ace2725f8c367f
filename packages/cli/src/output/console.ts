import {
  PROVIDER_LABELS,
  PROVIDER_NAMES,
  isSuccess,
  type ComparisonReport,
  type InvocationResult,
  type ProviderSummary,
  type ResolvedTier,
  type SynthesisOutcome,
  type TierSummary,
} from '@polyprompt/core'
import { CLI_DEFAULTS } from '../constants.js'
import type { RunSettings } from '../utils/options.js'
import { c } from './colors.js'

const LABEL_WIDTH = 11

function divider(char: string = '═'): string {
  return c('cyan', char.repeat(CLI_DEFAULTS.DIVIDER_WIDTH))
}

function section(title: string): string[] {
  return ['', divider(), c('bold', `  ${title}`), divider()]
}

export function formatNumber(num: number): string {
  return num.toLocaleString('en-US')
}

export function formatMs(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`
  }
  return `${(ms / 1000).toFixed(2)}s`
}

export function formatCost(cost: number | undefined): string {
  return cost === undefined ? 'n/a' : `$${cost.toFixed(6)}`
}

export function formatRate(costPer1kTokens: number | undefined): string {
  return costPer1kTokens === undefined ? 'n/a' : `$${costPer1kTokens.toFixed(4)}/1K`
}

export function formatRunHeader(settings: RunSettings, tier: ResolvedTier): string[] {
  const title =
    settings.mode === 'single'
      ? `Single Provider: ${PROVIDER_LABELS[settings.providers[0]]}`
      : 'Prompt Comparison'

  const lines = [
    ...section(title),
    '',
    `  ${c('bold', 'System prompt:')}   ${settings.systemPrompt}`,
    `  ${c('bold', 'User prompt:')}     ${settings.userPrompt}`,
    `  ${c('bold', 'Tier:')}            ${tier.name.toUpperCase()}${tier.description ? ` - ${tier.description}` : ''}`,
  ]
  if (settings.numCalls > 1) {
    lines.push(`  ${c('bold', 'Calls per model:')} ${settings.numCalls}`)
  }
  return lines
}

export function formatResult(result: InvocationResult, numCalls: number): string[] {
  const call = numCalls > 1 ? ` call ${result.repeatIndex + 1}/${numCalls}` : ''
  const heading = `${c('bold', `  ▸ ${PROVIDER_LABELS[result.provider]}`)} ${c('dim', `(${result.model})${call}`)}`

  if (!isSuccess(result)) {
    const { code, kind, message } = result.error
    const attempts = result.attempts === 1 ? '1 attempt' : `${result.attempts} attempts`
    return ['', heading, c('red', `  ✗ ${code} (${kind}) after ${attempts}: ${message}`)]
  }

  const tokens = result.usage ? `${formatNumber(result.usage.totalTokens)} tokens` : 'tokens n/a'
  const details = [tokens, `cost ${formatCost(result.cost?.total)}`, formatMs(result.latencyMs)]
  if (result.retries > 0) {
    details.push(result.retries === 1 ? '1 retry' : `${result.retries} retries`)
  }

  return ['', heading, '', result.text, '', c('dim', `  ${details.join(' · ')}`)]
}

export function formatSynthesis(outcome: SynthesisOutcome | undefined): string[] {
  if (outcome?.status !== 'completed') {
    return []
  }

  const { result } = outcome
  if (!isSuccess(result)) {
    return ['', c('red', `  ✗ Synthesis failed: ${result.error.message}`)]
  }

  const words = result.text.split(/\s+/).filter(Boolean).length
  return [
    ...section(`Synthesized Answer (${PROVIDER_LABELS[result.provider]}, ${result.model})`),
    '',
    result.text,
    '',
    c('dim', `  ${formatNumber(words)} words`),
  ]
}

function breakdownLine(label: string, tokens: string, cost: string, rate: string): string {
  return `  ${label.padEnd(LABEL_WIDTH)} ${tokens.padStart(8)} tokens  ${cost.padStart(11)}  ${rate}`
}

function summaryLine(summary: ProviderSummary): string {
  const cost = summary.averageCostPerCall === undefined ? 'n/a' : formatCost(summary.totalCost)
  const line = breakdownLine(
    PROVIDER_LABELS[summary.provider],
    formatNumber(summary.totalTokens),
    cost,
    formatRate(summary.costPer1kTokens)
  )
  return summary.failures > 0 ? `${line}  ${c('red', `(${summary.failures} failed)`)}` : line
}

export function formatCostBreakdown(report: ComparisonReport): string[] {
  const lines = [...section('Cost Breakdown'), '']
  lines.push(...report.summaries.map(summaryLine))

  const synthesis = report.synthesis
  if (synthesis?.status === 'completed' && isSuccess(synthesis.result)) {
    const { usage, cost } = synthesis.result
    const rate = usage && cost && usage.totalTokens > 0 ? (cost.total / usage.totalTokens) * 1000 : undefined
    lines.push(
      breakdownLine(
        'Synthesis',
        usage ? formatNumber(usage.totalTokens) : 'n/a',
        formatCost(cost?.total),
        formatRate(rate)
      )
    )
  }

  lines.push(`  ${'─'.repeat(CLI_DEFAULTS.DIVIDER_WIDTH - 2)}`)
  lines.push(`  ${c('bold', 'Total cost:')} ${formatCost(report.totalCost)}`)
  if (report.synthesisCost !== undefined) {
    lines.push(`  ${c('bold', 'Total with synthesis:')} ${formatCost(report.grandTotalCost)}`)
  }

  const ranked = report.summaries.filter((summary) => summary.costPer1kTokens !== undefined)
  if (report.efficiency && ranked.length > 1) {
    const { mostEfficient, leastEfficient, differencePercent } = report.efficiency
    lines.push('', c('bold', '  Efficiency'))
    lines.push(
      `  Most efficient:  ${PROVIDER_LABELS[mostEfficient.provider]} (${formatRate(mostEfficient.costPer1kTokens)} tokens)`
    )
    lines.push(
      `  Least efficient: ${PROVIDER_LABELS[leastEfficient.provider]} (${formatRate(leastEfficient.costPer1kTokens)} tokens)`
    )
    if (differencePercent !== undefined) {
      lines.push(`  Difference:      ${differencePercent.toFixed(1)}% more expensive`)
    }
  }

  if (report.notes.length > 0) {
    lines.push('', ...report.notes.map((note) => c('yellow', `  ! ${note}`)))
  }

  lines.push('', divider())
  return lines
}

export function formatReport(report: ComparisonReport): string[] {
  return [
    ...report.results.flatMap((result) => formatResult(result, report.metadata.numCalls)),
    ...formatSynthesis(report.synthesis),
    ...formatCostBreakdown(report),
  ]
}

export function formatTiers(tiers: readonly TierSummary[]): string[] {
  const lines = [c('bold', '  Available Quality/Cost Tiers'), divider('─')]
  for (const tier of tiers) {
    lines.push('', c('cyan', `  ${tier.name.toUpperCase()}`))
    if (tier.description) {
      lines.push(`    ${tier.description}`)
    }
    for (const provider of PROVIDER_NAMES) {
      const model = tier.models[provider]
      if (model) {
        lines.push(`    ${`${PROVIDER_LABELS[provider]}:`.padEnd(LABEL_WIDTH + 1)} ${model}`)
      }
    }
    lines.push(`    ${'Synthesis:'.padEnd(LABEL_WIDTH + 1)} ${tier.synthesis.model} (${tier.synthesis.provider})`)
  }
  return lines
}

export function formatPresets(presets: ReadonlyArray<{ name: string; prompt: string }>): string[] {
  const width = Math.max(...presets.map((preset) => preset.name.length), 0) + 2
  return [
    c('bold', '  System Prompt Presets'),
    divider('─'),
    '',
    ...presets.map((preset) => `  ${c('cyan', preset.name.padEnd(width))}${preset.prompt}`),
  ]
}

export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line)
  }
}

export function printError(error: Error): void {
  console.error()
  console.error(c('red', '  ✗ Error:'))
  console.error()
  console.error(`  ${error.message}`)
  console.error()
}
