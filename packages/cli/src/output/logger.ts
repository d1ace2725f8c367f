import { PROVIDER_LABELS, createLogger, isSuccess, type Logger } from '@polyprompt/core'
import { c } from './colors.js'
import { formatMs } from './console.js'

export type LineWriter = (line: string) => void

const toStderr: LineWriter = (line) => console.error(line)

export interface ConsoleLoggerOptions {
  /** Report every invocation event, not only warnings */
  verbose?: boolean
  write?: LineWriter
}

/**
 * Console logger writing to stderr, so progress never mixes into `--json`
 * output on stdout. Without `verbose` only warnings and errors are shown.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? toStderr

  const warnings: Logger = {
    log(level, message) {
      if (level === 'warn' || level === 'error') {
        write(c('yellow', `  ${message}`))
      }
    },
  }
  if (!options.verbose) {
    return createLogger(warnings)
  }

  return createLogger({
    onInvocationStart(event) {
      write(c('dim', `  → ${PROVIDER_LABELS[event.provider]} (${event.model}) call ${event.repeatIndex + 1}`))
    },
    onRetry(event) {
      write(
        c(
          'yellow',
          `  ↻ ${PROVIDER_LABELS[event.provider]}: ${event.error.message}; attempt ${event.attempt} failed, retrying in ${formatMs(event.delayMs)}`
        )
      )
    },
    onInvocationEnd({ result }) {
      const label = PROVIDER_LABELS[result.provider]
      const call = result.repeatIndex + 1
      if (isSuccess(result)) {
        write(c('green', `  ✓ ${label} call ${call} in ${formatMs(result.latencyMs)}`))
      } else {
        write(c('red', `  ✗ ${label} call ${call}: ${result.error.code} ${result.error.message}`))
      }
    },
    onSynthesisSkipped(event) {
      write(c('yellow', `  ${event.reason}`))
    },
    log(level, message) {
      write(level === 'warn' || level === 'error' ? c('yellow', `  ${message}`) : c('dim', `  ${message}`))
    },
  })
}
