export { DEFAULT_RETRY_POLICY, backoffDelay, type RetryPolicy } from './policy';
export { timerSleeper, type Sleeper } from './sleeper';
export {
  initialRetryState,
  isTerminal,
  transition,
  type RetryEvent,
  type RetryState,
  type TerminalRetryState,
} from './state-machine';
export { runWithRetry, type RetryOptions } from './run';
