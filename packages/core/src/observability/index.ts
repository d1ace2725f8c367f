export type {
  Logger,
  LogLevel,
  InvocationStartEvent,
  InvocationRetryEvent,
  InvocationEndEvent,
  SynthesisSkippedEvent,
} from './logger';

export { noopLogger, createLogger } from './logger';
