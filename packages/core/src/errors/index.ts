export {
  ConfigErrorCode,
  ProviderErrorCode,
  type PolypromptErrorCode,
  type FailureKind,
} from './types';

export type {
  PolypromptErrorOptions,
  ConfigErrorOptions,
  ProviderErrorOptions,
} from './types';

export {
  PolypromptError,
  ConfigError,
  ProviderError,
  TransientProviderError,
  PermanentProviderError,
} from './types';

export { toError } from './utils';
