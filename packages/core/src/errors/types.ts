import { wrapAsError } from './utils';

export enum ConfigErrorCode {
  CONFIG_ERROR = 'CONFIG_ERROR',
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  INVALID_CONFIG = 'INVALID_CONFIG',
  UNKNOWN_TIER = 'UNKNOWN_TIER',
  MISSING_MODEL = 'MISSING_MODEL',
  MISSING_PRICE = 'MISSING_PRICE',
  UNKNOWN_PROVIDER = 'UNKNOWN_PROVIDER',
  UNKNOWN_PRESET = 'UNKNOWN_PRESET',
  MISSING_API_KEY = 'MISSING_API_KEY',
  TEMPLATE_ERROR = 'TEMPLATE_ERROR',
}

export enum ProviderErrorCode {
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  OVERLOADED = 'OVERLOADED',
  TIMEOUT = 'TIMEOUT',
  AUTH_ERROR = 'AUTH_ERROR',
  INVALID_REQUEST = 'INVALID_REQUEST',
  CONTENT_POLICY = 'CONTENT_POLICY',
  CANCELLED = 'CANCELLED',
}

export type PolypromptErrorCode = ConfigErrorCode | ProviderErrorCode;

export interface PolypromptErrorOptions<TCode extends PolypromptErrorCode = PolypromptErrorCode> {
  code: TCode;
  cause?: Error;
  context?: Record<string, unknown>;
}

export interface ErrorOptions<TCode extends PolypromptErrorCode> {
  code?: TCode;
  cause?: Error;
  context?: Record<string, unknown>;
}

export type ConfigErrorOptions = ErrorOptions<ConfigErrorCode>;
export type ProviderErrorOptions = ErrorOptions<ProviderErrorCode>;

/**
 * Failure classes the retry loop distinguishes.
 * `cancelled` is permanent but reported separately so callers can tell
 * a user abort apart from a provider rejection.
 */
export type FailureKind = 'transient' | 'permanent' | 'cancelled';

/**
 * Base error class for all polyprompt errors.
 * Provides structured error information including error code and optional context.
 */
export class PolypromptError<
  TCode extends PolypromptErrorCode = PolypromptErrorCode,
> extends Error {
  readonly code: TCode;
  override readonly cause?: Error;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options: PolypromptErrorOptions<TCode>) {
    super(message);
    this.name = 'PolypromptError';
    this.code = options.code;
    this.cause = options.cause;
    this.context = options.context;

    // V8-specific stack trace capture
    Error.captureStackTrace?.(this, this.constructor);
  }

  get isRetryable(): boolean {
    return false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isRetryable: this.isRetryable,
      context: this.context,
      cause: this.cause?.message,
    };
  }
}

/**
 * Error thrown when configuration is invalid or incomplete
 * (unknown tier, unpriced model, missing API key).
 * Always fatal: raised before any network call is made.
 */
export class ConfigError extends PolypromptError<ConfigErrorCode> {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, {
      code: options.code ?? ConfigErrorCode.CONFIG_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'ConfigError';
  }

  static from(
    error: unknown,
    code: ConfigErrorCode = ConfigErrorCode.CONFIG_ERROR,
    context?: Record<string, unknown>
  ): ConfigError {
    if (error instanceof ConfigError) {
      return error;
    }
    return wrapAsError(error, ConfigError, { code, context });
  }
}

/**
 * Error raised by a provider call. Subclasses decide retryability.
 */
export class ProviderError extends PolypromptError<ProviderErrorCode> {
  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, {
      code: options.code ?? ProviderErrorCode.PROVIDER_ERROR,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'ProviderError';
  }

  get kind(): FailureKind {
    return this.isRetryable ? 'transient' : 'permanent';
  }
}

/**
 * A provider failure expected to resolve on retry
 * (rate limiting, temporary overload, timeout).
 */
export class TransientProviderError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, options);
    this.name = 'TransientProviderError';
  }

  override get isRetryable(): boolean {
    return true;
  }
}

/**
 * A provider failure that will not resolve on retry
 * (bad credentials, malformed request, policy rejection).
 */
export class PermanentProviderError extends ProviderError {
  constructor(message: string, options: ProviderErrorOptions = {}) {
    super(message, options);
    this.name = 'PermanentProviderError';
  }

  override get isRetryable(): boolean {
    return false;
  }
}
