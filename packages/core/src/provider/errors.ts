import { APICallError } from 'ai';
import {
  PermanentProviderError,
  ProviderError,
  ProviderErrorCode,
  TransientProviderError,
  type FailureKind,
  type ProviderErrorOptions,
} from '../errors';
import { toError } from '../errors/utils';

type SubclassOptions = Omit<ProviderErrorOptions, 'code'>;

export interface RateLimitErrorContext extends Record<string, unknown> {
  /** Seconds until rate limit resets, from the Retry-After header */
  retryAfter?: number;
}

export interface OverloadedErrorContext extends Record<string, unknown> {
  statusCode?: number;
}

export interface TimeoutErrorContext extends Record<string, unknown> {
  /** Timeout duration in milliseconds */
  timeout?: number;
}

export interface RequestErrorContext extends Record<string, unknown> {
  statusCode?: number;
  provider?: string;
}

/**
 * Error thrown when the provider's rate limit is exceeded.
 * Retryable.
 */
export class RateLimitError extends TransientProviderError {
  readonly retryAfter?: number;

  constructor(retryAfter?: number, options: SubclassOptions = {}) {
    const message = retryAfter
      ? `Rate limit exceeded. Retry after ${retryAfter} seconds.`
      : 'Rate limit exceeded';

    const context: RateLimitErrorContext = { retryAfter, ...options.context };

    super(message, { code: ProviderErrorCode.RATE_LIMIT, cause: options.cause, context });
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Error thrown when the provider is overloaded or returns a server error.
 * Retryable.
 */
export class OverloadedError extends TransientProviderError {
  readonly statusCode?: number;

  constructor(statusCode?: number, options: SubclassOptions = {}) {
    const message = statusCode
      ? `Provider overloaded or unavailable (HTTP ${statusCode})`
      : 'Provider overloaded or unavailable';

    const context: OverloadedErrorContext = { statusCode, ...options.context };

    super(message, { code: ProviderErrorCode.OVERLOADED, cause: options.cause, context });
    this.name = 'OverloadedError';
    this.statusCode = statusCode;
  }
}

/**
 * Error thrown when a provider request times out.
 * Retryable.
 */
export class TimeoutError extends TransientProviderError {
  readonly timeout?: number;

  constructor(timeout?: number, options: SubclassOptions = {}) {
    const message = timeout
      ? `Request timed out after ${timeout}ms`
      : 'Request timed out';

    const context: TimeoutErrorContext = { timeout, ...options.context };

    super(message, { code: ProviderErrorCode.TIMEOUT, cause: options.cause, context });
    this.name = 'TimeoutError';
    this.timeout = timeout;
  }
}

/**
 * Error thrown when provider authentication fails.
 * Not retryable: authentication issues require configuration changes.
 */
export class AuthenticationError extends PermanentProviderError {
  readonly reason?: string;

  constructor(reason?: string, options: SubclassOptions = {}) {
    const message = reason ? `Authentication failed: ${reason}` : 'Authentication failed';

    super(message, {
      code: ProviderErrorCode.AUTH_ERROR,
      cause: options.cause,
      context: { reason, ...options.context },
    });
    this.name = 'AuthenticationError';
    this.reason = reason;
  }
}

/**
 * Error thrown when the provider rejects the request itself
 * (malformed parameters, unknown model).
 */
export class InvalidRequestError extends PermanentProviderError {
  constructor(detail: string, options: SubclassOptions = {}) {
    super(`Invalid request: ${detail}`, {
      code: ProviderErrorCode.INVALID_REQUEST,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'InvalidRequestError';
  }
}

/**
 * Error thrown when the provider refuses the prompt or the response on policy grounds.
 */
export class ContentPolicyError extends PermanentProviderError {
  constructor(detail?: string, options: SubclassOptions = {}) {
    super(
      detail ? `Rejected by content policy: ${detail}` : 'Rejected by content policy',
      { code: ProviderErrorCode.CONTENT_POLICY, cause: options.cause, context: options.context }
    );
    this.name = 'ContentPolicyError';
  }
}

/**
 * Error used when the caller aborted the request (shutdown signal).
 */
export class CancelledError extends PermanentProviderError {
  constructor(options: SubclassOptions = {}) {
    super('Request cancelled', {
      code: ProviderErrorCode.CANCELLED,
      cause: options.cause,
      context: options.context,
    });
    this.name = 'CancelledError';
  }

  override get kind(): FailureKind {
    return 'cancelled';
  }
}

const OVERLOAD_PATTERN = /overloaded|\b529\b|service unavailable|temporarily unavailable/i;
const RATE_LIMIT_PATTERN = /rate.?limit|too many requests|\b429\b/i;
const TIMEOUT_PATTERN = /timed? ?out|ETIMEDOUT/i;
const NETWORK_PATTERN = /ECONNRESET|ECONNREFUSED|EAI_AGAIN|fetch failed|socket hang up/i;
const POLICY_PATTERN = /content.?policy|content.?filter|safety|responsible ai/i;

function parseRetryAfter(headers: Record<string, string> | undefined): number | undefined {
  const raw = headers?.['retry-after'] ?? headers?.['Retry-After'];
  if (raw === undefined) {
    return undefined;
  }
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function classifyApiCallError(error: APICallError, context: RequestErrorContext): ProviderError {
  const { statusCode } = error;
  const options = { cause: error, context: { ...context, statusCode } };
  const detail = error.message;

  if (statusCode === 429) {
    return new RateLimitError(parseRetryAfter(error.responseHeaders), options);
  }
  if (statusCode === 408) {
    return new TimeoutError(undefined, options);
  }
  if (statusCode === 401 || statusCode === 403) {
    return new AuthenticationError(detail, options);
  }
  if (statusCode !== undefined && statusCode >= 500) {
    return new OverloadedError(statusCode, options);
  }
  if (POLICY_PATTERN.test(detail) || POLICY_PATTERN.test(error.responseBody ?? '')) {
    return new ContentPolicyError(detail, options);
  }
  if (statusCode === undefined && error.isRetryable) {
    return new OverloadedError(undefined, options);
  }
  if (statusCode !== undefined && OVERLOAD_PATTERN.test(detail)) {
    return new OverloadedError(statusCode, options);
  }
  return new InvalidRequestError(detail, options);
}

/**
 * Maps any error thrown by a provider SDK onto the transient/permanent taxonomy.
 *
 * HTTP status codes from AI SDK `APICallError`s take precedence; plain errors
 * fall back to message matching. Anything unrecognised is permanent, so an
 * unexpected failure is reported once instead of retried.
 *
 * @example
 * ```typescript
 * const error = classifyProviderError(caught, { provider: 'claude' });
 * if (error.isRetryable) {
 *   // back off and try again
 * }
 * ```
 */
export function classifyProviderError(
  error: unknown,
  context: RequestErrorContext = {}
): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (APICallError.isInstance(error)) {
    return classifyApiCallError(error, context);
  }

  const cause = toError(error);
  const options = { cause, context };
  const text = `${cause.name} ${cause.message}`;

  if (RATE_LIMIT_PATTERN.test(text)) {
    return new RateLimitError(undefined, options);
  }
  if (OVERLOAD_PATTERN.test(text) || NETWORK_PATTERN.test(text)) {
    return new OverloadedError(undefined, options);
  }
  if (cause.name === 'TimeoutError' || TIMEOUT_PATTERN.test(text)) {
    return new TimeoutError(undefined, options);
  }
  if (POLICY_PATTERN.test(text)) {
    return new ContentPolicyError(cause.message, options);
  }
  return new InvalidRequestError(cause.message, options);
}
