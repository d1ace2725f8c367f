import type { PolypromptError, PolypromptErrorCode, PolypromptErrorOptions } from './types';

/**
 * Wraps an unknown error as a specific PolypromptError subclass.
 *
 * @internal
 */
export function wrapAsError<
  T extends PolypromptError<TCode>,
  TCode extends PolypromptErrorCode,
>(
  error: unknown,
  ErrorClass: new (message: string, options: PolypromptErrorOptions<TCode>) => T,
  options: { code: TCode; context?: Record<string, unknown> }
): T {
  const cause = toError(error);
  return new ErrorClass(cause.message, { ...options, cause });
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
