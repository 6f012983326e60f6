import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request is intentionally aborted, either by a caller signal
 * or by disposing the {@link Api} handle.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
