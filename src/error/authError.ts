import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when credentials are rejected, either by the token endpoint or by the
 * platform after a fresh token was already tried.
 */
export class AuthError extends ApiError {
  /** AuthError error-name */
  static name = 'AuthError';
}

/**
 * Type guard for {@link AuthError}.
 */
export function isAuthError(error: unknown): error is AuthError {
  return isErrorType(AuthError, error);
}

/**
 * Extract an {@link AuthError} from an unknown error value, following nested causes.
 */
export function getAuthError(error: unknown): null | AuthError {
  return unwrapErrorType(AuthError, error);
}
