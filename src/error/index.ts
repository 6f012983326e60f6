/**
 * Error entrypoint: exports the client's error classes and helpers for identifying
 * and unwrapping them from `cause` chains.
 * @module
 */

/** Error thrown when a request is aborted. */
/** Type guard for {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error thrown when `find` matches more than one resource. */
export { AmbiguousMatchError, getAmbiguousMatchError, isAmbiguousMatchError } from './ambiguousMatchError.js';
/** Error representing a non-2xx platform response. */
export { ApiError, type ApiErrorDetails, getApiError, isApiError } from './apiError.js';
/** Error thrown when credentials are rejected. */
export { AuthError, getAuthError, isAuthError } from './authError.js';
/** Error thrown when a credentials file cannot be loaded. */
export { ConfigError, getConfigError, isConfigError } from './configError.js';
/** Error thrown when a registry reference cannot be parsed. */
export { getInvalidRefError, InvalidRefError, isInvalidRefError } from './invalidRefError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error thrown when a resource does not exist. */
export { getNotFoundError, isNotFoundError, NotFoundError } from './notFoundError.js';
/** Error thrown for documented but unimplemented capabilities. */
export { getNotSupportedError, isNotSupportedError, NotSupportedError } from './notSupportedError.js';
/** Error thrown when operating on an unsaved or deleted resource. */
export { getStaleObjectError, isStaleObjectError, type ResourceState, StaleObjectError } from './staleObjectError.js';
/** Error thrown when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
