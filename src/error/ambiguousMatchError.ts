import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when `find` matches more than one resource.
 */
export class AmbiguousMatchError extends Error {
  /** AmbiguousMatchError error-name */
  static name = 'AmbiguousMatchError';
  /** Internal number of matching resources */
  #count: number;

  /** Creates a new instance of an AmbiguousMatchError with the number of matches */
  constructor(message: string, count: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#count = count;
  }

  /** Number of resources that matched the query */
  get count(): number {
    return this.#count;
  }
}

/**
 * Type guard for {@link AmbiguousMatchError}.
 */
export function isAmbiguousMatchError(error: unknown): error is AmbiguousMatchError {
  return isErrorType(AmbiguousMatchError, error);
}

/**
 * Extract an {@link AmbiguousMatchError} from an unknown error value, following nested causes.
 */
export function getAmbiguousMatchError(error: unknown): null | AmbiguousMatchError {
  return unwrapErrorType(AmbiguousMatchError, error);
}
