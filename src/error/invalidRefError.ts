import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an identifier that could not be parsed as a registry reference,
 * or that names a resource of the wrong type for the collection.
 */
export class InvalidRefError extends Error {
  /** InvalidRefError error-name */
  static name = 'InvalidRefError';
  /** Internal reference as it was given */
  #ref: string;

  /** Creates a new instance of an InvalidRefError with the offending reference */
  constructor(message: string, ref: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#ref = ref;
  }

  /** Reference as it was given */
  get ref(): string {
    return this.#ref;
  }
}

/**
 * Type guard for {@link InvalidRefError}.
 */
export function isInvalidRefError(error: unknown): error is InvalidRefError {
  return isErrorType(InvalidRefError, error);
}

/**
 * Extract an {@link InvalidRefError} from an unknown error value, following nested causes.
 */
export function getInvalidRefError(error: unknown): null | InvalidRefError {
  return unwrapErrorType(InvalidRefError, error);
}
