import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised for capabilities the client exposes but does not implement,
 * such as writing to the global container or the nested `fields` collection.
 */
export class NotSupportedError extends Error {
  /** NotSupportedError error-name */
  static name = 'NotSupportedError';
  /** Internal name of the capability */
  #capability: string;

  /** Creates a new instance of a NotSupportedError for a named capability */
  constructor(message: string, capability: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#capability = capability;
  }

  /** Capability that was requested */
  get capability(): string {
    return this.#capability;
  }
}

/**
 * Type guard for {@link NotSupportedError}.
 */
export function isNotSupportedError(error: unknown): error is NotSupportedError {
  return isErrorType(NotSupportedError, error);
}

/**
 * Extract a {@link NotSupportedError} from an unknown error value, following nested causes.
 */
export function getNotSupportedError(error: unknown): null | NotSupportedError {
  return unwrapErrorType(NotSupportedError, error);
}
