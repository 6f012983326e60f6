import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Lifecycle states a resource handle moves through. */
export type ResourceState = 'unsaved' | 'persisted' | 'deleted';

/**
 * Error raised when an operation needing a persisted resource is invoked on an
 * unsaved or deleted one.
 */
export class StaleObjectError extends Error {
  /** StaleObjectError error-name */
  static name = 'StaleObjectError';
  /** Internal state the resource was in */
  #state: ResourceState;

  /** Creates a new instance of a StaleObjectError with the state the resource was in */
  constructor(message: string, state: ResourceState, opts?: ErrorOptions) {
    super(message, opts);
    this.#state = state;
  }

  /** State of the resource when the operation was attempted */
  get state(): ResourceState {
    return this.#state;
  }
}

/**
 * Type guard for {@link StaleObjectError}.
 */
export function isStaleObjectError(error: unknown): error is StaleObjectError {
  return isErrorType(StaleObjectError, error);
}

/**
 * Extract a {@link StaleObjectError} from an unknown error value, following nested causes.
 */
export function getStaleObjectError(error: unknown): null | StaleObjectError {
  return unwrapErrorType(StaleObjectError, error);
}
