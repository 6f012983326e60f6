import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Details describing a failed platform response. */
export interface ApiErrorDetails {
  /** HTTP status of the response; absent when no response was involved */
  status?: number;
  /** Server-provided `title` (or IMS `error`) */
  title?: string;
  /** Server-provided `detail` (or IMS `error_description`) */
  detail?: string;
  /** Parsed response body, or its raw text when it was not JSON */
  body?: unknown;
}

/**
 * Error representing a non-2xx response from the platform that is not
 * classified as an {@link AuthError} or {@link NotFoundError}.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  static name = 'ApiError';
  /** Internal details of the response */
  #details: ApiErrorDetails;

  /** Creates a new instance of an ApiError wrapping the status and server message */
  constructor(message: string, details: ApiErrorDetails, opts?: ErrorOptions) {
    super(message, opts);
    this.#details = details;
  }

  /** HTTP status code, `undefined` for a `find` that matched nothing */
  get status(): number | undefined {
    return this.#details.status;
  }

  /** Server-provided title, verbatim */
  get title(): string | undefined {
    return this.#details.title;
  }

  /** Server-provided detail, verbatim */
  get detail(): string | undefined {
    return this.#details.detail;
  }

  /** Response body */
  get body(): unknown {
    return this.#details.body;
  }
}

/**
 * Type guard for {@link ApiError}; also matches its subclasses.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): null | ApiError {
  return unwrapErrorType(ApiError, error);
}
