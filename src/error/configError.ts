import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a credentials file is missing, malformed or incomplete.
 */
export class ConfigError extends Error {
  /** ConfigError error-name */
  static name = 'ConfigError';
  /** Internal path of the offending file */
  #path: string;

  /** Creates a new instance of a ConfigError for the given file path */
  constructor(message: string, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#path = path;
  }

  /** Path of the credentials file that failed to load */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link ConfigError}.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return isErrorType(ConfigError, error);
}

/**
 * Extract a {@link ConfigError} from an unknown error value, following nested causes.
 */
export function getConfigError(error: unknown): null | ConfigError {
  return unwrapErrorType(ConfigError, error);
}
