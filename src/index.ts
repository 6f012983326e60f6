/**
 * Root entrypoint for aep-registry: re-exports the api handle, the registry resources,
 * and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Options accepted by {@link Api}.
 */
export type { ApiOptions } from './api.js';

/**
 * Schema Registry handle, and a loader building one from a credentials file.
 */
export { Api, DEFAULT_BASE_URL, loadConfig } from './api.js';

/**
 * Credentials of a Developer Console project.
 */
export { type Credentials, loadCredentials, parseCredentials } from './auth/credentials.js';

/**
 * Runtime options of the platform client, accepted by `api.config()`.
 */
export type { PlatformClientConfig } from './core/client.js';

/**
 * Resource handles, collections and reference parsing.
 */
export {
  Behavior,
  BehaviorCollection,
  Class,
  ClassCollection,
  type ClassInput,
  type Container,
  DataType,
  DataTypeCollection,
  type DataTypeInput,
  FieldGroup,
  FieldGroupCollection,
  type FieldGroupInput,
  type FindOptions,
  parseRef,
  type PropertyDescriptor,
  type Query,
  Resource,
  type ResourceBody,
  ResourceCollection,
  type ResourceType,
  Schema,
  SchemaCollection,
  type SchemaInput,
  type SchemaRef,
  type Value,
} from './registry/index.js';

/**
 * Error thrown when a request is aborted via AbortController or `api.dispose()`.
 */
export { AbortError } from './error/abortError.js';

/**
 * Error thrown when `find` matches more than one resource.
 */
export { AmbiguousMatchError } from './error/ambiguousMatchError.js';

/**
 * Error representing a non-2xx platform response.
 */
export { ApiError } from './error/apiError.js';

/**
 * Error thrown when credentials are rejected.
 */
export { AuthError } from './error/authError.js';

/**
 * Error thrown when a credentials file cannot be loaded.
 */
export { ConfigError } from './error/configError.js';

/**
 * Error thrown when an identifier is not a registry reference.
 */
export { InvalidRefError } from './error/invalidRefError.js';

/**
 * Error thrown when a resource does not exist.
 */
export { NotFoundError } from './error/notFoundError.js';

/**
 * Error thrown for documented but unimplemented capabilities.
 */
export { NotSupportedError } from './error/notSupportedError.js';

/**
 * Error thrown when operating on an unsaved or deleted resource.
 */
export { StaleObjectError } from './error/staleObjectError.js';

/**
 * Error thrown when a request exceeds the configured timeout.
 */
export { TimeoutError } from './error/timeoutError.js';

/**
 * Error thrown when validation of payloads fails,
 * either the request payload or the response payload.
 */
export { ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';

/** Error-first result tuples returned by every fallible operation. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
