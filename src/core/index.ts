/**
 * Core entrypoint: exports the typed platform client and request definitions.
 * @module
 */

/**
 * Constructor and runtime options accepted by {@link PlatformClient}.
 */
export type { PlatformClientConfig, PlatformClientProps, PlatformIdentity } from './client.js';

/**
 * Typed HTTP client for platform services, signing requests with a bearer token.
 */
export { DEFAULT_ACCEPT, PlatformClient } from './client.js';

/**
 * RequestDefinitions types up the possible variations of
 * the endpoints we create
 */
export type { RequestDefinitions } from './types.js';

/**
 * Default fetch provider, and the contract a custom `fetchProvider` implements.
 */
export { FetchClient } from '../fetch/client.js';
export type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  Logger,
  RequestOptions,
} from '../types/request.js';
