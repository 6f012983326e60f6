import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper; a `null` value removes a default header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null>;

/** Options to pass in for each fetch request */
export interface FetchOptions extends Omit<RequestInit, 'headers'> {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Per-call options accepted by the platform client. */
export interface RequestOptions {
  /** Headers merged over the client defaults (e.g. a resource-specific `Accept`). */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
}

/** Minimal logger used when `debug` is enabled. */
export interface Logger {
  /** One line per completed request */
  debug: (message: string) => void;
  /** Server-provided error messages */
  warn: (message: string) => void;
}

/** Contract for HTTP client implementations used by the platform and token clients. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, Response>;
  /** Executes a PATCH request. */
  patch: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, Response>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts?: FetchClientOptions): FetchClientProviderDefinition;
}
