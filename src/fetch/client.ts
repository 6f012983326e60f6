import type { FetchClientProviderDefinition, FetchOptions } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { responseError } from './responseError.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} wrapper. */
export type FetchClientOptions = Pick<FetchOptions, 'headers'>;

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}, with non-2xx responses
 *   converted by {@link responseError}.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default fetch options. */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default fetch options; headers are merged with the existing ones.
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /** Executes a GET request against the given endpoint. */
  public get(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'GET', body: undefined });
  }

  /** Executes a POST request against the given endpoint. */
  public post(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'POST' });
  }

  /** Executes a PATCH request against the given endpoint. */
  public patch(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'PATCH' });
  }

  /** Executes a DELETE request against the given endpoint. */
  public delete(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'DELETE', body: undefined });
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * - Network / fetch errors (including aborts and timeouts) are wrapped in `Error`.
   * - Non-2xx responses become an `ApiError` (or `AuthError`/`NotFoundError`).
   */
  async #request(endpoint: string, opts: FetchOptions & { method: string }): SafeWrapAsync<Error, Response> {
    const path = endpoint.replace(/^\//, '');
    const [err, res] = await safeWrapAsync(() =>
      fetch(`${this.#baseUrl}${path}`, {
        body: opts.body,
        method: opts.method,
        headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${opts.method} request in fetchClient`, { cause: err }), null];
    }

    if (!res.ok) {
      return [await responseError(res, opts.method, `/${path}`), null];
    }

    return [null, res];
  }
}
