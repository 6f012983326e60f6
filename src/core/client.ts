import type { TokenSource } from '../auth/tokenClient.js';
import { AbortError } from '../error/abortError.js';
import { getApiError } from '../error/apiError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  Logger,
  RequestOptions,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { getResponseData } from '../utils/getResponseData.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type {
  DeleteArgs,
  DeleteEndpoint,
  DeleteReturn,
  EndpointsWithMethod,
  GetArgs,
  GetEndpoint,
  GetReturn,
  HttpMethod,
  Params,
  PatchArgs,
  PatchEndpoint,
  PatchReturn,
  PostArgs,
  PostEndpoint,
  PostReturn,
  RequestDefinitions,
} from './types.js';

/** Default `Accept` header of the registry (standard XDM form). */
export const DEFAULT_ACCEPT = 'application/vnd.adobe.xed+json; version=1';

/** Identity headers of the integration. */
export interface PlatformIdentity {
  /** Client ID, sent as `x-api-key` */
  apiKey: string;
  /** IMS organization, sent as `x-gw-ims-org-id` */
  orgId: string;
}

/** Runtime-adjustable options of the {@link PlatformClient}. */
export interface PlatformClientConfig {
  /**
   * Sandbox sent as `x-sandbox-name`.
   * @default 'prod'
   */
  sandbox?: string;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
  /** Extra headers merged into every request; `null` removes one. */
  headers?: HeaderOptions;
  /**
   * Log one line per request through `logger`.
   * @default false
   */
  debug?: boolean;
  /**
   * Logger used when `debug` is enabled.
   * @default console
   */
  logger?: Logger;
}

/** Configuration for constructing a typed {@link PlatformClient}. */
export interface PlatformClientProps<Schema extends RequestDefinitions> extends PlatformClientConfig {
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Platform host (e.g. `https://platform.adobe.io`). */
  baseUrl: string;
  /** Map of endpoint definitions describing the schemas of each endpoint key. */
  endpoints: Schema;
  /** Source of bearer tokens. */
  tokens: TokenSource;
  /** Identity headers. */
  identity: PlatformIdentity;
}

/**
 * Typed HTTP client for Experience Platform services that:
 * - constructs URLs based on endpoint definitions,
 * - signs every request with a bearer token and the integration's identity headers,
 * - validates request and response payloads with the endpoint schemas.
 *
 * A 401 invalidates the token and repeats the request once; nothing else is retried.
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 *
 * @typeParam Schema - The map of endpoint definitions available to the client.
 */
export class PlatformClient<Schema extends RequestDefinitions> {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Endpoint schema definitions for this client. */
  #endpoints: Schema;
  /** Token source for the `Authorization` header. */
  #tokens: TokenSource;
  /** Current sandbox. */
  #sandbox: string;
  /** Default request timeout in milliseconds. */
  #timeout: number | false;
  /** Request logging switch. */
  #debug: boolean;
  /** Logger used when debugging. */
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController: AbortController;

  /**
   * Creates a typed PlatformClient over the given fetch provider.
   */
  constructor({
    fetchProvider = FetchClient,
    baseUrl,
    endpoints,
    tokens,
    identity,
    sandbox = 'prod',
    timeout = 60_000,
    headers,
    debug = false,
    logger = console,
  }: PlatformClientProps<Schema>) {
    this.#endpoints = endpoints;
    this.#tokens = tokens;
    this.#sandbox = sandbox;
    this.#timeout = timeout;
    this.#debug = debug;
    this.#logger = logger;
    this.#abortController = new AbortController();
    this.#fetchClient = new fetchProvider(baseUrl, {
      headers: mergeHeaderOptions(
        {
          Accept: DEFAULT_ACCEPT,
          'x-api-key': identity.apiKey,
          'x-gw-ims-org-id': identity.orgId,
          'x-sandbox-name': sandbox,
        },
        headers,
      ),
    });
  }

  /** Sandbox the client currently targets. */
  get sandbox(): string {
    return this.#sandbox;
  }

  /**
   * Updates options at runtime; unspecified options keep their current value.
   */
  config(opts: PlatformClientConfig) {
    const { sandbox, timeout, headers, debug, logger } = opts;
    if (timeout !== undefined) {
      this.#timeout = timeout;
    }

    if (debug !== undefined) {
      this.#debug = debug;
    }

    if (logger) {
      this.#logger = logger;
    }

    if (sandbox) {
      this.#sandbox = sandbox;
    }

    if (sandbox || headers) {
      this.#fetchClient.config({
        headers: mergeHeaderOptions(headers, sandbox ? { 'x-sandbox-name': sandbox } : undefined),
      });
    }
  }

  /**
   * Aborts every in-flight request. Requests issued afterwards fail immediately.
   */
  dispose() {
    this.#abortController.abort(new AbortError('client was disposed'));
  }

  /**
   * Performs a typed GET request against a configured endpoint.
   */
  get<Endpoint extends GetEndpoint<Schema>>(
    ...args: GetArgs<Schema, Endpoint>
  ): SafeWrapAsync<Error, GetReturn<Schema, Endpoint>> {
    const [endpoint, params, opts = {}] = args;
    return this.#execute<'get', Endpoint, GetReturn<Schema, Endpoint>>('get', endpoint, params, opts);
  }

  /**
   * Performs a typed POST request; the body is validated with the endpoint `request` schema.
   */
  post<Endpoint extends PostEndpoint<Schema>>(
    ...args: PostArgs<Schema, Endpoint>
  ): SafeWrapAsync<Error, PostReturn<Schema, Endpoint>> {
    const [endpoint, params, data, opts = {}] = args;
    return this.#execute<'post', Endpoint, PostReturn<Schema, Endpoint>>('post', endpoint, params, opts, data);
  }

  /**
   * Performs a typed PATCH request; the body is sent as `application/json-patch+json`.
   */
  patch<Endpoint extends PatchEndpoint<Schema>>(
    ...args: PatchArgs<Schema, Endpoint>
  ): SafeWrapAsync<Error, PatchReturn<Schema, Endpoint>> {
    const [endpoint, params, data, opts = {}] = args;
    return this.#execute<'patch', Endpoint, PatchReturn<Schema, Endpoint>>('patch', endpoint, params, opts, data);
  }

  /**
   * Performs a typed DELETE request.
   */
  delete<Endpoint extends DeleteEndpoint<Schema>>(
    ...args: DeleteArgs<Schema, Endpoint>
  ): SafeWrapAsync<Error, DeleteReturn<Schema, Endpoint>> {
    const [endpoint, params, opts = {}] = args;
    return this.#execute<'delete', Endpoint, DeleteReturn<Schema, Endpoint>>('delete', endpoint, params, opts);
  }

  /**
   * Core execution pipeline for typed endpoints.
   *
   * - Builds the URL from schemas and validates the request payload.
   * - Issues the request, then parses and validates the response.
   */
  async #execute<Method extends HttpMethod, Endpoint extends EndpointsWithMethod<Method, Schema> & string, ResponseType>(
    method: Method,
    endpoint: Endpoint,
    params: Params<Schema, Endpoint, Method>,
    opts: RequestOptions,
    rawData?: unknown,
  ): SafeWrapAsync<Error, ResponseType> {
    const schemas = this.#endpoints[endpoint]?.[method];
    if (!schemas) {
      return [new Error(`error no schemas found for ${endpoint}`), null];
    }

    const [errUrl, url] = await constructUrl(endpoint, params, schemas.$search, true);
    if (errUrl) {
      return [new Error(`error constructing URL in ${method}`, { cause: errUrl }), null];
    }

    let data = rawData;
    if ('request' in schemas && schemas.request) {
      const [errParse, parsed] = await validator(data, schemas.request);
      if (errParse) {
        return [new Error(`error parsing request in ${method}`, { cause: errParse }), null];
      }

      data = parsed;
    }

    const { timeout, ...fetchOptions } = opts;
    const requestOptions: FetchOptions = { ...fetchOptions };
    if (data !== undefined) {
      requestOptions.body = JSON.stringify(data);
      requestOptions.headers = mergeHeaderOptions(
        { 'Content-Type': method === 'patch' ? 'application/json-patch+json' : 'application/json' },
        requestOptions.headers,
      );
    }

    const [errReq, result] = await this.#request(method, url, requestOptions, timeout ?? this.#timeout);
    if (errReq) {
      return [new Error(`error doing request in ${method}`, { cause: errReq }), null];
    }

    const [errValidate, validated] = await validator(result, schemas.response);
    if (errValidate) {
      return [new Error(`error parsing response in ${method}`, { cause: errValidate }), null];
    }

    return [null, validated];
  }

  /**
   * Signs and sends a single request, then reads its body.
   *
   * - Merges the caller signal with a timeout signal and the disposal signal.
   * - A 401 invalidates the token and repeats the request once.
   */
  async #request(
    method: HttpMethod,
    url: string,
    opts: FetchOptions,
    timeoutMs: number | false,
    reauthenticated = false,
  ): SafeWrapAsync<Error, unknown> {
    const [errToken, token] = await this.#tokens.token();
    if (errToken) {
      return [new Error(`error getting token for ${method.toUpperCase()} in request`, { cause: errToken }), null];
    }

    const timeout = createTimeoutSignal(timeoutMs);
    const merged = mergeSignals([opts.signal, timeout?.signal, this.#abortController.signal]);
    const requestOptions = {
      ...opts,
      headers: mergeHeaderOptions(opts.headers, { Authorization: `Bearer ${token}` }),
      ...(merged && { signal: merged.signal }),
    };
    const settle = () => {
      timeout?.clear();
      merged?.cleanup();
    };

    const [errWrapped, wrapped] = await safeWrapAsync(() => this.#fetchClient[method](url, requestOptions));
    if (errWrapped) {
      settle();
      return [new Error(`error calling request ${method.toUpperCase()} in request`, { cause: errWrapped }), null];
    }

    const [err, response] = wrapped;
    if (err) {
      settle();
      const apiError = getApiError(err);
      if (apiError) {
        this.#log(`${apiError.status} ${method.toUpperCase()} /${url}`);
        this.#warn(apiError.title, apiError.detail);
      }

      if (apiError?.status === 401 && !reauthenticated) {
        this.#tokens.invalidate();
        return this.#request(method, url, opts, timeoutMs, true);
      }

      return [new Error(`error request ${method.toUpperCase()} in request`, { cause: err }), null];
    }

    const [errResponse, result] = await getResponseData(response);
    settle();
    if (errResponse) {
      return [new Error(`error getting response in ${method.toUpperCase()}`, { cause: errResponse }), null];
    }

    this.#log(`${response.status} ${method.toUpperCase()} /${url}`);
    return [null, result];
  }

  #log(message: string) {
    if (this.#debug) {
      this.#logger.debug(message);
    }
  }

  #warn(title?: string, detail?: string) {
    if (this.#debug && (title || detail)) {
      this.#logger.warn([title, detail].filter(Boolean).join(': '));
    }
  }
}
