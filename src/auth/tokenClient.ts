import { z } from 'zod';
import { getApiError } from '../error/apiError.js';
import { AuthError } from '../error/authError.js';
import { FetchClient } from '../fetch/client.js';
import type { FetchClientProvider, FetchClientProviderDefinition } from '../types/request.js';
import { getResponseData } from '../utils/getResponseData.js';
import { createTimeoutSignal } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { Credentials } from './credentials.js';

/** Source of bearer tokens for the platform client. */
export interface TokenSource {
  /** Returns a valid access token, requesting a new one when needed */
  token(): SafeWrapAsync<Error, string>;
  /** Drops the cached token so the next call requests a fresh one */
  invalidate(): void;
}

/** Configuration for constructing a {@link TokenClient}. */
export interface TokenClientProps {
  /** Credentials used for the client-credentials grant */
  credentials: Credentials;
  /**
   * IMS host.
   * @default 'https://ims-na1.adobelogin.com'
   */
  imsUrl?: string;
  /** HTTP client implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /**
   * Token request timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
}

/** Token endpoint response. */
const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().positive(),
});

/** Cached token and its expiry as epoch milliseconds. */
interface CachedToken {
  value: string;
  expiresAt: number;
}

/** Tokens are renewed this long before they expire. */
const REFRESH_MARGIN_MS = 60_000;

/**
 * Obtains access tokens from IMS through the OAuth Server-to-Server
 * (client-credentials) grant and caches them until shortly before expiry.
 *
 * Concurrent callers share a single in-flight token request.
 */
export class TokenClient implements TokenSource {
  /** HTTP provider pointed at the IMS host */
  #fetchClient: FetchClientProviderDefinition;
  /** Credentials for the grant */
  #credentials: Credentials;
  /** Request timeout */
  #timeout: number | false;
  /** Current token, if any */
  #cached: CachedToken | null = null;
  /** In-flight token request shared by concurrent callers */
  #pending: SafeWrapAsync<Error, string> | null = null;

  /** Creates a token client for the given credentials */
  constructor({
    credentials,
    imsUrl = 'https://ims-na1.adobelogin.com',
    fetchProvider = FetchClient,
    timeout = 60_000,
  }: TokenClientProps) {
    this.#credentials = credentials;
    this.#timeout = timeout;
    this.#fetchClient = new fetchProvider(imsUrl, { headers: { Accept: 'application/json' } });
  }

  /**
   * Returns the cached token while it is valid for at least another minute,
   * otherwise requests a new one.
   */
  token(): SafeWrapAsync<Error, string> {
    if (this.#cached && Date.now() < this.#cached.expiresAt - REFRESH_MARGIN_MS) {
      return Promise.resolve([null, this.#cached.value]);
    }

    if (this.#pending) {
      return this.#pending;
    }

    const pending = (async (): SafeWrapAsync<Error, string> => {
      const [err, token] = await this.#requestToken();
      this.#pending = null;
      if (err) {
        return [new Error('error obtaining access token', { cause: err }), null];
      }

      this.#cached = token;
      return [null, token.value];
    })();

    this.#pending = pending;
    return pending;
  }

  /** Drops the cached token. */
  invalidate() {
    this.#cached = null;
  }

  async #requestToken(): SafeWrapAsync<Error, CachedToken> {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.#credentials.clientId,
      client_secret: this.#credentials.clientSecret,
      scope: this.#credentials.scopes.join(','),
    });

    const timeout = createTimeoutSignal(this.#timeout);
    const [errRequest, response] = await this.#fetchClient.post('ims/token/v3', {
      body: body.toString(),
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      ...(timeout && { signal: timeout.signal }),
    });

    if (errRequest) {
      timeout?.clear();
      // IMS answers rejected client credentials with 400 `invalid_client`
      const apiError = getApiError(errRequest);
      if (apiError?.status === 400) {
        return [
          new AuthError(apiError.message, {
            status: apiError.status,
            title: apiError.title,
            detail: apiError.detail,
            body: apiError.body,
          }, { cause: errRequest }),
          null,
        ];
      }

      return [errRequest, null];
    }

    const [errData, data] = await getResponseData(response);
    timeout?.clear();
    if (errData) {
      return [new Error('error reading token response', { cause: errData }), null];
    }

    const [errValidate, parsed] = await validator(data, tokenResponseSchema);
    if (errValidate) {
      return [new Error('error validating token response', { cause: errValidate }), null];
    }

    return [null, { value: parsed.access_token, expiresAt: Date.now() + parsed.expires_in * 1000 }];
  }
}
