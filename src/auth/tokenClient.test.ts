import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { getApiError } from '../error/apiError.js';
import { getAuthError, isAuthError } from '../error/authError.js';
import type { Credentials } from './credentials.js';
import { TokenClient } from './tokenClient.js';

const credentials: Credentials = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  orgId: 'TESTORG@AdobeOrg',
  scopes: ['openid', 'AdobeID'],
};

const tokenResponse = (token: string, expiresIn = 3600) =>
  new Response(JSON.stringify({ access_token: token, token_type: 'bearer', expires_in: expiresIn }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });

describe('TokenClient', () => {
  let mockedFetch: MockedFunction<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it('requests a token with the client-credentials grant', async () => {
    mockedFetch.mockResolvedValueOnce(tokenResponse('token-1'));
    const client = new TokenClient({ credentials });

    const [err, token] = await client.token();

    expect(err).toBeNull();
    expect(token).toBe('token-1');
    expect(mockedFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockedFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://ims-na1.adobelogin.com/ims/token/v3');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(
      'grant_type=client_credentials&client_id=test-client&client_secret=test-secret&scope=openid%2CAdobeID',
    );
    expect(new Headers(init?.headers).get('Content-Type')).toBe('application/x-www-form-urlencoded');
  });

  it('uses a custom IMS host', async () => {
    mockedFetch.mockResolvedValueOnce(tokenResponse('token-1'));
    const client = new TokenClient({ credentials, imsUrl: 'https://ims.test' });

    await client.token();

    expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://ims.test/ims/token/v3');
  });

  it('reuses the cached token until one minute before expiry', async () => {
    vi.useFakeTimers();
    mockedFetch.mockImplementationOnce(() => Promise.resolve(tokenResponse('token-1')));
    mockedFetch.mockImplementationOnce(() => Promise.resolve(tokenResponse('token-2')));
    const client = new TokenClient({ credentials });

    const [, first] = await client.token();
    vi.setSystemTime(Date.now() + 3_539_000);
    const [, second] = await client.token();
    vi.setSystemTime(Date.now() + 1_000);
    const [, third] = await client.token();

    expect(first).toBe('token-1');
    expect(second).toBe('token-1');
    expect(third).toBe('token-2');
    expect(mockedFetch).toHaveBeenCalledTimes(2);
  });

  it('shares one in-flight request between concurrent callers', async () => {
    mockedFetch.mockResolvedValueOnce(tokenResponse('token-1'));
    const client = new TokenClient({ credentials });

    const results = await Promise.all([client.token(), client.token(), client.token()]);

    expect(results).toEqual([
      [null, 'token-1'],
      [null, 'token-1'],
      [null, 'token-1'],
    ]);
    expect(mockedFetch).toHaveBeenCalledTimes(1);
  });

  it('requests a new token after invalidate', async () => {
    mockedFetch.mockImplementationOnce(() => Promise.resolve(tokenResponse('token-1')));
    mockedFetch.mockImplementationOnce(() => Promise.resolve(tokenResponse('token-2')));
    const client = new TokenClient({ credentials });

    await client.token();
    client.invalidate();
    const [, token] = await client.token();

    expect(token).toBe('token-2');
  });

  it('maps a rejected grant to AuthError', async () => {
    mockedFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ error: 'invalid_client', error_description: 'invalid client_secret parameter' }), {
        status: 400,
        headers: { 'Content-Type': 'application/json' },
      }),
    );
    const client = new TokenClient({ credentials });

    const [err, token] = await client.token();

    expect(token).toBeNull();
    expect(isAuthError(err)).toBe(true);
    expect(getAuthError(err)?.status).toBe(400);
    expect(getAuthError(err)?.title).toBe('invalid_client');
    expect(getAuthError(err)?.detail).toBe('invalid client_secret parameter');
  });

  it('keeps other failures as ApiError and clears the pending slot', async () => {
    mockedFetch.mockImplementationOnce(() => Promise.resolve(new Response('unavailable', { status: 503 })));
    mockedFetch.mockImplementationOnce(() => Promise.resolve(tokenResponse('token-2')));
    const client = new TokenClient({ credentials });

    const [err] = await client.token();
    const [, token] = await client.token();

    expect(isAuthError(err)).toBe(false);
    expect(getApiError(err)?.status).toBe(503);
    expect(token).toBe('token-2');
  });

  it('rejects a malformed token response', async () => {
    mockedFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ token_type: 'bearer' }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      }),
    );
    const client = new TokenClient({ credentials });

    const [err] = await client.token();

    expect(err?.message).toBe('error obtaining access token');
    expect(err?.cause).toHaveProperty('message', 'error validating token response');
  });
});
