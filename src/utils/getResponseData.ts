import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads and parses a response body.
 *
 * - 204/205 and empty bodies resolve to `null`.
 * - `application/json` and `+json` content types (the registry answers with
 *   `application/vnd.adobe.xed+json`) are parsed as JSON.
 * - Anything else resolves to the body text.
 */
export async function getResponseData(response: Response): SafeWrapAsync<Error, unknown> {
  // 204 and 205 carry no body
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const contentType = response.headers.get('Content-Type')?.toLowerCase();
  if (!contentType?.includes('application/json') && !contentType?.includes('+json')) {
    return [null, text];
  }

  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
