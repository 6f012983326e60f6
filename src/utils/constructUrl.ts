import type { StandardSchemaV1 } from '@standard-schema/spec';
import { validator } from './validator.js';
import type { SafeWrapAsync } from './wrap.js';

/** Encodes a primitive path or query value, skipping anything that is not one. */
function primitive(value: unknown): string | null {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  return null;
}

/**
 * Constructs a relative URL from an endpoint template such as
 * `/data/foundation/schemaregistry/{container}/{resource}/{id}`.
 *
 * - `{key}` segments are replaced by the URI-encoded value of `params[key]`.
 * - `params.$search` becomes the query string, validated against `searchSchema` when
 *   `validate` is set; `null`/`undefined` entries are dropped.
 * - The leading slash is stripped so the result joins cleanly with a base URL.
 */
export async function constructUrl(
  path: string,
  params: unknown,
  searchSchema: StandardSchemaV1 | undefined,
  validate: boolean,
): SafeWrapAsync<Error, string> {
  const searchParams = new URLSearchParams();
  let result = path;

  if (typeof params === 'object' && params !== null) {
    for (const [key, value] of Object.entries(params)) {
      if (key === '$search') {
        continue;
      }

      const encoded = primitive(value);
      if (encoded !== null) {
        result = result.replaceAll(`{${key}}`, encodeURIComponent(encoded));
      }
    }

    if ('$search' in params && params.$search !== undefined) {
      let search: unknown = params.$search;
      if (validate && searchSchema) {
        const [errParse, parsed] = await validator(search, searchSchema);
        if (errParse) {
          return [new Error('error validating search params', { cause: errParse }), null];
        }

        search = parsed;
      }

      if (typeof search === 'object' && search !== null) {
        for (const [key, value] of Object.entries(search)) {
          const encoded = primitive(value);
          if (encoded !== null) {
            searchParams.set(key, encoded);
          }
        }
      }
    }
  }

  if (result.includes('{') || result.includes('}')) {
    return [new Error(`error constructing URL, unreplaced params in ${result}`), null];
  }

  if (result.startsWith('/')) {
    result = result.substring(1);
  }

  const query = searchParams.toString();
  return [null, query ? `${result}?${query}` : result];
}
