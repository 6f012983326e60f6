import type { HeaderOptions } from '../types/request.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map((pair): [string, unknown] => [String(pair[0]), pair[1]]);
  }

  return Object.entries(headers);
}

/**
 * Merge header sets left to right into a single `Headers` instance; later sets win and
 * a `null`/`undefined` value removes the header.
 */
export function mergeHeaderOptions(...sets: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const [key, value] of sets.flatMap((headers) => [...toEntries(headers)])) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}
