import { safeWrap } from './wrap.js';

/**
 * Attempts to parse a string as JSON, returning the input unchanged when it is not JSON.
 * Used on error bodies, which the platform does not always send as JSON.
 */
export function tryParse(input: string): unknown {
  const [errParsed, parsed] = safeWrap<Error, unknown>(() => JSON.parse(input));
  if (errParsed) {
    return input;
  }

  return parsed;
}
