import { describe, expect, it } from 'vitest';
import { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';

describe('TimeoutError', () => {
  it('carries the timeout that elapsed', () => {
    const err = new TimeoutError('error request timed out after 250ms', 250);

    expect(err.timeout).toBe(250);
    expect(err.message).toBe('error request timed out after 250ms');
  });

  it('is found through wrapping errors', () => {
    const wrapped = new Error('error doing request in get', {
      cause: new Error('error wrapping GET request in fetchClient', { cause: new TimeoutError('timed out', 5) }),
    });

    expect(isTimeoutError(wrapped)).toBe(true);
    expect(getTimeoutError(wrapped)?.timeout).toBe(5);
  });

  it('ignores other errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
    expect(getTimeoutError(new Error('boom'))).toBeNull();
  });
});
