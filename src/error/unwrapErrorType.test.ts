import { describe, expect, it } from 'vitest';
import { ApiError } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { NotFoundError } from './notFoundError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

class TargetError extends Error {}

class OtherError extends Error {}

describe('unwrapErrorType', () => {
  it('returns null for non-error values', () => {
    expect(unwrapErrorType(TargetError, { message: 'not an error' })).toBeNull();
    expect(unwrapErrorType(TargetError, 'boom')).toBeNull();
    expect(unwrapErrorType(TargetError, null)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new TargetError('target');

    expect(unwrapErrorType(TargetError, err)).toBe(err);
  });

  it('follows the cause chain several layers deep', () => {
    const err = new TargetError('target');
    const wrapped = new Error('outer', { cause: new OtherError('middle', { cause: new Error('inner', { cause: err }) }) });

    expect(unwrapErrorType(TargetError, wrapped)).toBe(err);
  });

  it('returns the outermost match', () => {
    const inner = new TargetError('inner');
    const outer = new TargetError('outer', { cause: inner });

    expect(unwrapErrorType(TargetError, outer)).toBe(outer);
  });

  it('stops at a non-error cause', () => {
    const wrapped = new Error('outer', { cause: 'a string cause' });

    expect(unwrapErrorType(TargetError, wrapped)).toBeNull();
  });

  it('matches subclasses against their base class', () => {
    const err = new NotFoundError('missing', { status: 404 });
    const wrapped = new Error('outer', { cause: err });

    expect(unwrapErrorType(ApiError, wrapped)).toBe(err);
    expect(unwrapErrorType(NotFoundError, new ApiError('plain', { status: 500 }))).toBeNull();
  });
});

describe('isErrorType', () => {
  it('is true anywhere along the chain', () => {
    const wrapped = new Error('outer', { cause: new TargetError('target') });

    expect(isErrorType(TargetError, wrapped)).toBe(true);
    expect(isErrorType(OtherError, wrapped)).toBe(false);
  });
});
