import { describe, expect, it } from 'vitest';
import { AmbiguousMatchError, getAmbiguousMatchError, isAmbiguousMatchError } from './ambiguousMatchError.js';
import { ConfigError, getConfigError, isConfigError } from './configError.js';
import { getInvalidRefError, InvalidRefError, isInvalidRefError } from './invalidRefError.js';
import { getNotSupportedError, isNotSupportedError, NotSupportedError } from './notSupportedError.js';
import { getStaleObjectError, isStaleObjectError, StaleObjectError } from './staleObjectError.js';

describe('ConfigError', () => {
  it('exposes the file path', () => {
    const err = new ConfigError('error reading credentials', '/tmp/creds.json');

    expect(err.path).toBe('/tmp/creds.json');
    expect(isConfigError(new Error('outer', { cause: err }))).toBe(true);
    expect(getConfigError(new Error('outer', { cause: err }))).toBe(err);
    expect(isConfigError(new Error('boom'))).toBe(false);
  });
});

describe('StaleObjectError', () => {
  it('exposes the state the resource was in', () => {
    const err = new StaleObjectError('resource was deleted', 'deleted');

    expect(err.state).toBe('deleted');
    expect(isStaleObjectError(err)).toBe(true);
    expect(getStaleObjectError(new Error('outer', { cause: err }))?.state).toBe('deleted');
  });
});

describe('NotSupportedError', () => {
  it('exposes the capability', () => {
    const err = new NotSupportedError('fields are not supported', 'schema.fields');

    expect(err.capability).toBe('schema.fields');
    expect(isNotSupportedError(err)).toBe(true);
    expect(getNotSupportedError(new Error('outer', { cause: err }))).toBe(err);
  });
});

describe('AmbiguousMatchError', () => {
  it('exposes the match count', () => {
    const err = new AmbiguousMatchError('multiple resources matched', 3);

    expect(err.count).toBe(3);
    expect(isAmbiguousMatchError(err)).toBe(true);
    expect(getAmbiguousMatchError(new Error('outer', { cause: err }))?.count).toBe(3);
  });
});

describe('InvalidRefError', () => {
  it('exposes the reference', () => {
    const err = new InvalidRefError('unable to parse ref', 'not-a-ref');

    expect(err.ref).toBe('not-a-ref');
    expect(isInvalidRefError(err)).toBe(true);
    expect(getInvalidRefError(new Error('outer', { cause: err }))?.ref).toBe('not-a-ref');
  });
});
