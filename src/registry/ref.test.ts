import { describe, expect, it } from 'vitest';
import { getInvalidRefError } from '../error/invalidRefError.js';
import { globalRef, parseRef, typeFromSegment } from './ref.js';

describe('parseRef', () => {
  it('parses a tenant $id', () => {
    expect(parseRef('https://ns.adobe.com/acme/schemas/7a5416d13572')).toEqual([
      null,
      {
        container: 'tenant',
        type: 'schemas',
        tenant: 'acme',
        uuid: '7a5416d13572',
        id: '_acme.schemas.7a5416d13572',
        ref: 'https://ns.adobe.com/acme/schemas/7a5416d13572',
      },
    ]);
  });

  it('parses a tenant meta:altId with a legacy type segment', () => {
    const [err, ref] = parseRef('_acme.mixins.f7d78220431');

    expect(err).toBeNull();
    expect(ref?.type).toBe('fieldgroups');
    expect(ref?.id).toBe('_acme.mixins.f7d78220431');
    expect(ref?.ref).toBe('https://ns.adobe.com/acme/mixins/f7d78220431');
  });

  it('resolves well-known global resources from either form', () => {
    const expected = {
      container: 'global',
      type: 'classes',
      tenant: null,
      uuid: 'xdm.context.profile',
      id: '_xdm.context.profile',
      ref: 'https://ns.adobe.com/xdm/context/profile',
    };

    expect(parseRef('_xdm.context.profile')).toEqual([null, expected]);
    expect(parseRef('https://ns.adobe.com/xdm/context/profile')).toEqual([null, expected]);
    expect(parseRef('http://ns.adobe.com/xdm/context/profile')).toEqual([null, expected]);
  });

  it('resolves behaviors from the data segment', () => {
    const [, ref] = parseRef('https://ns.adobe.com/xdm/data/time-series');

    expect(ref?.type).toBe('behaviors');
    expect(ref?.container).toBe('global');
  });

  it('resolves an unknown global ref only with a single expected type', () => {
    const [errNoHint] = parseRef('https://ns.adobe.com/xdm/mixins/loyalty-details');
    const [err, ref] = parseRef('https://ns.adobe.com/xdm/mixins/loyalty-details', ['fieldgroups']);

    expect(errNoHint?.message).toBe('error unable to resolve ref "https://ns.adobe.com/xdm/mixins/loyalty-details"');
    expect(err).toBeNull();
    expect(ref).toEqual({
      container: 'global',
      type: 'fieldgroups',
      tenant: null,
      uuid: 'xdm.mixins.loyalty-details',
      id: '_xdm.mixins.loyalty-details',
      ref: 'https://ns.adobe.com/xdm/mixins/loyalty-details',
    });
  });

  it('rejects a ref of another type than expected', () => {
    const [err, ref] = parseRef('_acme.schemas.7a5416d13572', ['classes']);

    expect(ref).toBeNull();
    expect(err?.message).toBe('error ref "_acme.schemas.7a5416d13572" is of type schemas, expected classes');
    expect(getInvalidRefError(err)?.ref).toBe('_acme.schemas.7a5416d13572');
  });

  it.each(['not-a-ref', '_acme', '_acme..7a54', 'https://ns.adobe.com/'])('rejects %s', (input) => {
    const [err] = parseRef(input);

    expect(err?.message).toBe(`error unable to parse ref "${input}"`);
  });

  it('rejects a tenant-shaped ref with an unknown type segment', () => {
    const [err] = parseRef('_acme.widgets.7a54');

    expect(err?.message).toBe('error unable to resolve ref "_acme.widgets.7a54"');
  });
});

describe('globalRef', () => {
  it('builds the ref of a global resource', () => {
    expect(globalRef('behaviors', ['xdm', 'data', 'adhoc'])).toEqual({
      container: 'global',
      type: 'behaviors',
      tenant: null,
      uuid: 'xdm.data.adhoc',
      id: '_xdm.data.adhoc',
      ref: 'https://ns.adobe.com/xdm/data/adhoc',
    });
  });
});

describe('typeFromSegment', () => {
  it('maps legacy and current segments', () => {
    expect(typeFromSegment('mixins')).toBe('fieldgroups');
    expect(typeFromSegment('data')).toBe('behaviors');
    expect(typeFromSegment('constructor')).toBeNull();
  });
});
