import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isAmbiguousMatchError } from '../error/ambiguousMatchError.js';
import { getApiError } from '../error/apiError.js';
import { isInvalidRefError } from '../error/invalidRefError.js';
import { getNotFoundError, isNotFoundError } from '../error/notFoundError.js';
import { getValidationError } from '../error/validationError.js';
import { createTestContext } from '../testing/context.js';
import { FakeRegistry } from '../testing/fakeRegistry.js';
import { PROFILE_REF, seedProfile } from '../testing/fixtures.js';
import { describeQuery, isResource, queryFilter, ResourceCollection } from './collection.js';
import type { Resource } from './resource.js';
import { Schema } from './schema.js';

const LISTING = '/data/foundation/schemaregistry/tenant/schemas';

describe('ResourceCollection', () => {
  let registry: FakeRegistry;

  const schemas = (container?: 'tenant' | 'global') =>
    new ResourceCollection({ context: createTestContext(), types: ['schemas'], container, guard: isResource });

  beforeEach(() => {
    registry = new FakeRegistry();
    seedProfile(registry);
    vi.stubGlobal('fetch', registry.fetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('findAll', () => {
    it('lists the tenant container before the global one', async () => {
      registry.addTenant('schemas', { title: 'Loyalty Members', allOf: [{ $ref: PROFILE_REF }] });
      registry.addGlobal('schemas', {
        $id: 'https://ns.adobe.com/xdm/schemas/computed-attributes',
        'meta:altId': '_xdm.schemas.computed-attributes',
        title: 'Computed Attributes',
      });

      const [err, resources] = await schemas().findAll();

      expect(err).toBeNull();
      expect(resources?.map((resource) => resource.id)).toEqual([
        '_acme.schemas.000000000001',
        '_xdm.schemas.computed-attributes',
      ]);
      expect(resources?.map((resource) => resource.title)).toEqual(['Loyalty Members', 'Computed Attributes']);
      expect(registry.requests.map((request) => request.path)).toEqual([
        LISTING,
        '/data/foundation/schemaregistry/global/schemas',
      ]);
      expect(registry.requests[0]?.headers.get('Accept')).toBe('application/vnd.adobe.xed-id+json');
    });

    it('follows pagination until the last page', async () => {
      registry = new FakeRegistry({ pageSize: 2 });
      vi.stubGlobal('fetch', registry.fetch);
      for (const title of ['One', 'Two', 'Three']) {
        registry.addTenant('schemas', { title });
      }

      const [err, resources] = await schemas('tenant').findAll();

      expect(err).toBeNull();
      expect(resources?.map((resource) => resource.title)).toEqual(['One', 'Two', 'Three']);
      expect(registry.requestsTo(LISTING).map((request) => request.search.get('start'))).toEqual([null, '2']);
    });

    it('sends the query as a property filter', async () => {
      registry.addTenant('schemas', { title: 'Alpha' });
      registry.addTenant('schemas', { title: 'Beta' });

      const [err, resources] = await schemas('tenant').findAll({ title: 'Beta' });

      expect(err).toBeNull();
      expect(resources?.map((resource) => resource.id)).toEqual(['_acme.schemas.000000000002']);
      expect(registry.requests[0]?.search.get('property')).toBe('title==Beta');
    });

    it('wraps listing failures with the container and type', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ title: 'Server Error', detail: 'boom' }), {
          status: 500,
        })),
      );

      const [err, resources] = await schemas().findAll();

      expect(resources).toBeNull();
      expect(err?.message).toBe('error listing tenant schemas');
      expect(getApiError(err)?.status).toBe(500);
      expect(getApiError(err)?.detail).toBe('boom');
    });
  });

  describe('find', () => {
    it('returns the single match in full form', async () => {
      registry.addTenant('schemas', { title: 'Loyalty Members', allOf: [{ $ref: PROFILE_REF }] });

      const [err, schema] = await schemas('tenant').find({ title: 'Loyalty Members' });

      expect(err).toBeNull();
      expect(schema?.id).toBe('_acme.schemas.000000000001');
      expect(Object.keys(schema?.properties ?? {})).toEqual(['_id', '_repo', 'createdByBatchID', 'person']);
      expect(registry.requests[0]?.headers.get('Accept')).toBe('application/vnd.adobe.xed-full+json');
    });

    it('fails with a NotFoundError when nothing matches', async () => {
      const [err, schema] = await schemas('tenant').find({ title: 'Missing' });

      expect(schema).toBeNull();
      expect(isNotFoundError(err)).toBe(true);
      expect(err?.message).toBe('error no resource matches title==Missing');
      expect(getNotFoundError(err)?.status).toBeUndefined();
    });

    it('rejects values that would split into other filters', async () => {
      registry.addTenant('schemas', { title: 'Gold, Silver' });

      const [err, schema] = await schemas('tenant').find({ title: 'Gold, Silver' });

      expect(schema).toBeNull();
      expect(getValidationError(err)?.issues).toEqual([{ message: 'must not contain "," or "=="', path: ['title'] }]);
      expect(registry.requests).toHaveLength(0);
    });

    it('describes an empty query', async () => {
      const [err] = await schemas('tenant').find({});

      expect(err?.message).toBe('error no resource matches any attributes');
    });

    it('fails with an AmbiguousMatchError when several match', async () => {
      registry.addTenant('schemas', { title: 'Twin' });
      registry.addTenant('schemas', { title: 'Twin' });

      const [err, schema] = await schemas('tenant').find({ title: 'Twin' });

      expect(schema).toBeNull();
      expect(isAmbiguousMatchError(err)).toBe(true);
      expect(isAmbiguousMatchError(err) && err.count).toBe(2);
      expect(err?.message).toBe('error 2 resources match title==Twin');
    });
  });

  describe('get', () => {
    it('fetches by meta:altId or $id in full form', async () => {
      registry.addTenant('schemas', { title: 'Loyalty Members', allOf: [{ $ref: PROFILE_REF }] });

      const [errAlt, byAltId] = await schemas().get('_acme.schemas.000000000001');
      const [errId, byId] = await schemas().get('https://ns.adobe.com/acme/schemas/000000000001');

      expect(errAlt).toBeNull();
      expect(errId).toBeNull();
      expect(byAltId?.state).toBe('persisted');
      expect(byAltId?.title).toBe('Loyalty Members');
      expect(byId?.ref).toBe('https://ns.adobe.com/acme/schemas/000000000001');
      expect(byAltId?.properties._id).toEqual({ title: 'Identifier', type: 'string', format: 'uri-reference' });
      expect(registry.requests[0]?.path).toBe('/data/foundation/schemaregistry/tenant/schemas/_acme.schemas.000000000001');
      expect(registry.requests[0]?.headers.get('Accept')).toBe('application/vnd.adobe.xed-full+json; version=1');
    });

    it('rejects a reference outside the scoped container', async () => {
      const [err, schema] = await schemas('global').get('_acme.schemas.000000000001');

      expect(schema).toBeNull();
      expect(isInvalidRefError(err)).toBe(true);
      expect(err?.message).toBe('error ref "_acme.schemas.000000000001" is not in the global container');
      expect(registry.requests).toHaveLength(0);
    });

    it('rejects a reference of another type', async () => {
      const [err] = await schemas().get('_acme.classes.000000000009');

      expect(isInvalidRefError(err)).toBe(true);
      expect(err?.message).toBe('error ref "_acme.classes.000000000009" is of type classes, expected schemas');
    });

    it('rejects a handle the guard does not accept', async () => {
      const onlySchemas = new ResourceCollection({
        context: createTestContext(),
        types: ['schemas', 'classes'],
        guard: (resource: Resource): resource is Schema => resource instanceof Schema,
      });

      const [err] = await onlySchemas.get('_xdm.context.profile');

      expect(err?.message).toBe('error ref "_xdm.context.profile" does not belong to this collection');
    });

    it('surfaces a 404 as a NotFoundError', async () => {
      const [err, schema] = await schemas().get('_acme.schemas.0000000000ff');

      expect(schema).toBeNull();
      expect(err?.message).toBe('error refreshing _acme.schemas.0000000000ff');
      expect(getNotFoundError(err)?.status).toBe(404);
      expect(getNotFoundError(err)?.detail).toBe('No such resource _acme.schemas.0000000000ff');
    });
  });

  it('lists its containers', () => {
    expect(schemas().containers).toEqual(['tenant', 'global']);
    expect(schemas('global').containers).toEqual(['global']);
    expect(schemas().container).toBeNull();
    expect(schemas().types).toEqual(['schemas']);
  });
});

describe('describeQuery', () => {
  it('joins attributes as key==value pairs', () => {
    expect(describeQuery({ title: 'Loyalty', version: 1, 'meta:abstract': false })).toBe(
      'title==Loyalty,version==1,meta:abstract==false',
    );
  });

  it('is undefined for an empty query', () => {
    expect(describeQuery({})).toBeUndefined();
  });
});

describe('queryFilter', () => {
  it('formats a plain query', () => {
    expect(queryFilter({ title: 'Loyalty', version: 1 })).toEqual([null, 'title==Loyalty,version==1']);
  });

  it('flags every key or value holding a separator', () => {
    const [err, filter] = queryFilter({ title: 'a==b', 'x,y': 'z', description: 'fine' });

    expect(filter).toBeNull();
    expect(err?.issues.map((issue) => issue.path)).toEqual([['title'], ['x,y']]);
  });
});
