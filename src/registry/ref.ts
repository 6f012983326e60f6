import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { InvalidRefError } from '../error/invalidRefError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { type Container, RESOURCE_TYPES, type ResourceType } from './types.js';

/** A parsed registry reference. */
export interface SchemaRef {
  /** Container the resource lives in */
  container: Container;
  /** Resource type */
  type: ResourceType;
  /** Tenant namespace, `null` for global resources */
  tenant: string | null;
  /** Unique part of the identifier (dotted path for global resources) */
  uuid: string;
  /** `meta:altId`, e.g. `_acme.schemas.7a5416d13572` */
  id: string;
  /** `$id`, e.g. `https://ns.adobe.com/acme/schemas/7a5416d13572` */
  ref: string;
}

/** Path segments naming each resource type, including the legacy `mixins` and `data`. */
const TYPE_SEGMENTS: Record<string, ResourceType> = {
  schemas: 'schemas',
  classes: 'classes',
  mixins: 'fieldgroups',
  fieldgroups: 'fieldgroups',
  datatypes: 'datatypes',
  data: 'behaviors',
  behaviors: 'behaviors',
};

const globalsSchema = z.record(z.string(), z.object({ type: z.enum(RESOURCE_TYPES), ref: z.string().url() }));

/** Well-known global resources keyed by dotted uuid (`xdm.context.profile`). */
const GLOBAL_RESOURCES = globalsSchema.parse(
  JSON.parse(readFileSync(new URL('./globals.json', import.meta.url), 'utf8')),
);

const NAMESPACE = 'https://ns.adobe.com/';

/** Maps a path segment to its resource type. */
export function typeFromSegment(segment: string): ResourceType | null {
  return Object.hasOwn(TYPE_SEGMENTS, segment) ? (TYPE_SEGMENTS[segment] ?? null) : null;
}

/**
 * Builds the reference of a global resource from its path segments,
 * e.g. `['xdm', 'data', 'adhoc']`.
 */
export function globalRef(type: ResourceType, segments: readonly string[]): SchemaRef {
  const uuid = segments.join('.');
  return {
    container: 'global',
    type,
    tenant: null,
    uuid,
    id: `_${uuid}`,
    ref: GLOBAL_RESOURCES[uuid]?.ref ?? `${NAMESPACE}${segments.join('/')}`,
  };
}

function splitRef(input: string): string[] | null {
  if (/^https?:\/\//.test(input)) {
    const segments = input.replace(/^https?:\/\//, '').split('/');
    if (segments[0] === 'ns.adobe.com') {
      segments.shift();
    }

    return segments;
  }

  if (input.startsWith('_')) {
    return input.substring(1).split('.');
  }

  return null;
}

/**
 * Parses a `$id` (`https://ns.adobe.com/<tenant>/<type>/<uuid>`) or a `meta:altId`
 * (`_<tenant>.<type>.<uuid>`).
 *
 * Global resources are looked up in the bundled table. A global reference missing from
 * the table still resolves when `expected` names a single type.
 * @example
 * const [err, ref] = parseRef('_acme.schemas.7a5416d13572', ['schemas']);
 */
export function parseRef(input: string, expected?: readonly ResourceType[]): SafeWrap<Error, SchemaRef> {
  const segments = splitRef(input);
  if (!segments || segments.length < 2 || segments.some((segment) => !segment)) {
    return [new InvalidRefError(`error unable to parse ref "${input}"`, input), null];
  }

  let ref: SchemaRef | null = null;
  const uuid = segments.join('.');
  const known = GLOBAL_RESOURCES[uuid];
  const [tenant, segment, id] = segments;
  const type = segment === undefined ? null : typeFromSegment(segment);

  if (known) {
    ref = globalRef(known.type, segments);
  } else if (segments.length === 3 && tenant && tenant !== 'xdm' && type && id) {
    ref = { container: 'tenant', type, tenant, uuid: id, id: `_${uuid}`, ref: `${NAMESPACE}${segments.join('/')}` };
  } else if (expected?.length === 1 && expected[0]) {
    ref = globalRef(expected[0], segments);
  }

  if (!ref) {
    return [new InvalidRefError(`error unable to resolve ref "${input}"`, input), null];
  }

  if (expected && !expected.includes(ref.type)) {
    return [
      new InvalidRefError(`error ref "${input}" is of type ${ref.type}, expected ${expected.join(' or ')}`, input),
      null,
    ];
  }

  return [null, ref];
}
