import { z } from 'zod';
import type { PlatformClient } from '../core/client.js';
import type { RequestDefinitions } from '../core/types.js';
import { propertiesSchema } from './types.js';

/** Collection path of the registry. */
export const RESOURCES_PATH = '/data/foundation/schemaregistry/{container}/{resource}';
/** Item path of the registry. */
export const RESOURCE_PATH = '/data/foundation/schemaregistry/{container}/{resource}/{id}';

/**
 * A resource body. Only `$id` is guaranteed; `properties`, when present, must hold
 * field definitions. Everything else passes through.
 */
export const resourceBodySchema = z.object({ $id: z.string(), properties: propertiesSchema.optional() }).passthrough();

/** A page of a listing. */
const resourcePageSchema = z.object({
  results: z.array(resourceBodySchema),
  _page: z
    .object({
      count: z.number().optional(),
      next: z.string().nullish(),
    })
    .passthrough()
    .optional(),
});

const listingSearchSchema = z.object({
  property: z.string().optional(),
  start: z.string().optional(),
  orderby: z.string().optional(),
  limit: z.number().int().positive().optional(),
});

const draftSchema = z.object({ type: z.literal('object'), title: z.string().min(1) }).passthrough();

/** Body of a resource about to be created. */
export type DraftBody = z.input<typeof draftSchema>;

const patchSchema = z.array(
  z.object({
    op: z.enum(['add', 'replace', 'remove']),
    path: z.string().startsWith('/'),
    value: z.unknown().optional(),
  }),
);

/**
 * Endpoints of the Schema Registry.
 */
export const registryEndpoints = {
  [RESOURCES_PATH]: {
    get: {
      $search: listingSearchSchema,
      response: resourcePageSchema,
    },
    post: {
      request: draftSchema,
      response: resourceBodySchema,
    },
  },
  [RESOURCE_PATH]: {
    get: {
      response: resourceBodySchema,
    },
    patch: {
      request: patchSchema,
      response: resourceBodySchema,
    },
    delete: {
      response: z.unknown(),
    },
  },
} satisfies RequestDefinitions;

/** Platform client bound to the registry endpoints. */
export type RegistryClient = PlatformClient<typeof registryEndpoints>;

/** Accept-header variants of the registry. */
export type XedFormat = 'standard' | 'full' | 'id';

/**
 * Builds the registry `Accept` header, e.g. `application/vnd.adobe.xed-full+json; version=1`.
 * Listings take no version.
 */
export function acceptHeader(format: XedFormat = 'standard', version: number | null = 1): { Accept: string } {
  const type = format === 'standard' ? 'xed' : `xed-${format}`;
  return { Accept: `application/vnd.adobe.${type}+json${version === null ? '' : `; version=${version}`}` };
}
