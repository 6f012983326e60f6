import { z } from 'zod';

/** Registry containers: platform-provided (`global`) or organization-authored (`tenant`). */
export type Container = 'global' | 'tenant';

/** Resource types of the registry, named by their path segment. */
export const RESOURCE_TYPES = ['schemas', 'classes', 'fieldgroups', 'datatypes', 'behaviors'] as const;

/** A registry resource type. */
export type ResourceType = (typeof RESOURCE_TYPES)[number];

/** Raw JSON body of a registry resource. */
export type ResourceBody = Record<string, unknown>;

/** Query passed to `find`/`findAll`, sent as `property=key==value,...`. */
export type Query = Record<string, string | number | boolean>;

/** A JSON-Patch operation accepted by the registry's PATCH endpoints. */
export interface PatchOperation {
  op: 'add' | 'replace' | 'remove';
  path: string;
  value?: unknown;
}

/**
 * XDM field definition, as found under `properties`.
 */
export interface PropertyDescriptor {
  /** A JSON-Schema type, or a union of them such as `['string', 'null']` */
  type?: string | string[];
  title?: string;
  description?: string;
  $ref?: string;
  format?: string;
  'meta:xdmType'?: string;
  /** Item schema, or one schema per position for tuples */
  items?: PropertyDescriptor | PropertyDescriptor[];
  properties?: Record<string, PropertyDescriptor>;
  [key: string]: unknown;
}

export const propertyDescriptorSchema: z.ZodType<PropertyDescriptor> = z.lazy(() =>
  z
    .object({
      type: z.union([z.string(), z.array(z.string())]).optional(),
      title: z.string().optional(),
      description: z.string().optional(),
      $ref: z.string().optional(),
      format: z.string().optional(),
      'meta:xdmType': z.string().optional(),
      items: z.union([propertyDescriptorSchema, z.array(propertyDescriptorSchema)]).optional(),
      properties: z.record(z.string(), propertyDescriptorSchema).optional(),
    })
    .passthrough(),
);

/** A `properties` map. */
export const propertiesSchema = z.record(z.string(), propertyDescriptorSchema);

/** Narrows a JSON value to a plain object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
