import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { RequestOptions } from '../types/request.js';

/** Schema for unknown input, any output, used to easier infer data */
// biome-ignore lint/suspicious/noExplicitAny: This is used for inferrence, and requires any so inference works as it should
export type SchemaType = StandardSchemaV1<unknown, any>;
/** Empty object definition */
export type EmptyObject = Record<never, never>;

/** Enforce at least one property to be present on a type. */
export type RequireAtLeastOne<T> = {
  [K in keyof T]-?: Required<Pick<T, K>> & Partial<Pick<T, Exclude<keyof T, K>>>;
}[keyof T];

/**
 * EmptyishObject checks and allows for nulls on props
 */
export type EmptyishObject<T> = [keyof T] extends [never] ? null : T;

/**
 * HTTP methods the platform client issues
 */
export type HttpMethod = 'get' | 'post' | 'patch' | 'delete';

/** Schemas for a method without a request body. */
export type ReadDefinition = {
  $search?: SchemaType;
  response: SchemaType;
};

/** Schemas for a method carrying a JSON body. */
export type WriteDefinition = ReadDefinition & {
  request?: SchemaType;
};

/** Schemas for a single endpoint and method. */
export type EndpointDefinition = ReadDefinition | WriteDefinition;

/**
 * RequestDefinitions types up the endpoints of a platform service, keyed by
 * path template (e.g. `/data/foundation/schemaregistry/{container}/{resource}`).
 */
export type RequestDefinitions = {
  [path: string]: RequireAtLeastOne<{
    [M in HttpMethod]: M extends 'get' | 'delete' ? ReadDefinition : WriteDefinition;
  }>;
};

/** Parse `{param}` segments from a path template into a typed object. */
export type ParsePathParams<Path extends string | number | boolean> =
  Path extends `${infer _Start}{${infer Param}}${infer Rest}`
    ? { [K in Param]: string | number | boolean } & ParsePathParams<Rest>
    : EmptyObject;

/** Extract endpoints that support a given HTTP method. */
export type EndpointsWithMethod<Method extends HttpMethod, Schema extends RequestDefinitions> = {
  [K in keyof Schema]: Schema[K] extends Record<Method, unknown> ? K : never;
}[keyof Schema];

/**
 * ResponseType defines what will be returned
 * from the endpoint
 */
export type ResponseType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { response: infer S extends SchemaType } ? StandardSchemaV1.InferOutput<S> : never;

/** Typed request body for an endpoint/method (falls back to unknown for non-schematized). */
export type RequestType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { request: infer S extends SchemaType } ? StandardSchemaV1.InferInput<S> : unknown;

/** Typed query params via `$search` if present. */
export type SearchType<
  Schema,
  Endpoint extends keyof Schema,
  Method extends keyof Schema[Endpoint],
> = Schema[Endpoint][Method] extends { $search: infer S extends SchemaType }
  ? { $search?: StandardSchemaV1.InferInput<S> }
  : EmptyObject;

/** Combined params object (path + query) expected by client methods. */
export type Params<
  Schema extends RequestDefinitions,
  Endpoint extends keyof RequestDefinitions & string,
  Method extends HttpMethod & keyof RequestDefinitions[Endpoint],
> = EmptyishObject<ParsePathParams<Endpoint> & SearchType<Schema, Endpoint, Method>>;

/** Explicitly typed GET endpoints. */
export type GetEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'get', Schema> & string;
/** Explicitly typed POST endpoints. */
export type PostEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'post', Schema> & string;
/** Explicitly typed PATCH endpoints. */
export type PatchEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'patch', Schema> & string;
/** Explicitly typed DELETE endpoints. */
export type DeleteEndpoint<Schema extends RequestDefinitions> = EndpointsWithMethod<'delete', Schema> & string;

/**
 * Typed parameters for get function call parameters
 */
export type GetArgs<Schema extends RequestDefinitions, Endpoint extends GetEndpoint<Schema>> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'get'>,
  options?: RequestOptions,
];

/**
 * Typed parameters for post function call parameters
 */
export type PostArgs<Schema extends RequestDefinitions, Endpoint extends PostEndpoint<Schema>> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'post'>,
  data: RequestType<Schema, Endpoint, 'post'>,
  options?: RequestOptions,
];

/**
 * Typed parameters for patch function call parameters
 */
export type PatchArgs<Schema extends RequestDefinitions, Endpoint extends PatchEndpoint<Schema>> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'patch'>,
  data: RequestType<Schema, Endpoint, 'patch'>,
  options?: RequestOptions,
];

/**
 * Typed parameters for delete function call parameters
 */
export type DeleteArgs<Schema extends RequestDefinitions, Endpoint extends DeleteEndpoint<Schema>> = [
  endpoint: Endpoint,
  params: Params<Schema, Endpoint, 'delete'>,
  options?: RequestOptions,
];

/** Typed return-type for get function */
export type GetReturn<Schema extends RequestDefinitions, T extends GetEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'get'
>;

/** Typed return-type for post function */
export type PostReturn<Schema extends RequestDefinitions, T extends PostEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'post'
>;

/** Typed return-type for patch function */
export type PatchReturn<Schema extends RequestDefinitions, T extends PatchEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'patch'
>;

/** Typed return-type for delete function */
export type DeleteReturn<Schema extends RequestDefinitions, T extends DeleteEndpoint<Schema>> = ResponseType<
  Schema,
  T,
  'delete'
>;
