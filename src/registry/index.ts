/**
 * Registry entrypoint: resource handles, collections and reference parsing.
 * @module
 */
export { Behavior } from './behavior.js';
export { Class } from './class.js';
export { type CollectionProps, type FindOptions, isResource, ResourceCollection } from './collection.js';
export {
  BehaviorCollection,
  ClassCollection,
  type ClassInput,
  DataTypeCollection,
  type DataTypeInput,
  FieldGroupCollection,
  type FieldGroupInput,
  SchemaCollection,
  type SchemaInput,
} from './collections.js';
export { createRegistryContext, type RegistryContext } from './context.js';
export { DataType } from './dataType.js';
export { acceptHeader, type RegistryClient, registryEndpoints, type XedFormat } from './endpoints.js';
export { FieldGroup } from './fieldGroup.js';
export { globalRef, parseRef, type SchemaRef } from './ref.js';
export { type RefreshOptions, Resource, type ResourceInit } from './resource.js';
export { Schema } from './schema.js';
export type {
  Container,
  PatchOperation,
  PropertyDescriptor,
  Query,
  ResourceBody,
  ResourceType,
} from './types.js';
export { fromValue, toValue, type Value, type ValueKind } from './value.js';
