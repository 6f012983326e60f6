import { Behavior } from './behavior.js';
import { Class } from './class.js';
import { DataType } from './dataType.js';
import type { RegistryClient } from './endpoints.js';
import { FieldGroup } from './fieldGroup.js';
import type { Resource, ResourceInit } from './resource.js';
import { Schema } from './schema.js';
import type { ResourceType } from './types.js';

/** What resource handles and collections share: the client and the type-to-class mapping. */
export interface RegistryContext {
  /** Client bound to the registry endpoints */
  readonly client: RegistryClient;
  /** Builds the handle class matching `type`. */
  instantiate(type: ResourceType, init: ResourceInit): Resource;
}

/** Creates the context resource handles are built with. */
export function createRegistryContext(client: RegistryClient): RegistryContext {
  const context: RegistryContext = {
    client,
    instantiate(type, init) {
      switch (type) {
        case 'schemas':
          return new Schema(context, init);
        case 'classes':
          return new Class(context, init);
        case 'fieldgroups':
          return new FieldGroup(context, init);
        case 'datatypes':
          return new DataType(context, init);
        case 'behaviors':
          return new Behavior(context, init);
      }
    },
  };

  return context;
}
