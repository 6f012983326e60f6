import { StaleObjectError } from '../error/staleObjectError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { Behavior } from './behavior.js';
import { Class } from './class.js';
import { ResourceCollection } from './collection.js';
import type { RegistryContext } from './context.js';
import { DataType } from './dataType.js';
import { FieldGroup } from './fieldGroup.js';
import { globalRef } from './ref.js';
import type { Resource } from './resource.js';
import { Schema } from './schema.js';
import type { Container, PropertyDescriptor } from './types.js';

/** Input of {@link SchemaCollection.create}. */
export interface SchemaInput {
  title: string;
  /** Class the schema inherits from */
  parent: Class;
  description?: string;
  fieldGroups?: FieldGroup[];
}

/** Input of {@link ClassCollection.create}. */
export interface ClassInput {
  title: string;
  /** Behavior the class is based on, e.g. `api.behaviors.record` */
  behavior: Behavior;
  description?: string;
  fieldGroups?: FieldGroup[];
}

/** Input of {@link FieldGroupCollection.create}. */
export interface FieldGroupInput {
  title: string;
  description?: string;
  properties?: Record<string, PropertyDescriptor>;
  /** Classes or schemas the field group can be attached to */
  intendedToExtend?: Resource[];
}

/** Input of {@link DataTypeCollection.create}. */
export interface DataTypeInput {
  title: string;
  description?: string;
  properties?: Record<string, PropertyDescriptor>;
}

const isSchema = (resource: Resource): resource is Schema => resource instanceof Schema;
const isClass = (resource: Resource): resource is Class => resource instanceof Class;
const isFieldGroup = (resource: Resource): resource is FieldGroup => resource instanceof FieldGroup;
const isDataType = (resource: Resource): resource is DataType => resource instanceof DataType;
const isBehavior = (resource: Resource): resource is Behavior => resource instanceof Behavior;

/** `$id`s of persisted resources; drafts and deleted handles cannot be referenced. */
function refsOf(resources: Resource[]): SafeWrap<Error, string[]> {
  const refs: string[] = [];
  for (const resource of resources) {
    if (!resource.ref || resource.state !== 'persisted') {
      return [new StaleObjectError(`error cannot reference a ${resource.state} resource`, resource.state), null];
    }

    refs.push(resource.ref);
  }

  return [null, refs];
}

/** Builds the `allOf` of a schema or class: its base followed by its field groups. */
function composition(base: Resource, fieldGroups: FieldGroup[] = []): SafeWrap<Error, Array<{ $ref: string }>> {
  const [err, refs] = refsOf([base, ...fieldGroups]);
  if (err) {
    return [err, null];
  }

  return [null, refs.map(($ref) => ({ $ref }))];
}

/**
 * Schemas, from `api.schemas`, `api.globalSchemas` or `api.tenantSchemas`.
 */
export class SchemaCollection extends ResourceCollection<Schema> {
  constructor(context: RegistryContext, container?: Container) {
    super({ context, container, types: ['schemas'], guard: isSchema });
  }

  /**
   * Builds an unsaved schema; `save()` creates it.
   */
  draft({ title, parent, description = '', fieldGroups }: SchemaInput): SafeWrap<Error, Schema> {
    const [err, allOf] = composition(parent, fieldGroups);
    if (err) {
      return [err, null];
    }

    return this.draftOf({ type: 'object', title, description, allOf });
  }

  /**
   * Creates a schema and returns it in full form.
   * @example
   * const [err, schema] = await api.schemas.create({ title: 'Loyalty Members', parent: profile });
   */
  create(input: SchemaInput): SafeWrapAsync<Error, Schema> {
    return this.persist(this.draft(input));
  }
}

/**
 * Classes, from `api.classes`, `api.globalClasses` or `api.tenantClasses`.
 */
export class ClassCollection extends ResourceCollection<Class> {
  constructor(context: RegistryContext, container?: Container) {
    super({ context, container, types: ['classes'], guard: isClass });
  }

  /** Builds an unsaved class; `save()` creates it. */
  draft({ title, behavior, description = '', fieldGroups }: ClassInput): SafeWrap<Error, Class> {
    const [err, allOf] = composition(behavior, fieldGroups);
    if (err) {
      return [err, null];
    }

    return this.draftOf({ type: 'object', title, description, allOf });
  }

  /** Creates a class and returns it in full form. */
  create(input: ClassInput): SafeWrapAsync<Error, Class> {
    return this.persist(this.draft(input));
  }
}

/**
 * Field groups, from `api.fieldGroups`, `api.globalFieldGroups` or `api.tenantFieldGroups`.
 */
export class FieldGroupCollection extends ResourceCollection<FieldGroup> {
  constructor(context: RegistryContext, container?: Container) {
    super({ context, container, types: ['fieldgroups'], guard: isFieldGroup });
  }

  /** Builds an unsaved field group; `save()` creates it. */
  draft({
    title,
    description = '',
    properties = {},
    intendedToExtend = [],
  }: FieldGroupInput): SafeWrap<Error, FieldGroup> {
    const [err, refs] = refsOf(intendedToExtend);
    if (err) {
      return [err, null];
    }

    return this.draftOf({
      type: 'object',
      title,
      description,
      'meta:intendedToExtend': refs,
      allOf: [{ properties }],
    });
  }

  /** Creates a field group and returns it in full form. */
  create(input: FieldGroupInput): SafeWrapAsync<Error, FieldGroup> {
    return this.persist(this.draft(input));
  }
}

/**
 * Data types, from `api.dataTypes`, `api.globalDataTypes` or `api.tenantDataTypes`.
 */
export class DataTypeCollection extends ResourceCollection<DataType> {
  constructor(context: RegistryContext, container?: Container) {
    super({ context, container, types: ['datatypes'], guard: isDataType });
  }

  /** Builds an unsaved data type; `save()` creates it. */
  draft({ title, description = '', properties = {} }: DataTypeInput): SafeWrap<Error, DataType> {
    return this.draftOf({ type: 'object', title, description, properties });
  }

  /** Creates a data type and returns it in full form. */
  create(input: DataTypeInput): SafeWrapAsync<Error, DataType> {
    return this.persist(this.draft(input));
  }
}

/**
 * Behaviors, from `api.behaviors`. Read-only; the three platform behaviors are
 * available as unfetched handles.
 */
export class BehaviorCollection extends ResourceCollection<Behavior> {
  /** `https://ns.adobe.com/xdm/data/adhoc` */
  readonly adhoc: Behavior;
  /** `https://ns.adobe.com/xdm/data/record` */
  readonly record: Behavior;
  /** `https://ns.adobe.com/xdm/data/time-series` */
  readonly timeSeries: Behavior;

  constructor(context: RegistryContext) {
    super({ context, container: 'global', types: ['behaviors'], guard: isBehavior });
    this.adhoc = new Behavior(context, { ref: globalRef('behaviors', ['xdm', 'data', 'adhoc']) });
    this.record = new Behavior(context, { ref: globalRef('behaviors', ['xdm', 'data', 'record']) });
    this.timeSeries = new Behavior(context, { ref: globalRef('behaviors', ['xdm', 'data', 'time-series']) });
  }
}
