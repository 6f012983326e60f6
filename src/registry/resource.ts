import { type ResourceState, StaleObjectError } from '../error/staleObjectError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { RegistryContext } from './context.js';
import { acceptHeader, type DraftBody, RESOURCE_PATH, RESOURCES_PATH } from './endpoints.js';
import { parseRef, type SchemaRef } from './ref.js';
import {
  type Container,
  isRecord,
  type PatchOperation,
  type PropertyDescriptor,
  propertiesSchema,
  type ResourceBody,
  type ResourceType,
} from './types.js';
import { toValue, type Value } from './value.js';

/** Options for {@link Resource.refresh}. */
export interface RefreshOptions {
  /**
   * Fetch the full form, with properties of the class and field groups merged in.
   * @default false
   */
  full?: boolean;
}

/** A persisted resource (optionally with its body), or a draft to be created. */
export type ResourceInit = { ref: SchemaRef; body?: ResourceBody } | { draft: DraftBody };

/**
 * A registry resource: schema, class, field group, data type or behavior.
 *
 * A handle moves from `unsaved` (a local draft) through `persisted` to `deleted`.
 * Server operations are only valid on persisted handles and otherwise fail with
 * a {@link StaleObjectError}.
 */
export abstract class Resource {
  /** Resource type, fixed per subclass */
  abstract readonly type: ResourceType;
  /** Client and handle factory */
  #context: RegistryContext;
  /** Reference, `null` while unsaved */
  #ref: SchemaRef | null;
  /** Last known body */
  #body: ResourceBody;
  /** Body to create, while unsaved */
  #draft: DraftBody | null = null;
  /** Lifecycle state */
  #state: ResourceState;

  /**
   * Wraps a body, an unfetched reference when `body` is omitted, or an unsaved draft.
   */
  constructor(context: RegistryContext, init: ResourceInit) {
    this.#context = context;
    if ('draft' in init) {
      this.#ref = null;
      this.#draft = init.draft;
      this.#body = { ...init.draft };
      this.#state = 'unsaved';
      return;
    }

    this.#ref = init.ref;
    this.#body = init.body ?? { $id: init.ref.ref };
    this.#state = 'persisted';
  }

  /** `meta:altId`, `null` while unsaved. */
  get id(): string | null {
    return this.#ref?.id ?? null;
  }

  /** `$id`, `null` while unsaved. */
  get ref(): string | null {
    return this.#ref?.ref ?? null;
  }

  /** Unique part of the identifier. */
  get uuid(): string | null {
    return this.#ref?.uuid ?? null;
  }

  /** Tenant namespace, `null` for global resources and drafts. */
  get tenant(): string | null {
    return this.#ref?.tenant ?? null;
  }

  /** Drafts are always created in the tenant container. */
  get container(): Container {
    return this.#ref?.container ?? 'tenant';
  }

  get state(): ResourceState {
    return this.#state;
  }

  get title(): string | undefined {
    return this.#string('title');
  }

  get description(): string | undefined {
    return this.#string('description');
  }

  get version(): string | undefined {
    return this.#string('version');
  }

  /** Copy of the raw body. */
  get body(): ResourceBody {
    return structuredClone(this.#body);
  }

  /**
   * Top-level `properties`. Only populated on full bodies of schemas, classes and
   * data types; field groups keep theirs under `allOf`, see {@link definitions}.
   *
   * Response bodies are checked against the field definition shape on arrival, so
   * this is empty only when the body carries no `properties`.
   */
  get properties(): Record<string, PropertyDescriptor> {
    const parsed = propertiesSchema.safeParse(this.#body.properties);
    return parsed.success ? parsed.data : {};
  }

  /** A top-level attribute of the body as a tagged value. */
  attribute(name: string): Value | undefined {
    return Object.hasOwn(this.#body, name) ? toValue(this.#body[name]) : undefined;
  }

  /** All top-level attributes of the body as tagged values. */
  attributes(): Record<string, Value> {
    return Object.fromEntries(Object.entries(this.#body).map(([key, value]) => [key, toValue(value)]));
  }

  /**
   * Re-fetches the resource and merges the response into the body.
   */
  async refresh({ full = false }: RefreshOptions = {}): SafeWrapAsync<Error, this> {
    const [errState, ref] = this.#persisted('refresh');
    if (errState) {
      return [errState, null];
    }

    const [err, body] = await this.#context.client.get(RESOURCE_PATH, this.#params(ref), {
      headers: acceptHeader(full ? 'full' : 'standard'),
    });
    if (err) {
      return [new Error(`error refreshing ${ref.id}`, { cause: err }), null];
    }

    this.#body = { ...this.#body, ...body };
    return [null, this];
  }

  /**
   * Deletes the resource. The handle becomes `deleted`.
   */
  async delete(): SafeWrapAsync<Error, this> {
    const [errState, ref] = this.#persisted('delete');
    if (errState) {
      return [errState, null];
    }

    const [err] = await this.#context.client.delete(RESOURCE_PATH, this.#params(ref), { headers: acceptHeader() });
    if (err) {
      return [new Error(`error deleting ${ref.id}`, { cause: err }), null];
    }

    this.#state = 'deleted';
    return [null, this];
  }

  /**
   * Creates a draft in the tenant container, then loads its full form so computed
   * properties (`_id`, `_repo`, ...) are present. The handle becomes `persisted`.
   */
  async save(): SafeWrapAsync<Error, this> {
    if (this.#state !== 'unsaved' || !this.#draft) {
      return [new StaleObjectError(`error cannot save a ${this.#state} resource`, this.#state), null];
    }

    const [err, created] = await this.#context.client.post(
      RESOURCES_PATH,
      { container: 'tenant', resource: this.type },
      this.#draft,
      { headers: acceptHeader() },
    );
    if (err) {
      return [new Error(`error creating ${this.type}`, { cause: err }), null];
    }

    const [errRef, ref] = parseRef(created.$id, [this.type]);
    if (errRef) {
      return [new Error(`error reading id of created ${this.type}`, { cause: errRef }), null];
    }

    this.#ref = ref;
    this.#body = created;
    this.#draft = null;
    this.#state = 'persisted';

    return this.refresh({ full: true });
  }

  /** Replaces the title. */
  setTitle(title: string): SafeWrapAsync<Error, this> {
    return this.patch([{ op: 'replace', path: '/title', value: title }]);
  }

  /** Replaces the description. */
  setDescription(description: string): SafeWrapAsync<Error, this> {
    return this.patch([{ op: 'replace', path: '/description', value: description }]);
  }

  /**
   * Properties of every `allOf` entry merged into one map. Entries referencing
   * `#/definitions/<name>` are resolved against the body's `definitions`.
   */
  async definitions(): SafeWrapAsync<Error, Record<string, PropertyDescriptor>> {
    const [errLoad, allOf] = await this.loaded('allOf');
    if (errLoad) {
      return [errLoad, null];
    }

    const definitions = isRecord(this.#body.definitions) ? this.#body.definitions : {};
    const merged: Record<string, PropertyDescriptor> = {};
    for (const entry of Array.isArray(allOf) ? allOf : []) {
      const [errEntry, definition] = resolveDefinition(entry, definitions);
      if (errEntry) {
        return [errEntry, null];
      }

      const [errProperties, properties] = await validator(definition.properties ?? {}, propertiesSchema);
      if (errProperties) {
        return [new Error('error reading properties of definition', { cause: errProperties }), null];
      }

      for (const [key, property] of Object.entries(properties)) {
        if (Object.hasOwn(merged, key)) {
          return [new Error(`error property "${key}" is defined more than once`), null];
        }

        merged[key] = property;
      }
    }

    return [null, merged];
  }

  /** Resources named in `meta:extends`, as unfetched handles. */
  extends(): SafeWrapAsync<Error, Resource[]> {
    return this.refsOf('meta:extends');
  }

  /** Client and handle factory, for subclasses. */
  protected get context(): RegistryContext {
    return this.#context;
  }

  /**
   * Returns a body attribute, fetching the standard form first when a persisted
   * handle does not have it yet.
   */
  protected async loaded(name: string): SafeWrapAsync<Error, unknown> {
    if (!Object.hasOwn(this.#body, name) && this.#state === 'persisted') {
      const [err] = await this.refresh();
      if (err) {
        return [err, null];
      }
    }

    return [null, this.#body[name]];
  }

  /** Resolves a list of `$id`s in the body into unfetched handles. */
  protected async refsOf(name: string): SafeWrapAsync<Error, Resource[]> {
    const [errLoad, value] = await this.loaded(name);
    if (errLoad) {
      return [errLoad, null];
    }

    const resources: Resource[] = [];
    for (const entry of Array.isArray(value) ? value : []) {
      if (typeof entry !== 'string') {
        return [new Error(`error unexpected entry in ${name}`), null];
      }

      const [errRef, ref] = parseRef(entry);
      if (errRef) {
        return [new Error(`error resolving ${name}`, { cause: errRef }), null];
      }

      resources.push(this.#context.instantiate(ref.type, { ref }));
    }

    return [null, resources];
  }

  /** Sends a JSON-Patch and merges the response into the body. */
  protected async patch(operations: PatchOperation[]): SafeWrapAsync<Error, this> {
    const [errState, ref] = this.#persisted('update');
    if (errState) {
      return [errState, null];
    }

    const [err, body] = await this.#context.client.patch(RESOURCE_PATH, this.#params(ref), operations, {
      headers: acceptHeader(),
    });
    if (err) {
      return [new Error(`error updating ${ref.id}`, { cause: err }), null];
    }

    this.#body = { ...this.#body, ...body };
    return [null, this];
  }

  #persisted(operation: string): SafeWrap<Error, SchemaRef> {
    if (this.#state !== 'persisted' || !this.#ref) {
      return [new StaleObjectError(`error cannot ${operation} a ${this.#state} resource`, this.#state), null];
    }

    return [null, this.#ref];
  }

  #params(ref: SchemaRef) {
    return { container: ref.container, resource: ref.type, id: ref.id };
  }

  #string(name: string): string | undefined {
    const value = this.#body[name];
    return typeof value === 'string' ? value : undefined;
  }
}

/** Resolves one `allOf` entry to the object holding its `properties`. */
function resolveDefinition(
  entry: unknown,
  definitions: Record<string, unknown>,
): SafeWrap<Error, Record<string, unknown>> {
  if (!isRecord(entry)) {
    return [new Error('error unexpected allOf entry'), null];
  }

  const ref = entry.$ref;
  if (typeof ref !== 'string' || !ref.startsWith('#')) {
    return [null, entry];
  }

  if ('properties' in entry) {
    return [new Error(`error allOf entry has both "properties" and "$ref" ${ref}`), null];
  }

  if (!ref.startsWith('#/definitions/')) {
    return [new Error(`error unexpected non-definitions reference ${ref}`), null];
  }

  const name = ref.substring('#/definitions/'.length);
  if (name.includes('/')) {
    return [new Error(`error unexpected nested definition reference ${ref}`), null];
  }

  const definition = definitions[name];
  if (!isRecord(definition)) {
    return [new Error(`error reference to missing definition ${ref}`), null];
  }

  if (!('properties' in definition)) {
    return [new Error(`error definition ${ref} is not an object`), null];
  }

  return [null, definition];
}
