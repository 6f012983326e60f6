import { AmbiguousMatchError } from '../error/ambiguousMatchError.js';
import { InvalidRefError } from '../error/invalidRefError.js';
import { NotFoundError } from '../error/notFoundError.js';
import { NotSupportedError } from '../error/notSupportedError.js';
import { ValidationError } from '../error/validationError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { RegistryContext } from './context.js';
import { acceptHeader, type DraftBody, RESOURCES_PATH } from './endpoints.js';
import { parseRef } from './ref.js';
import type { Resource } from './resource.js';
import type { Container, Query, ResourceBody, ResourceType } from './types.js';

/** Options for `find` and `findAll`. */
export interface FindOptions {
  /** Request the full form of each resource (`xed-full`). */
  full?: boolean;
}

/** Configuration of a {@link ResourceCollection}. */
export interface CollectionProps<R extends Resource> {
  /** Client and handle factory */
  context: RegistryContext;
  /** Resource types the collection spans */
  types: readonly ResourceType[];
  /** Container the collection is scoped to; unscoped collections query tenant, then global */
  container?: Container;
  /** Narrows a handle to the collection's resource class */
  guard: (resource: Resource) => resource is R;
}

/** Matches any resource. */
export const isResource = (_resource: Resource): _resource is Resource => true;

/**
 * Typed accessor over one or more resource types of the registry, optionally scoped
 * to a container.
 *
 * @typeParam R - Resource class returned by the collection.
 */
export class ResourceCollection<R extends Resource = Resource> {
  #context: RegistryContext;
  #types: readonly ResourceType[];
  #container: Container | null;
  #guard: (resource: Resource) => resource is R;

  constructor({ context, types, container, guard }: CollectionProps<R>) {
    this.#context = context;
    this.#types = types;
    this.#container = container ?? null;
    this.#guard = guard;
  }

  /** Container the collection is scoped to, `null` when it spans both. */
  get container(): Container | null {
    return this.#container;
  }

  /** Resource types the collection spans. */
  get types(): readonly ResourceType[] {
    return this.#types;
  }

  /** Containers queried, in order. */
  get containers(): Container[] {
    return this.#container ? [this.#container] : ['tenant', 'global'];
  }

  /**
   * Fetches a resource in full form by `$id` or `meta:altId`.
   * @example
   * const [err, schema] = await api.schemas.get('_acme.schemas.7a5416d13572');
   */
  async get(id: string): SafeWrapAsync<Error, R> {
    const [errRef, ref] = parseRef(id, this.#types);
    if (errRef) {
      return [errRef, null];
    }

    if (this.#container && ref.container !== this.#container) {
      return [new InvalidRefError(`error ref "${id}" is not in the ${this.#container} container`, id), null];
    }

    const resource = this.#context.instantiate(ref.type, { ref });
    if (!this.#guard(resource)) {
      return [new InvalidRefError(`error ref "${id}" does not belong to this collection`, id), null];
    }

    return resource.refresh({ full: true });
  }

  /**
   * Finds the single resource matching every attribute of `query`.
   *
   * No match is a {@link NotFoundError}, several are an {@link AmbiguousMatchError}.
   * @example
   * const [err, schema] = await api.tenantSchemas.find({ title: 'Loyalty Members' });
   */
  async find(query: Query, { full = true }: FindOptions = {}): SafeWrapAsync<Error, R> {
    const [err, resources] = await this.findAll(query, { full });
    if (err) {
      return [err, null];
    }

    const description = describeQuery(query) ?? 'any attributes';
    const [resource] = resources;
    if (resources.length > 1) {
      return [
        new AmbiguousMatchError(`error ${resources.length} resources match ${description}`, resources.length),
        null,
      ];
    }

    if (!resource) {
      return [new NotFoundError(`error no resource matches ${description}`, {}), null];
    }

    return [null, resource];
  }

  /**
   * Lists every resource matching `query` across the collection's types and containers,
   * following pagination until exhausted.
   */
  async findAll(query: Query = {}, { full = false }: FindOptions = {}): SafeWrapAsync<Error, R[]> {
    const [errFilter, property] = queryFilter(query);
    if (errFilter) {
      return [errFilter, null];
    }

    const results: R[] = [];
    for (const type of this.#types) {
      for (const container of this.containers) {
        const [err, records] = await this.#paginate(container, type, property, full);
        if (err) {
          return [new Error(`error listing ${container} ${type}`, { cause: err }), null];
        }

        for (const record of records) {
          const [errRef, ref] = parseRef(record.$id, [type]);
          if (errRef) {
            return [errRef, null];
          }

          const resource = this.#context.instantiate(type, { ref, body: record });
          if (this.#guard(resource)) {
            results.push(resource);
          }
        }
      }
    }

    return [null, results];
  }

  /**
   * Builds an unsaved handle; only tenant-writable collections of a single type can.
   */
  protected draftOf(body: DraftBody): SafeWrap<Error, R> {
    const [type] = this.#types;
    if (this.#container === 'global' || this.#types.length !== 1 || !type) {
      return [new NotSupportedError('error cannot create resources in this collection', 'create'), null];
    }

    const resource = this.#context.instantiate(type, { draft: body });
    if (!this.#guard(resource)) {
      return [new Error(`error unexpected resource type ${type}`), null];
    }

    return [null, resource];
  }

  /** Saves a draft produced by {@link draftOf}. */
  protected async persist(draft: SafeWrap<Error, R>): SafeWrapAsync<Error, R> {
    const [err, resource] = draft;
    if (err) {
      return [err, null];
    }

    return resource.save();
  }

  async #paginate(
    container: Container,
    type: ResourceType,
    property: string | undefined,
    full: boolean,
  ): SafeWrapAsync<Error, Array<ResourceBody & { $id: string }>> {
    const records: Array<ResourceBody & { $id: string }> = [];
    let start: string | undefined;

    do {
      const [err, page] = await this.#context.client.get(
        RESOURCES_PATH,
        { container, resource: type, $search: { property, start } },
        { headers: acceptHeader(full ? 'full' : 'id', null) },
      );
      if (err) {
        return [err, null];
      }

      records.push(...page.results);
      start = page._page?.next ?? undefined;
    } while (start);

    return [null, records];
  }
}

/** Formats a query as the registry's `property` filter, `undefined` when empty. */
export function describeQuery(query: Query): string | undefined {
  const entries = Object.entries(query);
  if (entries.length === 0) {
    return undefined;
  }

  return entries.map(([key, value]) => `${key}==${value}`).join(',');
}

/**
 * Builds the `property` filter of a query. A key or value holding `,` or `==` would be
 * read as another filter, so it is a {@link ValidationError}.
 */
export function queryFilter(query: Query): SafeWrap<ValidationError, string | undefined> {
  const issues = Object.entries(query).flatMap(([key, value]) =>
    [key, String(value)].some((part) => part.includes(',') || part.includes('=='))
      ? [{ message: 'must not contain "," or "=="', path: [key] }]
      : [],
  );
  if (issues.length > 0) {
    return [new ValidationError('error query cannot be sent as a property filter', issues), null];
  }

  return [null, describeQuery(query)];
}
