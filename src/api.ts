import { type Credentials, loadCredentials } from './auth/credentials.js';
import { TokenClient } from './auth/tokenClient.js';
import { PlatformClient, type PlatformClientConfig } from './core/client.js';
import { isResource, ResourceCollection } from './registry/collection.js';
import {
  BehaviorCollection,
  ClassCollection,
  DataTypeCollection,
  FieldGroupCollection,
  SchemaCollection,
} from './registry/collections.js';
import { createRegistryContext, type RegistryContext } from './registry/context.js';
import { type RegistryClient, registryEndpoints } from './registry/endpoints.js';
import { parseRef } from './registry/ref.js';
import type { Resource } from './registry/resource.js';
import { RESOURCE_TYPES } from './registry/types.js';
import type { FetchClientProvider } from './types/request.js';
import type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/** Default Experience Platform host. */
export const DEFAULT_BASE_URL = 'https://platform.adobe.io';

/** Options of {@link Api}. */
export interface ApiOptions extends PlatformClientConfig {
  /** Credentials of the Developer Console project */
  credentials: Credentials;
  /**
   * Platform host.
   * @default 'https://platform.adobe.io'
   */
  baseUrl?: string;
  /**
   * IMS host tokens are requested from.
   * @default 'https://ims-na1.adobelogin.com'
   */
  imsUrl?: string;
  /** HTTP client implementation, shared by the token and platform clients. */
  fetchProvider?: FetchClientProvider;
}

/**
 * Entry point to the Schema Registry: one collection per resource type and container.
 *
 * Unscoped collections (`schemas`, `classes`, ...) query the tenant container first,
 * then the global one.
 *
 * @example
 * const api = new Api({ credentials, sandbox: 'dev' });
 * const [err, schema] = await api.tenantSchemas.find({ title: 'Loyalty Members' });
 */
export class Api {
  /** Every resource type, both containers */
  readonly registry: ResourceCollection;
  readonly globalRegistry: ResourceCollection;
  readonly tenantRegistry: ResourceCollection;
  readonly schemas: SchemaCollection;
  readonly globalSchemas: SchemaCollection;
  readonly tenantSchemas: SchemaCollection;
  readonly classes: ClassCollection;
  readonly globalClasses: ClassCollection;
  readonly tenantClasses: ClassCollection;
  readonly fieldGroups: FieldGroupCollection;
  readonly globalFieldGroups: FieldGroupCollection;
  readonly tenantFieldGroups: FieldGroupCollection;
  readonly dataTypes: DataTypeCollection;
  readonly globalDataTypes: DataTypeCollection;
  readonly tenantDataTypes: DataTypeCollection;
  /** Platform behaviors, with `adhoc`, `record` and `timeSeries` handles */
  readonly behaviors: BehaviorCollection;
  /** Client bound to the registry endpoints */
  #client: RegistryClient;
  /** Client and handle factory shared by the collections */
  #context: RegistryContext;

  constructor({ credentials, baseUrl = DEFAULT_BASE_URL, imsUrl, fetchProvider, ...config }: ApiOptions) {
    const tokens = new TokenClient({ credentials, imsUrl, fetchProvider, timeout: config.timeout });
    this.#client = new PlatformClient({
      ...config,
      fetchProvider,
      baseUrl,
      endpoints: registryEndpoints,
      tokens,
      identity: { apiKey: credentials.clientId, orgId: credentials.orgId },
    });

    const context = createRegistryContext(this.#client);
    this.#context = context;

    const registry = { context, types: RESOURCE_TYPES, guard: isResource };
    this.registry = new ResourceCollection(registry);
    this.globalRegistry = new ResourceCollection({ ...registry, container: 'global' });
    this.tenantRegistry = new ResourceCollection({ ...registry, container: 'tenant' });
    this.schemas = new SchemaCollection(context);
    this.globalSchemas = new SchemaCollection(context, 'global');
    this.tenantSchemas = new SchemaCollection(context, 'tenant');
    this.classes = new ClassCollection(context);
    this.globalClasses = new ClassCollection(context, 'global');
    this.tenantClasses = new ClassCollection(context, 'tenant');
    this.fieldGroups = new FieldGroupCollection(context);
    this.globalFieldGroups = new FieldGroupCollection(context, 'global');
    this.tenantFieldGroups = new FieldGroupCollection(context, 'tenant');
    this.dataTypes = new DataTypeCollection(context);
    this.globalDataTypes = new DataTypeCollection(context, 'global');
    this.tenantDataTypes = new DataTypeCollection(context, 'tenant');
    this.behaviors = new BehaviorCollection(context);
  }

  /** Sandbox requests are sent to. */
  get sandbox(): string {
    return this.#client.sandbox;
  }

  /**
   * Unfetched handle for any `$id` or `meta:altId`; call `refresh()` to load it.
   */
  ref(id: string): SafeWrap<Error, Resource> {
    const [err, ref] = parseRef(id);
    if (err) {
      return [err, null];
    }

    return [null, this.#context.instantiate(ref.type, { ref })];
  }

  /**
   * Updates options at runtime; unspecified options keep their current value.
   * @example
   * api.config({ sandbox: 'dev', debug: true });
   */
  config(opts: PlatformClientConfig) {
    this.#client.config(opts);
  }

  /** Aborts every in-flight request. */
  dispose() {
    this.#client.dispose();
  }
}

/**
 * Loads a credentials file and builds an {@link Api} from it.
 * @example
 * const [err, api] = await loadConfig('./config.json', { sandbox: 'dev' });
 */
export async function loadConfig(
  path: string,
  options: Omit<ApiOptions, 'credentials'> = {},
): SafeWrapAsync<Error, Api> {
  const [err, credentials] = await loadCredentials(path);
  if (err) {
    return [err, null];
  }

  return [null, new Api({ ...options, credentials })];
}
