import type { SafeWrapAsync } from '../utils/wrap.js';
import { Resource } from './resource.js';

/** A field group, a reusable bundle of fields attached to classes and schemas. */
export class FieldGroup extends Resource {
  readonly type = 'fieldgroups';

  /** Classes or schemas named in `meta:intendedToExtend`, as unfetched handles. */
  intendedToExtend(): SafeWrapAsync<Error, Resource[]> {
    return this.refsOf('meta:intendedToExtend');
  }
}
