import { NotSupportedError } from '../error/notSupportedError.js';
import { StaleObjectError } from '../error/staleObjectError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { Behavior } from './behavior.js';
import { behaviorOf, Class, fieldGroupsOf } from './class.js';
import type { FieldGroup } from './fieldGroup.js';
import { parseRef } from './ref.js';
import { Resource } from './resource.js';

/**
 * A schema: one parent class plus any number of field groups.
 */
export class Schema extends Resource {
  readonly type = 'schemas';

  /** `$id` of the parent class, when the body carries `meta:class`. */
  get parentRef(): string | undefined {
    const value = this.attribute('meta:class');
    return value?.kind === 'string' ? value.value : undefined;
  }

  /**
   * The parent class, resolved through `meta:class` and fetched.
   */
  async parent(): SafeWrapAsync<Error, Class> {
    const [errLoad, value] = await this.loaded('meta:class');
    if (errLoad) {
      return [errLoad, null];
    }

    if (typeof value !== 'string') {
      return [new Error('error schema has no parent class'), null];
    }

    const [errRef, ref] = parseRef(value, ['classes']);
    if (errRef) {
      return [new Error('error resolving parent class', { cause: errRef }), null];
    }

    return new Class(this.context, { ref }).refresh();
  }

  /** The behavior of the parent class. */
  behavior(): SafeWrapAsync<Error, Behavior> {
    return behaviorOf(this);
  }

  /** Field groups this schema is composed of, including those of its class. */
  fieldGroups(): SafeWrapAsync<Error, FieldGroup[]> {
    return fieldGroupsOf(this);
  }

  /**
   * Appends a persisted field group to `allOf`.
   */
  addFieldGroup(fieldGroup: FieldGroup): SafeWrapAsync<Error, this> {
    if (fieldGroup.state !== 'persisted' || !fieldGroup.ref) {
      return Promise.resolve([
        new StaleObjectError(`error cannot add a ${fieldGroup.state} field group`, fieldGroup.state),
        null,
      ]);
    }

    return this.patch([{ op: 'add', path: '/allOf/-', value: { $ref: fieldGroup.ref } }]);
  }

  /**
   * Nested collection of the schema's fields. Not supported: always a {@link NotSupportedError}.
   */
  fields(): SafeWrap<NotSupportedError, never> {
    return [new NotSupportedError('error nested fields collection is not supported', 'schema.fields'), null];
  }
}
