import type { SafeWrapAsync } from '../utils/wrap.js';
import { Behavior } from './behavior.js';
import { FieldGroup } from './fieldGroup.js';
import { Resource } from './resource.js';

/**
 * Picks the single behavior among the resources a class or schema extends.
 */
export async function behaviorOf(resource: Resource): SafeWrapAsync<Error, Behavior> {
  const [err, resources] = await resource.extends();
  if (err) {
    return [err, null];
  }

  const behaviors = resources.filter((entry): entry is Behavior => entry instanceof Behavior);
  const [behavior] = behaviors;
  if (behaviors.length !== 1 || !behavior) {
    return [new Error(`error expected exactly one behavior, found ${behaviors.length}`), null];
  }

  return [null, behavior];
}

/** Field groups among the resources a class or schema extends. */
export async function fieldGroupsOf(resource: Resource): SafeWrapAsync<Error, FieldGroup[]> {
  const [err, resources] = await resource.extends();
  if (err) {
    return [err, null];
  }

  return [null, resources.filter((entry): entry is FieldGroup => entry instanceof FieldGroup)];
}

/** A class, the behavioral category schemas inherit from (e.g. profile, experience event). */
export class Class extends Resource {
  readonly type = 'classes';

  /** The behavior this class is based on. */
  behavior(): SafeWrapAsync<Error, Behavior> {
    return behaviorOf(this);
  }

  /** Field groups this class extends. */
  fieldGroups(): SafeWrapAsync<Error, FieldGroup[]> {
    return fieldGroupsOf(this);
  }
}
