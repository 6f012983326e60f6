import { Resource } from './resource.js';

/** A behavior (`adhoc`, `record`, `time-series`), the base of every class. */
export class Behavior extends Resource {
  readonly type = 'behaviors';
}
