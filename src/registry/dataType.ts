import { Resource } from './resource.js';

/** A reusable data type. */
export class DataType extends Resource {
  readonly type = 'datatypes';
}
