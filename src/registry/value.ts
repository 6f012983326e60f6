/**
 * Tagged JSON value, used to read arbitrary server-defined attributes of a resource
 * without losing their shape.
 */
export type Value =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null'; value: null }
  | { kind: 'array'; value: Value[] }
  | { kind: 'object'; value: Record<string, Value> };

/** Kinds of {@link Value}. */
export type ValueKind = Value['kind'];

/**
 * Tags a JSON value. Anything JSON cannot carry (`undefined`, functions, symbols,
 * bigints) is tagged as `null`.
 */
export function toValue(input: unknown): Value {
  if (typeof input === 'string') {
    return { kind: 'string', value: input };
  }

  if (typeof input === 'number') {
    return { kind: 'number', value: input };
  }

  if (typeof input === 'boolean') {
    return { kind: 'boolean', value: input };
  }

  if (Array.isArray(input)) {
    return { kind: 'array', value: input.map(toValue) };
  }

  if (typeof input === 'object' && input !== null) {
    return {
      kind: 'object',
      value: Object.fromEntries(Object.entries(input).map(([key, entry]) => [key, toValue(entry)])),
    };
  }

  return { kind: 'null', value: null };
}

/** Plain JSON form of a tagged value. */
export function fromValue(value: Value): unknown {
  switch (value.kind) {
    case 'array':
      return value.value.map(fromValue);
    case 'object':
      return Object.fromEntries(Object.entries(value.value).map(([key, entry]) => [key, fromValue(entry)]));
    default:
      return value.value;
  }
}
