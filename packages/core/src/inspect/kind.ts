export type Kind =
  | 'undefined'
  | 'null'
  | 'string'
  | 'number'
  | 'bigint'
  | 'boolean'
  | 'symbol'
  | 'function'
  | 'date'
  | 'array'
  | 'map'
  | 'set'
  | 'object';

export function kindOf(value: unknown): Kind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'date';
  if (value instanceof Map) return 'map';
  if (value instanceof Set) return 'set';
  return typeof value;
}

export function isCollectionKind(kind: Kind): boolean {
  return kind === 'array' || kind === 'map' || kind === 'set';
}

/**
 * Empty in the sense of `required`/`omitempty`: missing, null, the empty
 * string or an empty collection. `0` and `false` are values.
 */
export function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  return false;
}

/**
 * Numeric measure used by size and range rules: code point length for
 * strings, element count for collections, the value itself for numbers.
 * Bigints stay bigints so large values compare exactly.
 */
export function measure(value: unknown): number | bigint | undefined {
  if (typeof value === 'string') return [...value].length;
  if (typeof value === 'number') return Number.isNaN(value) ? undefined : value;
  if (typeof value === 'bigint') return value;
  if (Array.isArray(value)) return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  return undefined;
}
