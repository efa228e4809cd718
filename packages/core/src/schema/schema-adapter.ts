import type { ErrorObject, Schema } from 'ajv';

import { retainPresentViolations } from '../presence/partial-filter.js';
import type { PresenceMap } from '../presence/presence-map.js';
import {
  createFieldError,
  SchemaCompileError,
  type FieldError,
} from '../types/errors.js';
import { toJsonData } from '../util/json-safe.js';
import type { SchemaCache } from './schema-cache.js';

/** What a schema-backed record returns from `jsonSchema()` */
export interface SchemaSource {
  id: string;
  schema: unknown;
}

// keyword -> params property naming the offending child property
const PROPERTY_PARAMS: Readonly<Record<string, string>> = {
  required: 'missingProperty',
  dependentRequired: 'missingProperty',
  dependencies: 'missingProperty',
  additionalProperties: 'additionalProperty',
  unevaluatedProperties: 'unevaluatedProperty',
};

function isSchema(value: unknown): value is Schema {
  return (
    typeof value === 'boolean' ||
    (typeof value === 'object' && value !== null && !Array.isArray(value))
  );
}

/** `/items/0/a~1b` -> `items.0.a/b` */
export function pointerToPath(pointer: string): string {
  if (pointer === '') return '';
  return pointer
    .slice(1)
    .split('/')
    .map((token) => token.replace(/~1/g, '/').replace(/~0/g, '~'))
    .join('.');
}

function childProperty(error: ErrorObject): string | undefined {
  const param = PROPERTY_PARAMS[error.keyword];
  if (param === undefined) return undefined;
  const name: unknown = error.params[param];
  return typeof name === 'string' ? name : undefined;
}

export function toFieldError(error: ErrorObject): FieldError {
  const base = pointerToPath(error.instancePath);
  const child = childProperty(error);
  const path =
    child === undefined ? base : base === '' ? child : `${base}.${child}`;

  let value: unknown = error.data;
  if (child !== undefined) {
    const holder: unknown = error.data;
    value =
      typeof holder === 'object' && holder !== null
        ? Reflect.get(holder, child)
        : undefined;
  }

  return createFieldError(
    path,
    `schema.${error.keyword}`,
    error.message ?? `failed on the "${error.keyword}" keyword`,
    {
      keyword: error.keyword,
      params: error.params,
      schemaPath: error.schemaPath,
      value,
    }
  );
}

export class SchemaAdapter {
  constructor(private readonly cache: SchemaCache) {}

  /**
   * Validate the JSON form of `record` (bigints as strings) against the
   * source schema, compiling it on first use of its id.
   */
  violations(
    record: unknown,
    source: SchemaSource,
    presence?: PresenceMap
  ): FieldError[] {
    const { id, schema } = source;
    if (!isSchema(schema)) {
      throw new SchemaCompileError(
        id,
        new Error('schema must be an object or a boolean')
      );
    }
    const async: unknown =
      typeof schema === 'object' ? Reflect.get(schema, '$async') : false;
    if (async === true) {
      throw new SchemaCompileError(
        id,
        new Error('asynchronous schemas are not supported')
      );
    }

    const validate = this.cache.getOrCompile(id, schema);
    if (validate(toJsonData(record))) return [];

    const fields = (validate.errors ?? []).map(toFieldError);
    return presence ? retainPresentViolations(fields, presence) : fields;
  }
}
