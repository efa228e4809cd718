import type { SchemaSource } from '../schema/schema-adapter.js';
import { rulesFor, type FieldRules } from '../tags/field-rules.js';
import { ErrorCode } from '../errors/codes.js';
import { ConfigError, type ValidationError } from '../types/errors.js';

/**
 * Request-scoped data handed to `validateContext`. The engine never reads
 * `signal`; long-running methods check it themselves.
 */
export interface ValidationContext {
  readonly signal?: AbortSignal;
  readonly [key: string]: unknown;
}

export type ValidationOutcome = ValidationError | Error | null | undefined;

/** Record with a context-free custom check */
export interface Validatable {
  validate(): ValidationOutcome;
}

/** Record with a custom check that receives the call context */
export interface ContextValidatable {
  validateContext(ctx: ValidationContext): ValidationOutcome;
}

export interface SchemaProvider {
  jsonSchema(): SchemaSource;
}

export interface Capabilities {
  contextMethod: boolean;
  method: boolean;
  rules?: FieldRules;
  /** Resolves the schema source; called only when the schema strategy runs */
  schema?: () => SchemaSource;
}

export interface CapabilityOverrides {
  rules?: FieldRules;
  schema?: SchemaSource;
}

function hasMethod(record: object, name: string): boolean {
  return typeof Reflect.get(record, name) === 'function';
}

/**
 * Which strategies a record can run. Methods count whether they sit on the
 * prototype chain or on the instance; per-call overrides win over what the
 * record declares.
 */
export function detectCapabilities(
  record: object,
  overrides: CapabilityOverrides = {}
): Capabilities {
  const capabilities: Capabilities = {
    contextMethod: hasMethod(record, 'validateContext'),
    method: hasMethod(record, 'validate'),
    rules: overrides.rules ?? rulesFor(record),
  };
  const { schema } = overrides;
  if (schema) {
    capabilities.schema = () => schema;
  } else if (hasMethod(record, 'jsonSchema')) {
    capabilities.schema = () => readSchemaSource(record);
  }
  return capabilities;
}

function readSchemaSource(record: object): SchemaSource {
  const provider: unknown = Reflect.get(record, 'jsonSchema');
  const source: unknown =
    typeof provider === 'function'
      ? Reflect.apply(provider, record, [])
      : undefined;
  const id: unknown =
    typeof source === 'object' && source !== null
      ? Reflect.get(source, 'id')
      : undefined;
  if (typeof source !== 'object' || source === null || typeof id !== 'string') {
    throw new ConfigError({
      message: `${describeRecord(record)}.jsonSchema() must return { id, schema }`,
      errorCode: ErrorCode.INVALID_RULE,
      context: { setting: 'jsonSchema' },
    });
  }
  return { id, schema: Reflect.get(source, 'schema') };
}

/** Name used in messages about a record: its class name, or `Object` */
export function describeRecord(record: unknown): string {
  if (record === null) return 'null';
  if (typeof record !== 'object') return typeof record;
  const ctor: unknown = Reflect.get(record, 'constructor');
  if (typeof ctor === 'function' && ctor.name !== '') return ctor.name;
  return 'Object';
}
