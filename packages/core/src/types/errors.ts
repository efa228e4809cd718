/**
 * Error hierarchy for fieldwarden
 *
 * Field violations are collected into a ValidationError and returned; every
 * other FieldwardenError subclass signals that the call itself could not run
 * (bad input, exceeded resource limit, or bad configuration).
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/** Sentinel written in place of values that must not reach a reporting surface */
export const REDACTED = '[REDACTED]';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // dotted/indexed field path (e.g., 'items.0.price')
  setting?: string; // offending option name for configuration errors
  strategy?: string;
  limit?: number;
  value?: unknown; // problematic value (may contain PII)
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
}

export interface FieldwardenErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
]);

function redactSensitiveKeys(val: unknown): unknown {
  if (Array.isArray(val)) return val.map(redactSensitiveKeys);
  if (val && typeof val === 'object' && !(val instanceof Date)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = SENSITIVE_KEYS.has(k) ? REDACTED : redactSensitiveKeys(v);
    }
    return out;
  }
  return val;
}

/**
 * Base error class for all fieldwarden errors
 */
export abstract class FieldwardenError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  constructor(params: FieldwardenErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys inside context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactSensitiveKeys(redacted.value);
    }
    return redacted;
  }
}

/**
 * Input errors: nil or non-object records, malformed raw payloads
 */
export class InputError extends FieldwardenError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_TYPE,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * An explicitly requested strategy that the record does not support
 */
export class UnsupportedStrategyError extends InputError {
  constructor(strategy: string, recordType: string) {
    super({
      message: `strategy "${strategy}" is not supported by ${recordType}`,
      errorCode: ErrorCode.UNSUPPORTED_STRATEGY,
      context: { strategy, recordType },
    });
  }

  get strategy(): string | undefined {
    return this.context?.strategy;
  }
}

/**
 * Hard resource-limit failures (the partial result is unusable)
 */
export class ResourceLimitError extends FieldwardenError {
  constructor(params: {
    message: string;
    limit: number;
    errorCode?: ErrorCode;
    context?: ErrorContext;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.FIELD_LIMIT_EXCEEDED,
      context: { ...(params.context ?? {}), limit: params.limit },
    });
  }

  get limit(): number | undefined {
    return this.context?.limit;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends FieldwardenError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext & { setting?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * A declared JSON Schema that Ajv refused to compile
 */
export class SchemaCompileError extends ConfigError {
  constructor(schemaId: string, cause: Error) {
    super({
      message: `schema "${schemaId}" failed to compile: ${cause.message}`,
      errorCode: ErrorCode.SCHEMA_COMPILE_FAILED,
      context: { schemaId },
      cause,
    });
  }
}

/** Anything thrown that is not a FieldwardenError, wrapped for reporting */
export class InternalError extends FieldwardenError {
  constructor(params: { message: string; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: params.cause,
    });
  }

  static wrap(thrown: unknown): InternalError {
    if (thrown instanceof Error) {
      return new InternalError({
        message: thrown.message || 'Unexpected error',
        cause: thrown,
      });
    }
    return new InternalError({ message: String(thrown) || 'Unexpected error' });
  }
}

/**
 * One constraint violation
 */
export interface FieldError {
  readonly path: string;
  readonly code: string;
  readonly message: string;
  readonly meta: Readonly<Record<string, unknown>>;
}

export function createFieldError(
  path: string,
  code: string,
  message: string,
  meta: Record<string, unknown> = {}
): FieldError {
  return Object.freeze({
    path,
    code,
    message,
    meta: Object.freeze({ ...meta }),
  });
}

export interface SerializedValidationError extends SerializedError {
  fields: FieldError[];
  truncated: boolean;
}

function compareFieldErrors(a: FieldError, b: FieldError): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  if (a.code !== b.code) return a.code < b.code ? -1 : 1;
  return 0;
}

function summarize(fields: readonly FieldError[], truncated: boolean): string {
  if (fields.length === 0) return 'validation failed';
  const parts = fields.map((f) =>
    f.path ? `${f.path}: ${f.message}` : f.message
  );
  const suffix = truncated ? ' (additional errors truncated)' : '';
  return `validation failed: ${parts.join('; ')}${suffix}`;
}

/**
 * Aggregated field violations from one or more strategies
 */
export class ValidationError extends FieldwardenError {
  #fields: FieldError[];
  #truncated: boolean;

  constructor(
    params: {
      fields?: readonly FieldError[];
      truncated?: boolean;
      context?: ErrorContext;
    } = {}
  ) {
    const fields = [...(params.fields ?? [])];
    const truncated = params.truncated ?? false;
    super({
      message: summarize(fields, truncated),
      errorCode: ErrorCode.VALIDATION_FAILED,
      context: params.context,
    });
    this.#fields = fields;
    this.#truncated = truncated;
  }

  get fields(): readonly FieldError[] {
    return this.#fields;
  }

  get truncated(): boolean {
    return this.#truncated;
  }

  get size(): number {
    return this.#fields.length;
  }

  hasErrors(): boolean {
    return this.#fields.length > 0;
  }

  /** Append one violation (caller-side composition of independent validations) */
  add(field: FieldError): this {
    this.#fields.push(field);
    this.#refreshMessage();
    return this;
  }

  /** Merge another error's fields; truncation carries over */
  addAll(other: ValidationError): this {
    this.#fields.push(...other.fields);
    this.#truncated = this.#truncated || other.truncated;
    this.#refreshMessage();
    return this;
  }

  /** Order entries by path, then by code */
  sort(): this {
    this.#fields.sort(compareFieldErrors);
    this.#refreshMessage();
    return this;
  }

  has(path: string): boolean {
    return this.#fields.some((f) => f.path === path);
  }

  hasCode(code: string): boolean {
    return this.#fields.some((f) => f.code === code);
  }

  getField(path: string): FieldError | undefined {
    return this.#fields.find((f) => f.path === path);
  }

  override toJSON(env: 'dev' | 'prod' = 'dev'): SerializedValidationError {
    return {
      ...super.toJSON(env),
      fields: [...this.#fields],
      truncated: this.#truncated,
    };
  }

  #refreshMessage(): void {
    this.message = summarize(this.#fields, this.#truncated);
  }
}

/**
 * Utility functions for error handling
 */
export function isFieldwardenError(error: unknown): error is FieldwardenError {
  return error instanceof FieldwardenError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
