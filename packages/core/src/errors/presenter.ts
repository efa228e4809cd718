/**
 * Audience-specific views of a FieldwardenError. Production views are
 * redacted twice: by the error itself and by the presenter's key list.
 */

import { getHttpStatus, type ErrorCode } from './codes.js';
import {
  isValidationError,
  REDACTED,
  type FieldError,
  type FieldwardenError,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
  requestId?: string;
}

export interface FieldView {
  path: string;
  code: string;
  message: string;
  meta: Record<string, unknown>;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  path?: string;
  /** One `path: message [code]` line per violation */
  fields: string[];
  truncated: boolean;
  colors: boolean;
  terminalWidth: number;
}

export interface APIErrorView {
  status: number;
  type: string;
  title: string;
  detail: string;
  instance?: string;
  code: ErrorCode;
  path?: string;
  fields: FieldView[];
  truncated: boolean;
}

export type ProductionView = SerializedError & {
  fields?: FieldView[];
  truncated?: boolean;
  requestId?: string;
};

const DEFAULT_REDACT_KEYS: readonly string[] = [
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** `undefined` when unset or empty; '0' and 'false' read as off */
function envSwitch(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw !== '0' && raw !== 'false';
}

function fieldLine(field: FieldError): string {
  const location = field.path === '' ? '(root)' : field.path;
  return `${location}: ${field.message} [${field.code}]`;
}

function summarize(error: FieldwardenError): string {
  if (!isValidationError(error)) return error.message;
  const count = error.size;
  const noun = count === 1 ? 'violation' : 'violations';
  const quantity = error.truncated ? `more than ${count}` : `${count}`;
  return `validation failed with ${quantity} ${noun}`;
}

export class ErrorPresenter {
  readonly #env: 'dev' | 'prod';
  readonly #options: PresenterOptions;
  readonly #redactKeys: ReadonlySet<string>;

  constructor(env: 'dev' | 'prod', options: PresenterOptions = {}) {
    this.#env = env;
    this.#options = options;
    this.#redactKeys = new Set(options.redactKeys ?? DEFAULT_REDACT_KEYS);
  }

  formatForCLI(error: FieldwardenError): CLIErrorView {
    const path = error.context?.path;
    return {
      title: `Error ${error.errorCode}: ${summarize(error)}`,
      code: error.errorCode,
      location: path ? `Location: ${path}` : undefined,
      path,
      fields: this.#fields(error).map(fieldLine),
      truncated: isValidationError(error) && error.truncated,
      colors: this.#colors(),
      terminalWidth:
        this.#options.terminalWidth || process.stdout.columns || 80,
    };
  }

  formatForAPI(error: FieldwardenError): APIErrorView {
    const path = error.context?.path;
    return {
      status: getHttpStatus(error.errorCode),
      type: `urn:fieldwarden:error:${error.errorCode}`,
      title: summarize(error),
      detail: path ? `${error.message} at ${path}` : error.message,
      instance: this.#requestId(),
      code: error.errorCode,
      path,
      fields: this.#fields(error).map((field) => this.#fieldView(field)),
      truncated: isValidationError(error) && error.truncated,
    };
  }

  /** Starts from the error's own prod serialization, then scrubs presenter keys */
  formatForProduction(error: FieldwardenError): ProductionView {
    const serialized = error.toJSON('prod');
    const context =
      serialized.context && 'value' in serialized.context
        ? {
            ...serialized.context,
            value: this.#scrub(serialized.context.value),
          }
        : serialized.context;
    const view: ProductionView = {
      ...serialized,
      context,
      requestId: this.#requestId(),
    };
    if (isValidationError(error)) {
      view.fields = error.fields.map((field) => this.#fieldView(field));
      view.truncated = error.truncated;
    }
    return view;
  }

  #fields(error: FieldwardenError): readonly FieldError[] {
    return isValidationError(error) ? error.fields : [];
  }

  #fieldView(field: FieldError): FieldView {
    const meta = this.#scrub(field.meta);
    return {
      path: field.path,
      code: field.code,
      message: field.message,
      meta: isPlainObject(meta) ? meta : {},
    };
  }

  #requestId(): string | undefined {
    return this.#options.requestId || process.env.REQUEST_ID || undefined;
  }

  /** NO_COLOR beats FORCE_COLOR beats the option; dev defaults to color */
  #colors(): boolean {
    if (envSwitch('NO_COLOR') === true) return false;
    if (envSwitch('FORCE_COLOR') === true) return true;
    return this.#options.colors ?? this.#env === 'dev';
  }

  #scrub(value: unknown): unknown {
    if (Array.isArray(value)) return value.map((item) => this.#scrub(item));
    if (!isPlainObject(value)) return value;
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = this.#redactKeys.has(key) ? REDACTED : this.#scrub(child);
    }
    return out;
  }
}

export default ErrorPresenter;
