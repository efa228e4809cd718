import { ErrorCode } from '../errors/codes.js';
import {
  describeRecord,
  type ValidationContext,
} from '../strategy/capabilities.js';
import {
  createFieldError,
  InputError,
  isFieldwardenError,
  isValidationError,
  type FieldError,
} from '../types/errors.js';

/** What a custom method reported; `truncated` when it dropped violations */
export interface InterfaceOutcome {
  fields: FieldError[];
  truncated: boolean;
}

/** FieldError for a record that is null or undefined */
export function nilPointer(): FieldError {
  return createFieldError('', 'nil_pointer', 'record is nil', {});
}

function readString(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * A plain Error becomes one `interface.error`; an Error carrying a string
 * `code` (and optionally `path`) becomes `interface.<code>` at that path.
 */
function fromError(error: Error): FieldError {
  const code = readString(error, 'code') ?? 'error';
  return createFieldError(
    readString(error, 'path') ?? '',
    `interface.${code}`,
    error.message,
    { error: error.name }
  );
}

function fromOutcome(outcome: unknown, record: object): InterfaceOutcome {
  if (outcome === undefined || outcome === null) {
    return { fields: [], truncated: false };
  }
  if (isValidationError(outcome)) {
    return { fields: [...outcome.fields], truncated: outcome.truncated };
  }
  if (outcome instanceof Error) {
    return { fields: [fromError(outcome)], truncated: false };
  }
  throw new InputError({
    message:
      `${describeRecord(record)} custom validation returned ` +
      `${typeof outcome}; expected an Error or undefined`,
    errorCode: ErrorCode.INVALID_TYPE,
    context: { strategy: 'interface' },
  });
}

/**
 * Run the record's own check: `validateContext(ctx)` when it has one,
 * otherwise `validate()`. Returned and thrown errors are treated alike,
 * except that engine errors other than ValidationError are rethrown and
 * non-Error throws propagate untouched.
 */
export function runInterface(
  record: object,
  ctx: ValidationContext
): InterfaceOutcome {
  const contextual: unknown = Reflect.get(record, 'validateContext');
  const plain: unknown = Reflect.get(record, 'validate');

  let outcome: unknown;
  try {
    if (typeof contextual === 'function') {
      outcome = Reflect.apply(contextual, record, [ctx]);
    } else if (typeof plain === 'function') {
      outcome = Reflect.apply(plain, record, []);
    }
  } catch (error) {
    if (!(error instanceof Error)) throw error;
    if (isFieldwardenError(error) && !isValidationError(error)) throw error;
    outcome = error;
  }
  return fromOutcome(outcome, record);
}
