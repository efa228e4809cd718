import { ErrorCode } from '../errors/codes.js';
import { InputError } from '../types/errors.js';
import { attempt } from '../types/result.js';

export function jsonSafeReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function isTypeError(error: unknown): error is TypeError {
  return error instanceof TypeError;
}

function jsonDataReplacer(key: string, current: unknown): unknown {
  if (current instanceof Map) return Object.fromEntries(current);
  if (current instanceof Set) return [...current];
  return jsonSafeReplacer(key, current);
}

/**
 * The JSON data model view of a value: what a client would have sent.
 * Bigints become decimal strings, Maps become plain objects, Sets arrays.
 *
 * @throws {InputError} MALFORMED_INPUT when the value has no JSON form,
 * e.g. a circular structure
 */
export function toJsonData(value: unknown): unknown {
  return attempt(
    (): string | undefined => JSON.stringify(value, jsonDataReplacer),
    isTypeError
  )
    .mapErr(
      (cause) =>
        new InputError({
          message: `record cannot be serialized to JSON: ${cause.message}`,
          errorCode: ErrorCode.MALFORMED_INPUT,
          cause,
        })
    )
    .map((text): unknown => (text === undefined ? undefined : JSON.parse(text)))
    .unwrap();
}
