import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { SecurityGuard } from '../../guard/security-guard.js';
import { InputError, ResourceLimitError } from '../../types/errors.js';
import { isErr, isOk } from '../../types/result.js';
import { computePresence } from '../compute-presence.js';

describe('computePresence', () => {
  it('records object keys and array indices as dotted paths', () => {
    const result = computePresence(
      '{"name":"Ada","items":[{"price":0},{"price":null}],"tags":[]}'
    );
    expect(isOk(result)).toBe(true);
    if (!isOk(result)) return;
    expect(result.value.presence.paths()).toEqual([
      'items',
      'items.0',
      'items.0.price',
      'items.1',
      'items.1.price',
      'name',
      'tags',
    ]);
    expect(result.value.depthExceeded).toBe(false);
    expect(result.value.truncatedPaths).toEqual([]);
  });

  it('accepts an already-parsed tree', () => {
    const result = computePresence({ a: { b: false } });
    expect(result.unwrap().presence.paths()).toEqual(['a', 'a.b']);
  });

  it('does not treat a dot inside a key as nesting', () => {
    const result = computePresence('{"a.b":1,"c":{"d.e":[true]}}');
    expect(result.unwrap().presence.paths()).toEqual([
      'a.b',
      'c',
      'c.d.e',
      'c.d.e.0',
    ]);
    expect(result.unwrap().presence.has('a')).toBe(false);
    expect(result.unwrap().presence.has('c.d')).toBe(false);
  });

  it('fails malformed JSON text with MALFORMED_INPUT', () => {
    const result = computePresence('{"a":');
    expect(isErr(result)).toBe(true);
    if (!isErr(result)) return;
    expect(result.error).toBeInstanceOf(InputError);
    expect(result.error.errorCode).toBe(ErrorCode.MALFORMED_INPUT);
  });

  it('rejects a scalar at the top level', () => {
    const result = computePresence('42');
    expect(isErr(result)).toBe(true);
    if (!isErr(result)) return;
    expect(result.error.errorCode).toBe(ErrorCode.INVALID_TYPE);
    expect(result.error.message).toBe(
      'raw payload must be an object or array, got number'
    );
  });

  it('stops expanding containers at maxDepth and keeps siblings', () => {
    const result = computePresence(
      { a: { b: { c: 1 } }, z: 1 },
      { maxDepth: 2 }
    ).unwrap();
    expect(result.presence.paths()).toEqual(['a', 'a.b', 'z']);
    expect(result.depthExceeded).toBe(true);
    expect(result.truncatedPaths).toEqual(['a.b']);
  });

  it('fails with FIELD_LIMIT_EXCEEDED once maxFields is passed', () => {
    const result = computePresence({ a: 1, b: 2, c: 3 }, { maxFields: 2 });
    expect(isErr(result)).toBe(true);
    if (!isErr(result)) return;
    expect(result.error).toBeInstanceOf(ResourceLimitError);
    expect(result.error.errorCode).toBe(ErrorCode.FIELD_LIMIT_EXCEEDED);
    expect(result.error.context).toEqual({ path: 'c', limit: 2 });
  });

  it('accepts exactly maxFields paths', () => {
    const result = computePresence({ a: 1, b: 2 }, { maxFields: 2 });
    expect(isOk(result)).toBe(true);
  });

  it('handles nesting far deeper than the call stack allows', () => {
    let tree: unknown = 'leaf';
    for (let i = 0; i < 50_000; i++) tree = [tree];
    const guard = new SecurityGuard({ maxDepth: 100, maxFields: 1_000_000 });
    const result = computePresence(tree, guard).unwrap();
    expect(result.depthExceeded).toBe(true);
    expect(result.presence.size).toBe(100);
  });
});
