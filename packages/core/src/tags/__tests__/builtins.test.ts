import { describe, it, expect } from 'vitest';

import { kindOf } from '../../inspect/kind.js';
import { BUILTIN_TAGS, isBuiltinTag } from '../builtins.js';

function passes(
  tag: string,
  value: unknown,
  param = '',
  parent: unknown = {}
): boolean {
  const definition = BUILTIN_TAGS.get(tag);
  if (!definition) throw new Error(`no rule ${tag}`);
  return definition.check({
    value,
    kind: kindOf(value),
    param,
    parent,
    root: parent,
    path: 'field',
    field: 'field',
  });
}

describe('built-in rules', () => {
  it('required rejects missing and empty values but not zero', () => {
    expect(passes('required', undefined)).toBe(false);
    expect(passes('required', '')).toBe(false);
    expect(passes('required', [])).toBe(false);
    expect(passes('required', 0)).toBe(true);
    expect(passes('required', false)).toBe(true);
  });

  it('size rules compare string length, element count or numeric value', () => {
    expect(passes('min', 'abc', '3')).toBe(true);
    expect(passes('min', 'ab', '3')).toBe(false);
    expect(passes('min', 10, '18')).toBe(false);
    expect(passes('max', [1, 2, 3], '2')).toBe(false);
    expect(passes('len', 'abcde', '5')).toBe(true);
    expect(passes('gt', 0, '0')).toBe(false);
    expect(passes('gte', 0, '0')).toBe(true);
    expect(passes('lt', 4, '5')).toBe(true);
    expect(passes('lte', 6, '5')).toBe(false);
  });

  it('size rules fail on values that have no size', () => {
    expect(passes('min', { a: 1 }, '1')).toBe(false);
    expect(passes('max', true, '1')).toBe(false);
  });

  it('eq and ne compare strings, booleans and numbers', () => {
    expect(passes('eq', 'on', 'on')).toBe(true);
    expect(passes('eq', true, 'true')).toBe(true);
    expect(passes('eq', 42, '42')).toBe(true);
    expect(passes('ne', 'off', 'on')).toBe(true);
  });

  it('oneof splits its parameter on whitespace', () => {
    expect(passes('oneof', 'green', 'red green')).toBe(true);
    expect(passes('oneof', 'blue', 'red green')).toBe(false);
    expect(passes('oneof', 2, '1 2 3')).toBe(true);
    expect(passes('oneof', ['red'], 'red green')).toBe(false);
  });

  it('format rules check strings with ajv-formats', () => {
    expect(passes('email', 'a@b.com')).toBe(true);
    expect(passes('email', 'not-an-email')).toBe(false);
    expect(passes('uuid', '123e4567-e89b-12d3-a456-426614174000')).toBe(true);
    expect(passes('ipv4', '256.1.1.1')).toBe(false);
    expect(passes('date', '2024-02-30')).toBe(false);
    expect(passes('datetime', '2024-01-02T03:04:05Z')).toBe(true);
    expect(passes('url', 'https://example.com/path')).toBe(true);
    expect(passes('email', 42)).toBe(false);
  });

  it('string rules', () => {
    expect(passes('alpha', 'abc')).toBe(true);
    expect(passes('alpha', 'ab1')).toBe(false);
    expect(passes('alphanum', 'ab1')).toBe(true);
    expect(passes('numeric', '-12.5')).toBe(true);
    expect(passes('numeric', '12a')).toBe(false);
    expect(passes('numeric', 7)).toBe(true);
    expect(passes('lowercase', 'abc')).toBe(true);
    expect(passes('uppercase', 'aBC')).toBe(false);
    expect(passes('contains', 'haystack', 'st')).toBe(true);
    expect(passes('excludes', 'haystack', 'st')).toBe(false);
    expect(passes('startswith', 'prefix-x', 'prefix')).toBe(true);
    expect(passes('endswith', 'file.json', '.ts')).toBe(false);
  });

  it('cross-field rules read a sibling from the parent', () => {
    const parent = {
      password: 'test-secret',
      start: new Date('2024-01-01'),
      min: 5,
    };
    expect(passes('eqfield', 'test-secret', 'password', parent)).toBe(true);
    expect(passes('nefield', 'test-secret', 'password', parent)).toBe(false);
    expect(passes('gtfield', new Date('2024-02-01'), 'start', parent)).toBe(
      true
    );
    expect(passes('ltfield', new Date('2023-12-31'), 'start', parent)).toBe(
      true
    );
    expect(passes('gtefield', 5, 'min', parent)).toBe(true);
    expect(passes('ltefield', 6, 'min', parent)).toBe(false);
  });

  it('cross-field comparisons fail when the operands differ in type', () => {
    expect(passes('gtfield', '10', 'min', { min: 5 })).toBe(false);
    expect(passes('gtfield', 10, 'missing', { min: 5 })).toBe(false);
  });

  it('compares bigints exactly beyond the safe integer range', () => {
    const big = 9007199254740993n;
    expect(passes('max', big, '9007199254740992')).toBe(false);
    expect(passes('min', big, '9007199254740993')).toBe(true);
    expect(passes('eq', big, '9007199254740993')).toBe(true);
    expect(passes('eq', big, '9007199254740992')).toBe(false);
    expect(
      passes('gtfield', big, 'limit', { limit: 9007199254740992n })
    ).toBe(true);
    expect(passes('gtfield', 2n, 'min', { min: 1.5 })).toBe(true);
  });

  it('knows its own names', () => {
    expect(isBuiltinTag('email')).toBe(true);
    expect(isBuiltinTag('after')).toBe(false);
  });
});
