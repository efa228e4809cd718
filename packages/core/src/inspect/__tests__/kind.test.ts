import { describe, it, expect } from 'vitest';

import { isEmpty, kindOf, measure } from '../kind.js';

describe('kindOf', () => {
  it('separates containers from plain objects', () => {
    expect(kindOf([])).toBe('array');
    expect(kindOf(new Map())).toBe('map');
    expect(kindOf(new Set())).toBe('set');
    expect(kindOf(new Date(0))).toBe('date');
    expect(kindOf({})).toBe('object');
    expect(kindOf(null)).toBe('null');
    expect(kindOf(undefined)).toBe('undefined');
    expect(kindOf(1n)).toBe('bigint');
  });
});

describe('isEmpty', () => {
  it('treats zero and false as values', () => {
    expect(isEmpty(0)).toBe(false);
    expect(isEmpty(false)).toBe(false);
  });

  it('treats missing values, empty strings and empty collections as empty', () => {
    expect(isEmpty(undefined)).toBe(true);
    expect(isEmpty(null)).toBe(true);
    expect(isEmpty('')).toBe(true);
    expect(isEmpty([])).toBe(true);
    expect(isEmpty(new Map())).toBe(true);
    expect(isEmpty(new Set([1]))).toBe(false);
  });
});

describe('measure', () => {
  it('counts code points rather than UTF-16 units', () => {
    expect(measure('héllo')).toBe(5);
    expect(measure('😀😀')).toBe(2);
  });

  it('measures numbers by value and collections by size', () => {
    expect(measure(17)).toBe(17);
    expect(measure(NaN)).toBeUndefined();
    expect(measure([1, 2, 3])).toBe(3);
    expect(measure(new Map([['a', 1]]))).toBe(1);
    expect(measure({})).toBeUndefined();
  });

  it('keeps bigints as bigints', () => {
    expect(measure(1152921504606846977n)).toBe(1152921504606846977n);
  });
});
