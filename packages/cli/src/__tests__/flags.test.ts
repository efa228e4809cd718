import { describe, expect, it } from 'vitest';

import { ConfigError } from '@fieldwarden/core';
import {
  parseCount,
  parseRedact,
  requireFlag,
  resolveOutputFormat,
} from '../flags.js';

describe('CLI flag parsing', () => {
  it('parses integer flags with a minimum', () => {
    expect(parseCount('--max-errors', '0', 0)).toBe(0);
    expect(parseCount('--max-depth', ' 12 ', 1)).toBe(12);
    expect(parseCount('--max-depth', undefined, 1)).toBeUndefined();
  });

  it('rejects malformed or out-of-range counts', () => {
    expect(() => parseCount('--max-depth', '0', 1)).toThrowError(
      '--max-depth must be an integer >= 1, got "0"'
    );
    expect(() => parseCount('--max-errors', '2.5', 0)).toThrowError(ConfigError);
    expect(() => parseCount('--max-errors', '', 0)).toThrowError(ConfigError);
  });

  it('resolves the output format', () => {
    expect(resolveOutputFormat(undefined)).toBe('text');
    expect(resolveOutputFormat('JSON')).toBe('json');
    expect(() => resolveOutputFormat('yaml')).toThrowError(
      '--format must be text or json, got "yaml"'
    );
  });

  it('splits redaction patterns', () => {
    expect(parseRedact('password, token,,')).toEqual(['password', 'token']);
    expect(parseRedact(undefined)).toEqual([]);
  });

  it('requires mandatory flags', () => {
    expect(requireFlag('--data', 'a.json')).toBe('a.json');
    expect(() => requireFlag('--data', undefined)).toThrowError(
      '--data is required'
    );
  });
});
