import { describe, it, expect } from 'vitest';

import { ConfigError, isConfigError } from '../errors.js';
import { attempt, err, isErr, isOk, ok, type Result } from '../result.js';

function half(n: number): Result<number, string> {
  return n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);
}

describe('Result', () => {
  it('maps and chains successes', () => {
    const result = half(8).flatMap(half).map((n) => n + 1);
    expect(isOk(result)).toBe(true);
    expect(result.unwrap()).toBe(3);
  });

  it('short-circuits on the first failure', () => {
    const result = half(6).flatMap(half);
    expect(isErr(result)).toBe(true);
    expect(result.unwrapOr(-1)).toBe(-1);
    if (isErr(result)) expect(result.error).toBe('3 is odd');
  });

  it('maps errors', () => {
    const result = half(3).mapErr((message) => message.toUpperCase());
    expect(isErr(result) && result.error).toBe('3 IS ODD');
  });

  it('rethrows carried Error instances on unwrap', () => {
    const failure = err(new ConfigError({ message: 'bad option' }));
    expect(() => failure.unwrap()).toThrowError(ConfigError);
  });

  it('captures recognized exceptions with attempt', () => {
    const failure = attempt(() => {
      throw new ConfigError({ message: 'bad option' });
    }, isConfigError);
    expect(isErr(failure) && failure.error.message).toBe('bad option');
    expect(attempt(() => 7, isConfigError).unwrap()).toBe(7);
  });

  it('rethrows exceptions attempt does not recognize', () => {
    expect(() =>
      attempt(() => {
        throw new TypeError('boom');
      }, isConfigError)
    ).toThrowError(TypeError);
  });
});
