/**
 * Result<T, E> for operations whose failure is part of the contract:
 * presence computation and non-throwing validator construction.
 *
 * Both variants carry both type parameters so a method called on the
 * union resolves against one signature.
 */

export type Result<T, E> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok<U, E>(fn(this.value));
  }

  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new Ok<T, F>(this.value);
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return fn(this.value);
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr<U>(_fallback: U): T | U {
    return this.value;
  }
}

export class Err<T, E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return new Err<T, F>(fn(this.error));
  }

  flatMap<U>(_fn: (value: T) => Result<U, E>): Result<U, E> {
    return new Err<U, E>(this.error);
  }

  /** Rethrows Error payloads as-is so callers see the original class */
  unwrap(): never {
    if (this.error instanceof Error) throw this.error;
    throw new Error(`unwrap called on Err: ${String(this.error)}`);
  }

  unwrapOr<U>(fallback: U): U {
    return fallback;
  }
}

export function ok<T, E = never>(value: T): Ok<T, E> {
  return new Ok<T, E>(value);
}

export function err<E, T = never>(error: E): Err<T, E> {
  return new Err<T, E>(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T, E> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<T, E> {
  return result._tag === 'Err';
}

/**
 * Run `fn`, capturing exceptions that `accepts` recognizes as an Err.
 * Anything else is rethrown.
 */
export function attempt<T, E>(
  fn: () => T,
  accepts: (error: unknown) => error is E
): Result<T, E> {
  try {
    return ok<T, E>(fn());
  } catch (error) {
    if (accepts(error)) return err<E, T>(error);
    throw error;
  }
}
