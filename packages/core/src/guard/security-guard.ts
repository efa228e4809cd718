/**
 * Bounds applied to attacker-controlled input: traversal depth, recorded
 * field count, compiled-schema cache size and reported error count.
 */

export interface Limits {
  /** Maximum reported violations; 0 disables truncation */
  maxErrors: number;
  /** Maximum paths recorded while computing presence */
  maxFields: number;
  /** Maximum traversal depth for presence and nested rules */
  maxDepth: number;
  /** Capacity of the compiled-schema LRU cache */
  maxCachedSchemas: number;
}

export const DEFAULT_LIMITS: Readonly<Limits> = Object.freeze({
  maxErrors: 0,
  maxFields: 10_000,
  maxDepth: 100,
  maxCachedSchemas: 1024,
});

/** Overrides that are set win; undefined entries keep the base value */
export function mergeLimits(
  base: Readonly<Limits>,
  overrides: Partial<Limits> = {}
): Readonly<Limits> {
  return Object.freeze({
    maxErrors: overrides.maxErrors ?? base.maxErrors,
    maxFields: overrides.maxFields ?? base.maxFields,
    maxDepth: overrides.maxDepth ?? base.maxDepth,
    maxCachedSchemas: overrides.maxCachedSchemas ?? base.maxCachedSchemas,
  });
}

/** Running count of recorded fields for one traversal */
export class FieldCounter {
  #count = 0;

  constructor(private readonly max: number) {}

  get count(): number {
    return this.#count;
  }

  /** Returns false once the count has gone past the limit */
  record(): boolean {
    this.#count += 1;
    return this.#count <= this.max;
  }
}

export class SecurityGuard {
  readonly limits: Readonly<Limits>;

  constructor(limits: Partial<Limits> = {}) {
    this.limits = mergeLimits(DEFAULT_LIMITS, limits);
  }

  fieldCounter(): FieldCounter {
    return new FieldCounter(this.limits.maxFields);
  }

  /** Whether a container at `depth` may have its children expanded */
  descends(depth: number): boolean {
    return depth < this.limits.maxDepth;
  }

  /** Whether one more violation fits after `retained` were kept */
  retains(retained: number): boolean {
    return this.limits.maxErrors <= 0 || retained < this.limits.maxErrors;
  }

  get cacheCapacity(): number {
    return this.limits.maxCachedSchemas;
  }
}
