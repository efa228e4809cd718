import type { Ajv, Schema, ValidateFunction } from 'ajv';

import { SchemaCompileError } from '../types/errors.js';
import type { AjvPool } from './ajv-factory.js';

interface SchemaCacheEntry {
  validate: ValidateFunction;
  ajv: Ajv;
  schema: Schema;
}

// Ajv keeps compiled object schemas in its own cache; boolean schemas are not kept
function release(entry: SchemaCacheEntry): void {
  if (typeof entry.schema === 'object') {
    entry.ajv.removeSchema(entry.schema);
  }
}

export interface SchemaCacheStats {
  size: number;
  capacity: number;
  compilations: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * Compiled validators keyed by schema id, least recently used evicted first.
 * Map iteration order is the recency order: a hit re-inserts the entry.
 */
export class SchemaCache {
  readonly #entries = new Map<string, SchemaCacheEntry>();
  readonly #stats = { compilations: 0, hits: 0, misses: 0, evictions: 0 };

  constructor(
    private readonly pool: AjvPool,
    private readonly capacity: number
  ) {}

  /**
   * Return the validator for `id`, compiling `schema` on a miss. Lookup,
   * promotion, insertion and eviction happen in one synchronous step.
   */
  getOrCompile(id: string, schema: Schema): ValidateFunction {
    const cached = this.#entries.get(id);
    if (cached) {
      this.#entries.delete(id);
      this.#entries.set(id, cached);
      this.#stats.hits += 1;
      return cached.validate;
    }

    this.#stats.misses += 1;
    const ajv = this.pool.forSchema(schema);
    let validate: ValidateFunction;
    try {
      validate = ajv.compile(schema);
    } catch (error) {
      throw new SchemaCompileError(
        id,
        error instanceof Error ? error : new Error(String(error))
      );
    }
    this.#stats.compilations += 1;

    this.#entries.set(id, { validate, ajv, schema });
    while (this.#entries.size > this.capacity) {
      this.#evictOldest();
    }
    return validate;
  }

  has(id: string): boolean {
    return this.#entries.has(id);
  }

  /** Ids from least to most recently used */
  keys(): string[] {
    return [...this.#entries.keys()];
  }

  get size(): number {
    return this.#entries.size;
  }

  stats(): SchemaCacheStats {
    return {
      size: this.#entries.size,
      capacity: this.capacity,
      ...this.#stats,
    };
  }

  clear(): void {
    for (const entry of this.#entries.values()) {
      release(entry);
    }
    this.#entries.clear();
  }

  #evictOldest(): void {
    const oldest = this.#entries.entries().next();
    if (oldest.done) return;
    const [id, entry] = oldest.value;
    this.#entries.delete(id);
    release(entry);
    this.#stats.evictions += 1;
  }
}
