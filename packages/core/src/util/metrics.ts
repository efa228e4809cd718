import { performance } from 'node:perf_hooks';

export interface ValidatorMetrics {
  validations: number;
  failedValidations: number;
  truncations: number;
  schemaCompilations: number;
  schemaCacheHits: number;
  schemaCacheMisses: number;
  schemaCacheEvictions: number;
  totalValidationMs: number;
}

type CallCounters = Pick<
  ValidatorMetrics,
  'validations' | 'failedValidations' | 'truncations' | 'totalValidationMs'
>;

export interface MetricsCollectorOptions {
  now?: () => number;
}

/** Per-validator call counters; schema counters come from the cache */
export class MetricsCollector {
  readonly #now: () => number;
  readonly #counters: CallCounters = {
    validations: 0,
    failedValidations: 0,
    truncations: 0,
    totalValidationMs: 0,
  };

  constructor(options: MetricsCollectorOptions = {}) {
    this.#now = options.now ?? (() => performance.now());
  }

  /** Start timing one call; the returned function records its outcome */
  begin(): (outcome: { failed: boolean; truncated: boolean }) => void {
    const startedAt = this.#now();
    return ({ failed, truncated }) => {
      this.#counters.validations += 1;
      if (failed) this.#counters.failedValidations += 1;
      if (truncated) this.#counters.truncations += 1;
      this.#counters.totalValidationMs += this.#now() - startedAt;
    };
  }

  snapshot(): CallCounters {
    return { ...this.#counters };
  }
}
