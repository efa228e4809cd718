import type { SecurityGuard } from '../guard/security-guard.js';
import { ValidationError, type FieldError } from '../types/errors.js';
import { redactFieldError, type Redactor } from './redactor.js';

/**
 * Collects violations from every strategy of one call. Every violation is
 * counted; only the first `maxErrors` are kept, each redacted on the way in.
 */
export class ErrorAggregator {
  readonly #fields: FieldError[] = [];
  #total = 0;
  #upstreamTruncated = false;

  constructor(
    private readonly guard: SecurityGuard,
    private readonly redactor?: Redactor
  ) {}

  /** Returns false once violations are being dropped */
  add(field: FieldError): boolean {
    this.#total += 1;
    if (!this.guard.retains(this.#fields.length)) return false;
    this.#fields.push(redactFieldError(field, this.redactor));
    return true;
  }

  addAll(fields: Iterable<FieldError>): boolean {
    let kept = true;
    for (const field of fields) {
      kept = this.add(field) && kept;
    }
    return kept;
  }

  /** A strategy reported that it dropped violations of its own */
  markTruncated(): void {
    this.#upstreamTruncated = true;
  }

  get total(): number {
    return this.#total;
  }

  get retained(): number {
    return this.#fields.length;
  }

  get truncated(): boolean {
    return this.#upstreamTruncated || this.#total > this.#fields.length;
  }

  hasErrors(): boolean {
    return this.#total > 0 || this.#upstreamTruncated;
  }

  /** The aggregated error, or undefined when nothing was reported */
  toError(options: { sort?: boolean } = {}): ValidationError | undefined {
    if (!this.hasErrors()) return undefined;
    const error = new ValidationError({
      fields: this.#fields,
      truncated: this.truncated,
    });
    return options.sort === false ? error : error.sort();
  }
}
