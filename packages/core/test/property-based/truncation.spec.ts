import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import { Validator } from '../../src/validator/validator.js';
import { NUM_RUNS } from '../fixtures/property-based.js';

describe('maxErrors truncation', () => {
  const validator = new Validator({ logger: false });

  it('keeps min(total, maxErrors) violations and flags the rest', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 20 }),
        fc.integer({ min: 0, max: 25 }),
        (total, maxErrors) => {
          const rules = Object.fromEntries(
            Array.from({ length: total }, (_, i) => [`f${i}`, 'required'])
          );
          const error = validator.validate({}, { rules, maxErrors });
          const expected = maxErrors === 0 ? total : Math.min(total, maxErrors);

          expect(error?.size).toBe(expected);
          expect(error?.truncated).toBe(maxErrors > 0 && total > maxErrors);
        }
      ),
      { seed: 1701, numRuns: NUM_RUNS }
    );
  });

  it('returns violations ordered by path', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 12 }), (total) => {
        const rules = Object.fromEntries(
          Array.from({ length: total }, (_, i) => [`f${total - i}`, 'required'])
        );
        const paths = validator.validate({}, { rules })?.fields.map((f) => f.path);
        expect(paths).toEqual([...(paths ?? [])].sort());
      }),
      { seed: 1702, numRuns: NUM_RUNS }
    );
  });
});
