import { describe, it, expect } from 'vitest';

import { SecurityGuard } from '../../guard/security-guard.js';
import { createFieldError, REDACTED } from '../../types/errors.js';
import { ErrorAggregator } from '../aggregator.js';
import { redactPaths } from '../redactor.js';

function violation(path: string, code = 'tag.required') {
  return createFieldError(path, code, 'is required', { value: `${path}-value` });
}

describe('ErrorAggregator', () => {
  it('returns undefined when nothing was reported', () => {
    const aggregator = new ErrorAggregator(new SecurityGuard());
    expect(aggregator.toError()).toBeUndefined();
  });

  it('keeps the first maxErrors violations and flags truncation', () => {
    const aggregator = new ErrorAggregator(new SecurityGuard({ maxErrors: 1 }));
    expect(aggregator.add(violation('b'))).toBe(true);
    expect(aggregator.add(violation('a'))).toBe(false);
    expect(aggregator.add(violation('c'))).toBe(false);

    const error = aggregator.toError();
    expect(error?.fields.map((f) => f.path)).toEqual(['b']);
    expect(error?.truncated).toBe(true);
    expect(aggregator.total).toBe(3);
    expect(aggregator.retained).toBe(1);
  });

  it('carries truncation reported by a strategy', () => {
    const aggregator = new ErrorAggregator(new SecurityGuard());
    aggregator.add(violation('a'));
    aggregator.markTruncated();
    const error = aggregator.toError();
    expect(error?.truncated).toBe(true);
    expect(error?.size).toBe(1);
  });

  it('does not flag truncation when the count equals maxErrors', () => {
    const aggregator = new ErrorAggregator(new SecurityGuard({ maxErrors: 2 }));
    aggregator.addAll([violation('a'), violation('b')]);
    expect(aggregator.toError()?.truncated).toBe(false);
  });

  it('sorts by path then code unless told not to', () => {
    const fields = [
      violation('b', 'tag.min'),
      violation('a', 'tag.max'),
      violation('a', 'schema.type'),
    ];
    const sorted = new ErrorAggregator(new SecurityGuard());
    sorted.addAll(fields);
    expect(sorted.toError()?.fields.map((f) => `${f.path}:${f.code}`)).toEqual([
      'a:schema.type',
      'a:tag.max',
      'b:tag.min',
    ]);

    const unsorted = new ErrorAggregator(new SecurityGuard());
    unsorted.addAll(fields);
    expect(
      unsorted.toError({ sort: false })?.fields.map((f) => f.path)
    ).toEqual(['b', 'a', 'a']);
  });

  it('redacts values whatever the originating strategy', () => {
    const aggregator = new ErrorAggregator(
      new SecurityGuard(),
      redactPaths('password')
    );
    aggregator.add(violation('password', 'tag.min'));
    aggregator.add(violation('password', 'schema.minLength'));
    aggregator.add(violation('user.password', 'interface.error'));
    aggregator.add(violation('name'));
    expect(aggregator.toError()?.fields.map((f) => f.meta.value)).toEqual([
      'name-value',
      REDACTED,
      REDACTED,
      REDACTED,
    ]);
  });
});
