import { createFieldError, REDACTED, type FieldError } from '../types/errors.js';

/** Decides whether values reported at a field path must be hidden */
export type Redactor = (path: string) => boolean;

/**
 * Predicate matching any path that contains one of the substrings
 * (case-insensitive) or matches one of the expressions.
 */
export function redactPaths(...patterns: Array<string | RegExp>): Redactor {
  const needles = patterns
    .filter((p): p is string => typeof p === 'string')
    .map((p) => p.toLowerCase());
  const expressions = patterns.filter(
    (p): p is RegExp => p instanceof RegExp
  );

  return (path) => {
    const lowered = path.toLowerCase();
    return (
      needles.some((needle) => lowered.includes(needle)) ||
      expressions.some((expression) => {
        // reset for /g and /y expressions
        expression.lastIndex = 0;
        return expression.test(path);
      })
    );
  };
}

/** Copy of `field` whose `meta.value` is the sentinel when the path matches */
export function redactFieldError(
  field: FieldError,
  redactor: Redactor | undefined
): FieldError {
  if (!redactor || !redactor(field.path)) return field;
  return createFieldError(field.path, field.code, field.message, {
    ...field.meta,
    value: REDACTED,
  });
}
