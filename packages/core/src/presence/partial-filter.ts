import type { FieldError } from '../types/errors.js';
import type { PresenceMap } from './presence-map.js';

export interface PathBound {
  readonly path: string;
}

/**
 * Drop every constraint bound to an absent path. Ancestors of a present path
 * are always present, so an absent ancestor implies an absent path.
 * Present paths keep all of their constraints, zero values included.
 */
export function* filterByPresence<T extends PathBound>(
  constraints: Iterable<T>,
  presence: PresenceMap
): Generator<T> {
  for (const constraint of constraints) {
    if (presence.has(constraint.path)) {
      yield constraint;
    }
  }
}

/**
 * Post-hoc variant for engines whose constraints cannot be inspected up
 * front (JSON Schema, custom methods). Root-level violations are kept.
 */
export function retainPresentViolations(
  fields: readonly FieldError[],
  presence: PresenceMap
): FieldError[] {
  return fields.filter((field) => presence.has(field.path));
}

export function leafPaths(presence: PresenceMap): string[] {
  return presence.leafPaths();
}
