/**
 * PresenceMap - the set of field paths explicitly supplied in a payload.
 *
 * Paths are dotted/indexed (`items.0.price`). The root is the empty path and
 * is always present. Every stored path has all of its ancestors stored.
 *
 * A key may itself contain a dot, so only `from` infers ancestors from the
 * text of a path; maps built from a walk keep exactly what was reached.
 */

function parentOf(path: string): string {
  const idx = path.lastIndexOf('.');
  return idx === -1 ? '' : path.slice(0, idx);
}

function withAncestors(paths: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const path of paths) {
    let cursor = path;
    while (cursor !== '' && !out.has(cursor)) {
      out.add(cursor);
      cursor = parentOf(cursor);
    }
  }
  return out;
}

export class PresenceMap implements Iterable<string> {
  readonly #paths: ReadonlySet<string>;

  private constructor(paths: ReadonlySet<string>) {
    this.#paths = paths;
  }

  static empty(): PresenceMap {
    return new PresenceMap(new Set());
  }

  /**
   * Build a map from explicit paths, filling in missing ancestors
   */
  static from(paths: Iterable<string>): PresenceMap {
    return new PresenceMap(withAncestors(paths));
  }

  /**
   * Paths recorded by a walk over a payload, parents before children.
   * Nothing is inferred: `{"a.b": 1}` yields `a.b` and not `a`.
   */
  static reachable(paths: Iterable<string>): PresenceMap {
    return new PresenceMap(new Set(paths));
  }

  get size(): number {
    return this.#paths.size;
  }

  has(path: string): boolean {
    return path === '' || this.#paths.has(path);
  }

  /** True when some present path lies strictly below `path` */
  hasDescendants(path: string): boolean {
    if (path === '') return this.#paths.size > 0;
    const prefix = `${path}.`;
    for (const candidate of this.#paths) {
      if (candidate.startsWith(prefix)) return true;
    }
    return false;
  }

  /** Present paths, sorted */
  paths(): string[] {
    return [...this.#paths].sort();
  }

  /**
   * Paths that no other present path extends: terminal data fields rather
   * than the container paths recorded on the way down
   */
  leafPaths(): string[] {
    const parents = new Set<string>();
    for (const path of this.#paths) {
      parents.add(parentOf(path));
    }
    return this.paths().filter((path) => !parents.has(path));
  }

  toJSON(): Record<string, true> {
    const out: Record<string, true> = {};
    for (const path of this.paths()) {
      out[path] = true;
    }
    return out;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.#paths.values();
  }
}
