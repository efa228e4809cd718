import { describe, it, expect } from 'vitest';

import { PresenceMap } from '../presence-map.js';

describe('PresenceMap', () => {
  it('fills in missing ancestors', () => {
    const presence = PresenceMap.from(['items.0.price', 'name']);
    expect(presence.paths()).toEqual([
      'items',
      'items.0',
      'items.0.price',
      'name',
    ]);
    expect(presence.size).toBe(4);
  });

  it('keeps walked paths exactly as recorded', () => {
    const presence = PresenceMap.reachable(['a.b', 'c']);
    expect(presence.paths()).toEqual(['a.b', 'c']);
    expect(presence.has('a')).toBe(false);
  });

  it('treats the root path as always present', () => {
    expect(PresenceMap.empty().has('')).toBe(true);
    expect(PresenceMap.empty().has('name')).toBe(false);
  });

  it('reports leaf paths only', () => {
    const presence = PresenceMap.from(['a.b', 'a.c.d', 'e']);
    expect(presence.leafPaths()).toEqual(['a.b', 'a.c.d', 'e']);
  });

  it('knows whether a path has present descendants', () => {
    const presence = PresenceMap.from(['user.address.city']);
    expect(presence.hasDescendants('user')).toBe(true);
    expect(presence.hasDescendants('user.address.city')).toBe(false);
    // `us` is a string prefix of `user`, not an ancestor
    expect(presence.hasDescendants('us')).toBe(false);
  });

  it('serializes to a path -> true record', () => {
    const presence = PresenceMap.from(['a.b']);
    expect(presence.toJSON()).toEqual({ a: true, 'a.b': true });
    expect(JSON.stringify(presence)).toBe('{"a":true,"a.b":true}');
  });

  it('iterates over its paths', () => {
    expect(new Set(PresenceMap.from(['x.y']))).toEqual(new Set(['x', 'x.y']));
  });
});
