import { describe, it, expect } from 'vitest';

import { PresenceMap } from '../../presence/presence-map.js';
import { SchemaCompileError } from '../../types/errors.js';
import { AjvPool, detectDraft } from '../ajv-factory.js';
import { pointerToPath, SchemaAdapter } from '../schema-adapter.js';
import { SchemaCache } from '../schema-cache.js';

const user = {
  id: 'user',
  schema: {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string' },
      email: { type: 'string', format: 'email' },
      age: { type: 'integer', minimum: 18 },
    },
    additionalProperties: false,
  },
};

function adapter(): SchemaAdapter {
  return new SchemaAdapter(new SchemaCache(new AjvPool(), 8));
}

describe('SchemaAdapter', () => {
  it('maps Ajv errors to schema.<keyword> at dotted paths', () => {
    const fields = adapter()
      .violations({ email: 'x', age: 10, extra: 1 }, user)
      .sort((a, b) => (a.path < b.path ? -1 : 1));
    expect(fields.map((f) => [f.path, f.code, f.message])).toEqual([
      ['age', 'schema.minimum', 'must be >= 18'],
      ['email', 'schema.format', 'must match format "email"'],
      ['extra', 'schema.additionalProperties', 'must NOT have additional properties'],
      ['name', 'schema.required', "must have required property 'name'"],
    ]);
  });

  it('records the offending value in meta', () => {
    const fields = adapter().violations({ name: 'Ada', extra: 'surplus' }, user);
    expect(fields).toHaveLength(1);
    expect(fields[0]?.meta.value).toBe('surplus');
    expect(fields[0]?.meta.keyword).toBe('additionalProperties');
  });

  it('returns no violations for a valid record', () => {
    expect(adapter().violations({ name: 'Ada', age: 30 }, user)).toEqual([]);
  });

  it('validates the JSON form of the record', () => {
    const source = {
      id: 'counter',
      schema: {
        type: 'object',
        properties: {
          total: { type: 'string' },
          when: { type: 'string', format: 'date-time' },
        },
      },
    };
    expect(
      adapter().violations(
        { total: 10n, when: new Date('2024-01-02T03:04:05Z') },
        source
      )
    ).toEqual([]);
  });

  it('keeps only violations at present paths when given presence', () => {
    const fields = adapter().violations(
      { email: 'x' },
      user,
      PresenceMap.from(['email'])
    );
    expect(fields.map((f) => f.code)).toEqual(['schema.format']);
  });

  it('rejects sources that are not schemas', () => {
    expect(() =>
      adapter().violations({}, { id: 'bad', schema: 'string' })
    ).toThrowError(SchemaCompileError);
    expect(() =>
      adapter().violations({}, { id: 'async', schema: { $async: true } })
    ).toThrowError('schema "async" failed to compile: asynchronous schemas are not supported');
  });
});

describe('pointerToPath', () => {
  it('turns JSON pointers into dotted paths', () => {
    expect(pointerToPath('')).toBe('');
    expect(pointerToPath('/items/0/price')).toBe('items.0.price');
    expect(pointerToPath('/a~1b/c~0d')).toBe('a/b.c~d');
  });
});

describe('detectDraft', () => {
  it('reads $schema and defaults to 2020-12', () => {
    expect(detectDraft({})).toBe('2020-12');
    expect(
      detectDraft({ $schema: 'http://json-schema.org/draft-07/schema#' })
    ).toBe('draft-07');
    expect(
      detectDraft({ $schema: 'https://json-schema.org/draft/2019-09/schema' })
    ).toBe('2019-09');
  });
});
