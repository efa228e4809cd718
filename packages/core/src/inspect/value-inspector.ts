import {
  toFieldRule,
  type FieldRule,
  type FieldRules,
} from '../tags/field-rules.js';
import { kindOf, type Kind } from './kind.js';

export type FieldNameMapper = (name: string, path: string) => string;

/** One declared field reached while walking a record */
export interface InspectedField {
  /** Dotted/indexed serialized path */
  path: string;
  /** Display name after the field-name mapper */
  field: string;
  kind: Kind;
  value: unknown;
  /** Object, array or map holding the value */
  parent: unknown;
  /** Raw tag string, if the field declares one */
  rules?: string;
}

export interface InspectOptions {
  /** Nested rules below this depth are not visited */
  maxDepth: number;
  fieldNameMapper?: FieldNameMapper;
}

type Frame =
  | {
      type: 'object';
      target: unknown;
      rules: FieldRules;
      path: string;
      field: string;
      depth: number;
    }
  | {
      type: 'each';
      target: unknown;
      rule: FieldRule;
      path: string;
      field: string;
      depth: number;
    };

function joinPath(prefix: string, segment: string): string {
  return prefix === '' ? segment : `${prefix}.${segment}`;
}

function joinField(prefix: string, name: string): string {
  return prefix === '' ? name : `${prefix}.${name}`;
}

function readProperty(target: unknown, key: string): unknown {
  if (typeof target !== 'object' || target === null) return undefined;
  return Reflect.get(target, key);
}

function elementsOf(target: unknown): Array<[string, unknown]> {
  if (Array.isArray(target)) {
    return target.map((element, index) => [String(index), element]);
  }
  if (target instanceof Map) {
    return [...target.entries()].map(([key, element]) => [
      String(key),
      element,
    ]);
  }
  if (typeof target === 'object' && target !== null) {
    return Object.entries(target);
  }
  return [];
}

/**
 * Lazily walk the declared fields of a record, yielding each field with its
 * path, kind and raw tag string. Nested objects (`fields`) and collection
 * elements (`each`) are expanded through an explicit stack; absent or
 * non-object values are not descended into.
 */
export function* inspectFields(
  record: object,
  rules: FieldRules,
  options: InspectOptions
): Generator<InspectedField> {
  const mapName = options.fieldNameMapper ?? ((name: string) => name);
  const stack: Frame[] = [
    { type: 'object', target: record, rules, path: '', field: '', depth: 0 },
  ];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined || frame.depth >= options.maxDepth) continue;

    const children: Frame[] = [];

    if (frame.type === 'object') {
      for (const [key, spec] of Object.entries(frame.rules)) {
        const rule = toFieldRule(spec);
        const path = joinPath(frame.path, rule.name ?? key);
        const field = joinField(frame.field, mapName(rule.name ?? key, path));
        const value = readProperty(frame.target, key);
        yield {
          path,
          field,
          kind: kindOf(value),
          value,
          parent: frame.target,
          rules: rule.rules,
        };
        children.push(...nestedFrames(rule, value, path, field, frame.depth));
      }
    } else {
      const rule = frame.rule;
      for (const [segment, value] of elementsOf(frame.target)) {
        const path = joinPath(frame.path, segment);
        const field = `${frame.field}[${segment}]`;
        yield {
          path,
          field,
          kind: kindOf(value),
          value,
          parent: frame.target,
          rules: rule.rules,
        };
        children.push(...nestedFrames(rule, value, path, field, frame.depth));
      }
    }

    // reversed so declaration order is kept when popping
    for (let i = children.length - 1; i >= 0; i -= 1) {
      const child = children[i];
      if (child) stack.push(child);
    }
  }
}

function nestedFrames(
  rule: FieldRule,
  value: unknown,
  path: string,
  field: string,
  depth: number
): Frame[] {
  if (typeof value !== 'object' || value === null) return [];
  const frames: Frame[] = [];
  if (rule.fields) {
    frames.push({
      type: 'object',
      target: value,
      rules: rule.fields,
      path,
      field,
      depth: depth + 1,
    });
  }
  if (rule.each !== undefined) {
    frames.push({
      type: 'each',
      target: value,
      rule: toFieldRule(rule.each),
      path,
      field,
      depth: depth + 1,
    });
  }
  return frames;
}

/**
 * Serialized paths of the declared fields a record actually holds a value
 * for. A nested path is only reached through a defined parent.
 */
export function* presentFieldPaths(
  record: object,
  rules: FieldRules,
  maxDepth: number
): Generator<string> {
  for (const field of inspectFields(record, rules, { maxDepth })) {
    if (field.value !== undefined) yield field.path;
  }
}
