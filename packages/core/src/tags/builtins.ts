import { isEmpty, measure, type Kind } from '../inspect/kind.js';
import {
  FORMAT_TAGS,
  isFormatTag,
  matchesFormat,
  type FormatTag,
} from './format-checks.js';

/** Everything a rule sees when it is evaluated against one field */
export interface TagContext {
  value: unknown;
  kind: Kind;
  /** Text after `=` in the tag, or the empty string */
  param: string;
  /** Object, array or map holding the value (enables cross-field rules) */
  parent: unknown;
  /** The record being validated */
  root: unknown;
  path: string;
  field: string;
}

export type TagCheck = (ctx: TagContext) => boolean;

/** What a rule expects after `=` */
export type ParamShape = 'none' | 'number' | 'text' | 'list' | 'field';

export interface TagDefinition {
  check: TagCheck;
  param: ParamShape;
}

const ALPHA = /^[A-Za-z]+$/;
const ALPHANUM = /^[A-Za-z0-9]+$/;
const NUMERIC = /^[-+]?\d+(?:\.\d+)?$/;
const INTEGER = /^[-+]?\d+$/;

function signOfNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function signOfBigints(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Order of two numerics; a bigint meets an integral number as a bigint */
function compareNumeric(a: number | bigint, b: number | bigint): number {
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return signOfBigints(a, b);
  }
  if (typeof a === 'bigint' && typeof b === 'number' && Number.isInteger(b)) {
    return signOfBigints(a, BigInt(b));
  }
  if (typeof a === 'number' && typeof b === 'bigint' && Number.isInteger(a)) {
    return signOfBigints(BigInt(a), b);
  }
  return signOfNumbers(Number(a), Number(b));
}

/** A rule parameter as a bound; integral text becomes a bigint */
function bound(param: string): number | bigint {
  return INTEGER.test(param) ? BigInt(param) : Number(param);
}

function byMeasure(compare: (order: number) => boolean): TagCheck {
  return ({ value, param }) => {
    const actual = measure(value);
    return (
      actual !== undefined && compare(compareNumeric(actual, bound(param)))
    );
  };
}

function equalsParam({ value, param }: TagContext): boolean {
  if (typeof value === 'string') return value === param;
  if (typeof value === 'boolean') return String(value) === param;
  const actual = measure(value);
  const target = bound(param);
  if (actual === undefined || Number.isNaN(target)) return false;
  return compareNumeric(actual, target) === 0;
}

function sibling(ctx: TagContext): unknown {
  if (typeof ctx.parent !== 'object' || ctx.parent === null) return undefined;
  return Reflect.get(ctx.parent, ctx.param);
}

function comparable(value: unknown): number | bigint | string | undefined {
  if (value instanceof Date) return value.getTime();
  if (
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string'
  ) {
    return value;
  }
  return undefined;
}

function order(a: unknown, b: unknown): number | undefined {
  const left = comparable(a);
  const right = comparable(b);
  if (typeof left === 'string' || typeof right === 'string') {
    if (typeof left !== 'string' || typeof right !== 'string') return undefined;
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (left === undefined || right === undefined) return undefined;
  return compareNumeric(left, right);
}

function byField(compare: (order: number) => boolean): TagCheck {
  return (ctx) => {
    const result = order(ctx.value, sibling(ctx));
    return result !== undefined && compare(result);
  };
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return Object.is(a, b);
}

function textCheck(test: (value: string, param: string) => boolean): TagCheck {
  return ({ value, param }) => typeof value === 'string' && test(value, param);
}

function formatCheck(tag: FormatTag): TagDefinition {
  return { check: ({ value }) => matchesFormat(tag, value), param: 'none' };
}

const formatDefinitions: Record<string, TagDefinition> = {};
for (const tag of Object.keys(FORMAT_TAGS)) {
  if (isFormatTag(tag)) formatDefinitions[tag] = formatCheck(tag);
}

export const BUILTIN_TAGS: ReadonlyMap<string, TagDefinition> = new Map(
  Object.entries<TagDefinition>({
    required: { check: ({ value }) => !isEmpty(value), param: 'none' },
    // handled by the adapter before any rule runs
    omitempty: { check: () => true, param: 'none' },

    min: { check: byMeasure((a, b) => a >= b), param: 'number' },
    max: { check: byMeasure((a, b) => a <= b), param: 'number' },
    len: { check: byMeasure((a, b) => a === b), param: 'number' },
    gt: { check: byMeasure((a, b) => a > b), param: 'number' },
    gte: { check: byMeasure((a, b) => a >= b), param: 'number' },
    lt: { check: byMeasure((a, b) => a < b), param: 'number' },
    lte: { check: byMeasure((a, b) => a <= b), param: 'number' },
    eq: { check: equalsParam, param: 'text' },
    ne: { check: (ctx) => !equalsParam(ctx), param: 'text' },
    oneof: {
      check: ({ value, param }) => {
        if (typeof value !== 'string' && typeof value !== 'number') {
          return false;
        }
        return param.split(/\s+/).includes(String(value));
      },
      param: 'list',
    },

    ...formatDefinitions,

    alpha: { check: textCheck((v) => ALPHA.test(v)), param: 'none' },
    alphanum: { check: textCheck((v) => ALPHANUM.test(v)), param: 'none' },
    numeric: {
      check: ({ value }) =>
        typeof value === 'number'
          ? Number.isFinite(value)
          : typeof value === 'string' && NUMERIC.test(value),
      param: 'none',
    },
    lowercase: {
      check: textCheck((v) => v === v.toLowerCase()),
      param: 'none',
    },
    uppercase: {
      check: textCheck((v) => v === v.toUpperCase()),
      param: 'none',
    },
    contains: { check: textCheck((v, p) => v.includes(p)), param: 'text' },
    excludes: { check: textCheck((v, p) => !v.includes(p)), param: 'text' },
    startswith: { check: textCheck((v, p) => v.startsWith(p)), param: 'text' },
    endswith: { check: textCheck((v, p) => v.endsWith(p)), param: 'text' },

    eqfield: {
      check: (ctx) => sameValue(ctx.value, sibling(ctx)),
      param: 'field',
    },
    nefield: {
      check: (ctx) => !sameValue(ctx.value, sibling(ctx)),
      param: 'field',
    },
    gtfield: { check: byField((o) => o > 0), param: 'field' },
    gtefield: { check: byField((o) => o >= 0), param: 'field' },
    ltfield: { check: byField((o) => o < 0), param: 'field' },
    ltefield: { check: byField((o) => o <= 0), param: 'field' },
  })
);

export function isBuiltinTag(name: string): boolean {
  return BUILTIN_TAGS.has(name);
}
