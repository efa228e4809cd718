import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';
import {
  BUILTIN_TAGS,
  type ParamShape,
  type TagCheck,
  type TagDefinition,
} from './builtins.js';

/** One `name[=param]` entry of a tag string */
export interface ParsedTag {
  name: string;
  param: string;
}

/** A parsed tag bound to its implementation */
export interface CompiledTag extends ParsedTag {
  check: TagCheck;
}

export interface CompiledRules {
  tags: readonly CompiledTag[];
  required: boolean;
  omitEmpty: boolean;
}

const TAG_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Distinct tag strings kept compiled; per-call rules can add any number */
export const DEFAULT_COMPILED_RULES_CAPACITY = 1024;

/**
 * Split `"required,min=3"` into its entries. A parameter runs from the first
 * `=` to the next comma.
 */
export function parseTags(source: string): ParsedTag[] {
  const tags: ParsedTag[] = [];
  for (const raw of source.split(',')) {
    const entry = raw.trim();
    if (entry === '') continue;
    const eq = entry.indexOf('=');
    tags.push(
      eq === -1
        ? { name: entry, param: '' }
        : { name: entry.slice(0, eq).trim(), param: entry.slice(eq + 1).trim() }
    );
  }
  return tags;
}

function invalidRule(message: string, tag: string, rules: string): ConfigError {
  return new ConfigError({
    message,
    errorCode: ErrorCode.INVALID_RULE,
    context: { setting: 'rules', tag, rules },
  });
}

function checkParam(
  shape: ParamShape,
  tag: ParsedTag,
  rules: string
): ConfigError | undefined {
  const { name, param } = tag;
  switch (shape) {
    case 'none':
      return param === ''
        ? undefined
        : invalidRule(`rule "${name}" takes no parameter`, name, rules);
    case 'number':
      return param !== '' && Number.isFinite(Number(param))
        ? undefined
        : invalidRule(
            `rule "${name}" needs a numeric parameter, got "${param}"`,
            name,
            rules
          );
    case 'list':
    case 'field':
      return param !== ''
        ? undefined
        : invalidRule(`rule "${name}" needs a parameter`, name, rules);
    case 'text':
      return undefined;
    default: {
      const exhaustive: never = shape;
      return exhaustive;
    }
  }
}

/**
 * Built-in rules plus caller registrations. Tag strings are parsed and
 * checked once, then reused for every record of the same shape; the least
 * recently used compilation is dropped past `capacity`.
 */
export class TagRegistry {
  readonly #definitions = new Map<string, TagDefinition>(BUILTIN_TAGS);
  readonly #compiled = new Map<string, CompiledRules>();
  readonly #capacity: number;

  constructor(
    customTags: Readonly<Record<string, TagCheck>> = {},
    capacity = DEFAULT_COMPILED_RULES_CAPACITY
  ) {
    this.#capacity = capacity;
    for (const [name, check] of Object.entries(customTags)) {
      if (!TAG_NAME.test(name)) {
        throw new ConfigError({
          message: `custom rule name "${name}" is not a valid identifier`,
          errorCode: ErrorCode.INVALID_RULE,
          context: { setting: 'customTags', tag: name },
        });
      }
      if (name === 'required' || name === 'omitempty') {
        throw new ConfigError({
          message: `rule "${name}" cannot be replaced`,
          errorCode: ErrorCode.INVALID_RULE,
          context: { setting: 'customTags', tag: name },
        });
      }
      // custom rules accept any parameter
      this.#definitions.set(name, { check, param: 'text' });
    }
  }

  has(name: string): boolean {
    return this.#definitions.has(name);
  }

  /** Number of tag strings currently held compiled */
  get cachedCount(): number {
    return this.#compiled.size;
  }

  /** Parse and bind a tag string; throws ConfigError on unknown rules */
  compile(rules: string): CompiledRules {
    const cached = this.#compiled.get(rules);
    if (cached) {
      this.#compiled.delete(rules);
      this.#compiled.set(rules, cached);
      return cached;
    }

    const tags: CompiledTag[] = [];
    let required = false;
    let omitEmpty = false;
    for (const tag of parseTags(rules)) {
      const definition = this.#definitions.get(tag.name);
      if (!definition) {
        throw invalidRule(`unknown rule "${tag.name}"`, tag.name, rules);
      }
      const problem = checkParam(definition.param, tag, rules);
      if (problem) throw problem;

      if (tag.name === 'required') required = true;
      if (tag.name === 'omitempty') {
        omitEmpty = true;
        continue;
      }
      tags.push({ ...tag, check: definition.check });
    }

    const compiled = Object.freeze({
      tags: Object.freeze(tags),
      required,
      omitEmpty,
    });
    this.#compiled.set(rules, compiled);
    if (this.#compiled.size > this.#capacity) {
      const oldest = this.#compiled.keys().next();
      if (!oldest.done) this.#compiled.delete(oldest.value);
    }
    return compiled;
  }
}
