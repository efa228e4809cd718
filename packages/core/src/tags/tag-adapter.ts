import {
  inspectFields,
  type FieldNameMapper,
  type InspectedField,
} from '../inspect/value-inspector.js';
import { isEmpty } from '../inspect/kind.js';
import { filterByPresence } from '../presence/partial-filter.js';
import type { PresenceMap } from '../presence/presence-map.js';
import { createFieldError, type FieldError } from '../types/errors.js';
import type { TagCheck } from './builtins.js';
import type { FieldRules } from './field-rules.js';
import { resolveMessage, type MessageOverrides } from './messages.js';
import { TagRegistry, type CompiledTag } from './registry.js';

export interface TagAdapterOptions {
  customTags?: Readonly<Record<string, TagCheck>>;
  messages?: MessageOverrides;
  fieldNameMapper?: FieldNameMapper;
}

export interface TagRunOptions {
  maxDepth: number;
  /** Only fields at present paths are checked */
  presence?: PresenceMap;
}

export class TagAdapter {
  readonly #registry: TagRegistry;
  readonly #messages: MessageOverrides;
  readonly #fieldNameMapper?: FieldNameMapper;

  constructor(options: TagAdapterOptions = {}) {
    this.#registry = new TagRegistry(options.customTags);
    this.#messages = options.messages ?? {};
    this.#fieldNameMapper = options.fieldNameMapper;
  }

  get registry(): TagRegistry {
    return this.#registry;
  }

  /**
   * Check every declared field of `record` and yield the first failing rule
   * of each field. Missing values only fail `required`; `omitempty` skips
   * the remaining rules of an empty value.
   */
  *violations(
    record: object,
    rules: FieldRules,
    options: TagRunOptions
  ): Generator<FieldError> {
    let fields: Iterable<InspectedField> = inspectFields(record, rules, {
      maxDepth: options.maxDepth,
      fieldNameMapper: this.#fieldNameMapper,
    });
    if (options.presence) {
      fields = filterByPresence(fields, options.presence);
    }

    for (const field of fields) {
      if (field.rules === undefined) continue;
      const compiled = this.#registry.compile(field.rules);
      const missing = field.value === undefined || field.value === null;

      if (missing && !compiled.required) continue;
      if (compiled.omitEmpty && !compiled.required && isEmpty(field.value)) {
        continue;
      }

      for (const tag of compiled.tags) {
        if (missing && tag.name !== 'required') continue;
        if (!this.#passes(tag, field, record)) {
          yield this.#violation(tag, field);
          break;
        }
      }
    }
  }

  #passes(tag: CompiledTag, field: InspectedField, root: object): boolean {
    return tag.check({
      value: field.value,
      kind: field.kind,
      param: tag.param,
      parent: field.parent,
      root,
      path: field.path,
      field: field.field,
    });
  }

  #violation(tag: CompiledTag, field: InspectedField): FieldError {
    return createFieldError(
      field.path,
      `tag.${tag.name}`,
      resolveMessage(tag.name, tag.param, field.kind, this.#messages),
      {
        tag: tag.name,
        param: tag.param,
        value: field.value,
        kind: field.kind,
        field: field.field,
      }
    );
  }
}
