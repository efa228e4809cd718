/**
 * Configuration for a Validator and for single validate calls
 *
 * Long-lived options are fixed when the Validator is built. Per-call options
 * are merged over them into a frozen snapshot that lives for one call.
 */

import type { Redactor } from '../aggregate/redactor.js';
import {
  DEFAULT_LIMITS,
  mergeLimits,
  type Limits,
} from '../guard/security-guard.js';
import type { FieldNameMapper } from '../inspect/value-inspector.js';
import { PresenceMap } from '../presence/presence-map.js';
import type { SchemaSource } from '../schema/schema-adapter.js';
import type { ValidationContext } from '../strategy/capabilities.js';
import type { StrategyChoice } from '../strategy/selector.js';
import type { TagCheck } from '../tags/builtins.js';
import type { FieldRules } from '../tags/field-rules.js';
import type { MessageOverrides } from '../tags/messages.js';
import type { Logger } from '../util/logger.js';
import { ConfigError } from './errors.js';

/**
 * Options fixed at construction
 */
export interface ValidatorOptions {
  /** Strategy to force, or 'auto' for priority order (default: 'auto') */
  strategy?: StrategyChoice;
  /** Run every supported strategy and merge their violations (default: false) */
  runAll?: boolean;
  /** With runAll, pass when any one strategy passes (default: false) */
  requireAny?: boolean;
  /** Order violations by path then code before returning (default: true) */
  sort?: boolean;
  /** Resource bounds (defaults: see DEFAULT_LIMITS) */
  limits?: Partial<Limits>;
  /** Paths whose reported values are replaced by the redaction sentinel */
  redactor?: Redactor;
  /** Extra tag rules by name */
  customTags?: Readonly<Record<string, TagCheck>>;
  /** Per-tag message text or message function */
  messages?: MessageOverrides;
  /** Display name for fields in violation metadata */
  fieldNameMapper?: FieldNameMapper;
  /** Warning sink; false silences warnings (default: console) */
  logger?: Logger | false;
}

/**
 * Options for one call
 */
export interface ValidateCallOptions {
  strategy?: StrategyChoice;
  runAll?: boolean;
  requireAny?: boolean;
  sort?: boolean;
  maxErrors?: number;
  /**
   * Only check fields the caller supplied. Defaults to true when `raw` or
   * `presence` is given; `false` alongside either is a configuration error.
   */
  partial?: boolean;
  /** Serialized payload (JSON text or parsed value) presence is computed from */
  raw?: unknown;
  /** Presence supplied by the caller instead of computed from `raw` */
  presence?: PresenceMap | Iterable<string>;
  /** Schema to use instead of the record's own `jsonSchema()` */
  schema?: SchemaSource;
  /** Tag rules to use instead of the ones declared for the record's class */
  rules?: FieldRules;
  /** Passed to `validateContext` */
  context?: ValidationContext;
}

export interface ResolvedOptions {
  readonly strategy: StrategyChoice;
  readonly runAll: boolean;
  readonly requireAny: boolean;
  readonly sort: boolean;
  readonly limits: Readonly<Limits>;
  readonly redactor?: Redactor;
  readonly customTags: Readonly<Record<string, TagCheck>>;
  readonly messages: MessageOverrides;
  readonly fieldNameMapper?: FieldNameMapper;
  readonly logger: Logger | false;
}

export interface CallSnapshot {
  readonly strategy: StrategyChoice;
  readonly runAll: boolean;
  readonly requireAny: boolean;
  readonly sort: boolean;
  readonly limits: Readonly<Limits>;
  readonly partial: boolean;
  readonly raw?: unknown;
  readonly presence?: PresenceMap;
  readonly schema?: SchemaSource;
  readonly rules?: FieldRules;
  readonly context: ValidationContext;
}

export const DEFAULT_OPTIONS: ResolvedOptions = Object.freeze({
  strategy: 'auto',
  runAll: false,
  requireAny: false,
  sort: true,
  limits: DEFAULT_LIMITS,
  customTags: Object.freeze({}),
  messages: Object.freeze({}),
  logger: console,
});

const EMPTY_CONTEXT: ValidationContext = Object.freeze({});

const STRATEGY_CHOICES: readonly string[] = [
  'auto',
  'interface',
  'tags',
  'schema',
];

function invalid(setting: string, message: string, value?: unknown): never {
  throw new ConfigError({
    message: `${setting} ${message}`,
    context: { setting, value },
  });
}

function checkLimit(name: keyof Limits, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    invalid(
      `limits.${name}`,
      minimum === 0
        ? 'must be a non-negative integer'
        : 'must be a positive integer',
      value
    );
  }
}

function checkFunction(setting: string, value: unknown): void {
  if (value !== undefined && typeof value !== 'function') {
    invalid(setting, 'must be a function', value);
  }
}

function checkBehaviour(options: {
  strategy: unknown;
  runAll: unknown;
  requireAny: unknown;
  sort: unknown;
}): void {
  if (
    typeof options.strategy !== 'string' ||
    !STRATEGY_CHOICES.includes(options.strategy)
  ) {
    invalid(
      'strategy',
      `must be one of ${STRATEGY_CHOICES.join(', ')}`,
      options.strategy
    );
  }
  for (const flag of ['runAll', 'requireAny', 'sort'] as const) {
    if (typeof options[flag] !== 'boolean') {
      invalid(flag, 'must be a boolean', options[flag]);
    }
  }
  if (options.requireAny === true && options.runAll !== true) {
    invalid('requireAny', 'needs runAll');
  }
}

/**
 * Check a resolved configuration
 *
 * @throws {ConfigError} naming the offending setting
 */
export function validateOptions(options: ResolvedOptions): void {
  checkBehaviour(options);

  checkLimit('maxErrors', options.limits.maxErrors, 0);
  checkLimit('maxFields', options.limits.maxFields, 1);
  checkLimit('maxDepth', options.limits.maxDepth, 1);
  checkLimit('maxCachedSchemas', options.limits.maxCachedSchemas, 1);

  checkFunction('redactor', options.redactor);
  checkFunction('fieldNameMapper', options.fieldNameMapper);
  for (const [name, check] of Object.entries(options.customTags)) {
    checkFunction(`customTags.${name}`, check);
  }
  for (const [name, message] of Object.entries(options.messages)) {
    if (typeof message !== 'string' && typeof message !== 'function') {
      invalid(`messages.${name}`, 'must be a string or a function', message);
    }
  }
  const { logger } = options;
  if (logger !== false && typeof Reflect.get(logger, 'warn') !== 'function') {
    invalid('logger', 'must be false or provide warn()');
  }
}

/**
 * Merge user options over the defaults, then validate
 *
 * @throws {ConfigError} When a setting is out of range or of the wrong type
 */
export function resolveOptions(
  userOptions: ValidatorOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    strategy: userOptions.strategy ?? DEFAULT_OPTIONS.strategy,
    runAll: userOptions.runAll ?? DEFAULT_OPTIONS.runAll,
    requireAny: userOptions.requireAny ?? DEFAULT_OPTIONS.requireAny,
    sort: userOptions.sort ?? DEFAULT_OPTIONS.sort,
    limits: mergeLimits(DEFAULT_LIMITS, userOptions.limits),
    redactor: userOptions.redactor,
    customTags: Object.freeze({ ...userOptions.customTags }),
    messages: Object.freeze({ ...userOptions.messages }),
    fieldNameMapper: userOptions.fieldNameMapper,
    logger: userOptions.logger ?? DEFAULT_OPTIONS.logger,
  };

  validateOptions(resolved);
  return Object.freeze(resolved);
}

function toPresenceMap(
  presence: PresenceMap | Iterable<string> | undefined
): PresenceMap | undefined {
  if (presence === undefined || presence instanceof PresenceMap) {
    return presence;
  }
  // a string is iterable, but only as characters
  if (typeof presence === 'string') {
    invalid('presence', 'must be a PresenceMap or a list of paths', presence);
  }
  return PresenceMap.from(presence);
}

/**
 * Effective options for one call
 *
 * @throws {ConfigError} When a per-call override is invalid
 */
export function resolveCallOptions(
  base: ResolvedOptions,
  call: ValidateCallOptions = {}
): CallSnapshot {
  const hasPayload = call.raw !== undefined || call.presence !== undefined;
  if (call.partial === false && hasPayload) {
    invalid('partial', 'cannot be false when raw or presence is supplied');
  }

  const snapshot: CallSnapshot = {
    strategy: call.strategy ?? base.strategy,
    runAll: call.runAll ?? base.runAll,
    requireAny: call.requireAny ?? base.requireAny,
    sort: call.sort ?? base.sort,
    limits:
      call.maxErrors === undefined
        ? base.limits
        : mergeLimits(base.limits, { maxErrors: call.maxErrors }),
    partial: call.partial ?? hasPayload,
    raw: call.raw,
    presence: toPresenceMap(call.presence),
    schema: call.schema,
    rules: call.rules,
    context: call.context ?? EMPTY_CONTEXT,
  };

  checkBehaviour(snapshot);
  checkLimit('maxErrors', snapshot.limits.maxErrors, 0);
  if (call.schema !== undefined && typeof call.schema.id !== 'string') {
    invalid('schema.id', 'must be a string', call.schema.id);
  }
  return Object.freeze(snapshot);
}
