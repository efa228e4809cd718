import { ErrorAggregator } from '../aggregate/aggregator.js';
import { ErrorCode } from '../errors/codes.js';
import { SecurityGuard } from '../guard/security-guard.js';
import { presentFieldPaths } from '../inspect/value-inspector.js';
import { nilPointer, runInterface } from '../interface/interface-adapter.js';
import { computePresence } from '../presence/compute-presence.js';
import { PresenceMap } from '../presence/presence-map.js';
import { retainPresentViolations } from '../presence/partial-filter.js';
import { AjvPool } from '../schema/ajv-factory.js';
import { SchemaAdapter } from '../schema/schema-adapter.js';
import { SchemaCache } from '../schema/schema-cache.js';
import {
  describeRecord,
  detectCapabilities,
  type Capabilities,
} from '../strategy/capabilities.js';
import { selectStrategies, type StrategyName } from '../strategy/selector.js';
import type { FieldRules } from '../tags/field-rules.js';
import { TagAdapter } from '../tags/tag-adapter.js';
import {
  isConfigError,
  InputError,
  type ConfigError,
  ValidationError,
  type FieldError,
} from '../types/errors.js';
import {
  resolveCallOptions,
  resolveOptions,
  type CallSnapshot,
  type ResolvedOptions,
  type ValidateCallOptions,
  type ValidatorOptions,
} from '../types/options.js';
import { attempt, isErr, type Result } from '../types/result.js';
import { toJsonData } from '../util/json-safe.js';
import { warn } from '../util/logger.js';
import { MetricsCollector, type ValidatorMetrics } from '../util/metrics.js';

/** Violations of one strategy; `truncated` when the strategy dropped some */
interface StrategyRun {
  fields: Iterable<FieldError>;
  truncated: boolean;
}

/**
 * Validation engine: selects strategies for a record, runs them, and folds
 * their violations into one ValidationError.
 *
 * Configuration is frozen at construction. The compiled-schema cache is the
 * only state shared between calls.
 */
export class Validator {
  readonly options: ResolvedOptions;

  readonly #tags: TagAdapter;
  readonly #schemaCache: SchemaCache;
  readonly #schemas: SchemaAdapter;
  readonly #metrics = new MetricsCollector();

  /**
   * @throws {ConfigError} When an option is invalid
   */
  constructor(options: ValidatorOptions = {}) {
    this.options = resolveOptions(options);
    this.#tags = new TagAdapter({
      customTags: this.options.customTags,
      messages: this.options.messages,
      fieldNameMapper: this.options.fieldNameMapper,
    });
    this.#schemaCache = new SchemaCache(
      new AjvPool(),
      this.options.limits.maxCachedSchemas
    );
    this.#schemas = new SchemaAdapter(this.#schemaCache);
  }

  /** Non-throwing construction */
  static create(options: ValidatorOptions = {}): Result<Validator, ConfigError> {
    return attempt(() => new Validator(options), isConfigError);
  }

  /**
   * Validate a record with the strategies it supports.
   *
   * Returns undefined when the record is valid. Field violations are
   * returned, never thrown; bad input, exceeded limits and bad rules throw.
   */
  validate(
    record: unknown,
    options: ValidateCallOptions = {}
  ): ValidationError | undefined {
    const call = resolveCallOptions(this.options, options);
    const finish = this.#metrics.begin();

    if (record === null || record === undefined) {
      finish({ failed: true, truncated: false });
      return new ValidationError({ fields: [nilPointer()] });
    }
    if (typeof record !== 'object') {
      throw new InputError({
        message: `record must be an object, got ${typeof record}`,
        errorCode: ErrorCode.INVALID_TYPE,
        context: { value: record },
      });
    }

    const guard = new SecurityGuard(call.limits);
    const capabilities = detectCapabilities(record, {
      rules: call.rules,
      schema: call.schema,
    });
    const presence = call.partial
      ? this.#presenceFor(record, call, guard, capabilities.rules)
      : undefined;
    const strategies = selectStrategies(record, capabilities, call);

    if (strategies.length === 0) {
      warn(
        this.options.logger,
        `${describeRecord(record)} declares no validation strategy; nothing was checked`
      );
      finish({ failed: false, truncated: false });
      return undefined;
    }

    const aggregator = new ErrorAggregator(guard, this.options.redactor);
    const run = (strategy: StrategyName): StrategyRun =>
      this.#violations(strategy, record, capabilities, call, guard, presence);

    if (call.requireAny) {
      // every strategy runs to completion so a passing one can be seen
      const outcomes = strategies.map((strategy) => {
        const { fields, truncated } = run(strategy);
        return { fields: [...fields], truncated };
      });
      if (outcomes.some((o) => o.fields.length === 0 && !o.truncated)) {
        finish({ failed: false, truncated: false });
        return undefined;
      }
      for (const { fields, truncated } of outcomes) {
        if (truncated) aggregator.markTruncated();
        if (!aggregator.addAll(fields)) break;
      }
    } else {
      collect: for (const strategy of strategies) {
        const { fields, truncated } = run(strategy);
        if (truncated) aggregator.markTruncated();
        for (const field of fields) {
          if (!aggregator.add(field)) break collect;
        }
      }
    }

    const error = aggregator.toError({ sort: call.sort });
    finish({ failed: error !== undefined, truncated: aggregator.truncated });
    return error;
  }

  /**
   * Validate only the fields present in the caller's payload. Presence
   * comes from `options.presence`, else `options.raw`, else the record's
   * own JSON form.
   */
  validatePartial(
    record: unknown,
    options: Omit<ValidateCallOptions, 'partial'> = {}
  ): ValidationError | undefined {
    return this.validate(record, { ...options, partial: true });
  }

  getMetrics(): ValidatorMetrics {
    const cache = this.#schemaCache.stats();
    return {
      ...this.#metrics.snapshot(),
      schemaCompilations: cache.compilations,
      schemaCacheHits: cache.hits,
      schemaCacheMisses: cache.misses,
      schemaCacheEvictions: cache.evictions,
    };
  }

  #violations(
    strategy: StrategyName,
    record: object,
    capabilities: Capabilities,
    call: CallSnapshot,
    guard: SecurityGuard,
    presence: PresenceMap | undefined
  ): StrategyRun {
    switch (strategy) {
      case 'interface': {
        const { fields, truncated } = runInterface(record, call.context);
        return {
          fields: presence
            ? retainPresentViolations(fields, presence)
            : fields,
          truncated,
        };
      }
      case 'tags':
        return {
          fields: capabilities.rules
            ? this.#tags.violations(record, capabilities.rules, {
                maxDepth: guard.limits.maxDepth,
                presence,
              })
            : [],
          truncated: false,
        };
      case 'schema':
        return {
          fields: capabilities.schema
            ? this.#schemas.violations(record, capabilities.schema(), presence)
            : [],
          truncated: false,
        };
      default: {
        const exhaustive: never = strategy;
        return exhaustive;
      }
    }
  }

  /**
   * Without a payload the record stands in for one: its JSON form gives the
   * property-keyed paths schemas and custom methods report, and its defined
   * declared fields give the serialized-name paths tag rules report.
   */
  #presenceFor(
    record: object,
    call: CallSnapshot,
    guard: SecurityGuard,
    rules: FieldRules | undefined
  ): PresenceMap {
    if (call.presence) return call.presence;

    const fromRecord = call.raw === undefined;
    const result = computePresence(
      fromRecord ? toJsonData(record) : call.raw,
      guard
    );
    if (isErr(result)) throw result.error;

    const { presence, depthExceeded, truncatedPaths } = result.value;
    if (depthExceeded) {
      warn(
        this.options.logger,
        `presence truncated at depth ${guard.limits.maxDepth} below: ${truncatedPaths.join(', ')}`
      );
    }
    if (!fromRecord || rules === undefined) return presence;

    const declared = presentFieldPaths(record, rules, guard.limits.maxDepth);
    return PresenceMap.reachable([...presence, ...declared]);
  }
}
