// @fieldwarden/core entry point
//
// Public API:
// - Validator (explicit instance, the primary entry point) and the shared
//   default-validator helpers validate()/validatePartial().
// - Building blocks for callers composing their own flow: presence
//   computation, partial filtering, the tag rule registry, the schema cache.
// - The error hierarchy and its presenter.

export {
  Validator,
  configureDefaultValidator,
  getDefaultValidator,
  resetDefaultValidator,
  validate,
  validatePartial,
} from './validator/index.js';

// Options
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  resolveCallOptions,
  validateOptions,
  type CallSnapshot,
  type ResolvedOptions,
  type ValidateCallOptions,
  type ValidatorOptions,
} from './types/options.js';
export { DEFAULT_LIMITS, SecurityGuard, type Limits } from './guard/security-guard.js';

// Presence
export { PresenceMap } from './presence/presence-map.js';
export {
  computePresence,
  type PresenceLimits,
  type PresenceResult,
} from './presence/compute-presence.js';
export {
  filterByPresence,
  leafPaths,
  retainPresentViolations,
  type PathBound,
} from './presence/partial-filter.js';

// Strategies
export {
  STRATEGY_PRIORITY,
  selectStrategies,
  supportedStrategies,
  type StrategyChoice,
  type StrategyName,
} from './strategy/selector.js';
export {
  detectCapabilities,
  type Capabilities,
  type ContextValidatable,
  type SchemaProvider,
  type Validatable,
  type ValidationContext,
  type ValidationOutcome,
} from './strategy/capabilities.js';
export {
  defineFieldRules,
  rulesFor,
  type FieldRule,
  type FieldRules,
} from './tags/field-rules.js';
export { BUILTIN_TAGS, type TagCheck, type TagContext } from './tags/builtins.js';
export { parseTags, TagRegistry } from './tags/registry.js';
export {
  resolveMessage,
  type MessageFn,
  type MessageOverride,
  type MessageOverrides,
} from './tags/messages.js';
export type { SchemaSource } from './schema/schema-adapter.js';
export { detectDraft, type JsonSchemaDraft } from './schema/ajv-factory.js';
export type { Kind } from './inspect/kind.js';
export type { FieldNameMapper } from './inspect/value-inspector.js';

// Aggregation
export { redactPaths, type Redactor } from './aggregate/redactor.js';

// Errors
export {
  ErrorCode,
  type Severity,
  getExitCode,
  getHttpStatus,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type APIErrorView,
  type FieldView,
  type ProductionView,
} from './errors/presenter.js';
export {
  REDACTED,
  FieldwardenError,
  InputError,
  UnsupportedStrategyError,
  ResourceLimitError,
  ConfigError,
  InternalError,
  SchemaCompileError,
  ValidationError,
  createFieldError,
  isConfigError,
  isFieldwardenError,
  isValidationError,
  type ErrorContext,
  type FieldError,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  ok,
  err,
  isOk,
  isErr,
  attempt,
  type Result,
  type Ok,
  type Err,
} from './types/result.js';

// Utilities
export type { Logger } from './util/logger.js';
export type { ValidatorMetrics } from './util/metrics.js';
