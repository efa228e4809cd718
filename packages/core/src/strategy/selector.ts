import { UnsupportedStrategyError } from '../types/errors.js';
import { describeRecord, type Capabilities } from './capabilities.js';

export type StrategyName = 'interface' | 'tags' | 'schema';

export type StrategyChoice = StrategyName | 'auto';

/** Highest priority first */
export const STRATEGY_PRIORITY: readonly StrategyName[] = Object.freeze([
  'interface',
  'tags',
  'schema',
]);

export function supports(
  capabilities: Capabilities,
  strategy: StrategyName
): boolean {
  switch (strategy) {
    case 'interface':
      return capabilities.contextMethod || capabilities.method;
    case 'tags':
      return capabilities.rules !== undefined;
    case 'schema':
      return capabilities.schema !== undefined;
    default: {
      const exhaustive: never = strategy;
      return exhaustive;
    }
  }
}

export function supportedStrategies(
  capabilities: Capabilities
): StrategyName[] {
  return STRATEGY_PRIORITY.filter((strategy) =>
    supports(capabilities, strategy)
  );
}

export interface SelectOptions {
  strategy: StrategyChoice;
  runAll: boolean;
}

/**
 * Strategies to run, in priority order. An explicit strategy runs alone and
 * must be supported; `runAll` takes every supported strategy; otherwise the
 * highest-priority one. An empty list means there is nothing to check.
 */
export function selectStrategies(
  record: object,
  capabilities: Capabilities,
  options: SelectOptions
): StrategyName[] {
  if (options.strategy !== 'auto') {
    if (!supports(capabilities, options.strategy)) {
      throw new UnsupportedStrategyError(
        options.strategy,
        describeRecord(record)
      );
    }
    return [options.strategy];
  }

  const supported = supportedStrategies(capabilities);
  return options.runAll ? supported : supported.slice(0, 1);
}
