import { StrategyRegistry, RegistryOptions } from './ai/registry';
import { fixedPriorityDefinition } from './ai/strategies/fixed_priority';
import { heuristicDefinition } from './ai/strategies/heuristic';
import { qLearningDefinition } from './ai/strategies/q_learning';
import { randomDefinition } from './ai/strategies/random';
import { StrategyDefinition } from './ai/strategy';

export const BUILTIN_STRATEGIES: readonly StrategyDefinition[] = [
  fixedPriorityDefinition,
  heuristicDefinition,
  qLearningDefinition,
  randomDefinition,
];

/** Served when a request names no strategy. */
export const DEFAULT_STRATEGY_ID = 'Enhanced Heuristic_2.1';

/**
 * A registry with the built-in strategies registered in a fixed order.
 */
export function createDefaultRegistry(options: RegistryOptions = {}): StrategyRegistry {
  const registry = new StrategyRegistry(options);
  for (const definition of BUILTIN_STRATEGIES) {
    const result = registry.register(definition);
    if (!result.ok) {
      throw new Error(`Built-in strategy failed to register: ${result.message}`);
    }
  }
  return registry;
}

export * from './core/types';
export * from './core/errors';
export * from './core/board';
export * from './core/random';
export * from './ai/features';
export * from './ai/evaluator';
export * from './ai/strategy';
export * from './ai/strategy_performance';
export * from './ai/registry';
export * from './ai/strategies/fixed_priority';
export * from './ai/strategies/heuristic';
export * from './ai/strategies/q_learning';
export * from './ai/strategies/random';
export * from './training/environment';
export * from './training/reward';
export * from './training/q_table';
export * from './training/engine';
export * from './training/tuning';
export * from './config/settings';
export * from './util/log';
