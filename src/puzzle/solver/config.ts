// Strategy/heuristic parsing and validation

import type { Strategy, HeuristicKind, SolverConfig } from '../types';
import { STRATEGIES, HEURISTICS } from '../types';
import { SolverConfigError } from '../errors';

const STRATEGY_ALIASES = new Map<string, Strategy>([
  ['ucs', 'uniform-cost'],
  ['uniform-cost', 'uniform-cost'],
  ['astar', 'a-star'],
  ['a-star', 'a-star']
]);

const HEURISTIC_ALIASES = new Map<string, HeuristicKind>([
  ['misplaced', 'misplaced-tile'],
  ['misplaced-tile', 'misplaced-tile'],
  ['manhattan', 'manhattan-distance'],
  ['manhattan-distance', 'manhattan-distance']
]);

export function isStrategy(value: unknown): value is Strategy {
  return STRATEGIES.some(s => s === value);
}

export function isHeuristic(value: unknown): value is HeuristicKind {
  return HEURISTICS.some(h => h === value);
}

export function parseStrategy(value: string): Strategy {
  const strategy = STRATEGY_ALIASES.get(value.trim().toLowerCase());
  if (!strategy) {
    throw new SolverConfigError(
      `Unknown strategy "${value}" (expected one of: ${[...STRATEGY_ALIASES.keys()].join(', ')})`
    );
  }
  return strategy;
}

export function parseHeuristic(value: string): HeuristicKind {
  const heuristic = HEURISTIC_ALIASES.get(value.trim().toLowerCase());
  if (!heuristic) {
    throw new SolverConfigError(
      `Unknown heuristic "${value}" (expected one of: ${[...HEURISTIC_ALIASES.keys()].join(', ')})`
    );
  }
  return heuristic;
}

/**
 * Check a strategy/heuristic combination before any search work starts.
 * A* needs a heuristic; uniform cost ignores one.
 */
export function validateSolverConfig(config: SolverConfig): SolverConfig {
  if (!isStrategy(config.strategy)) {
    throw new SolverConfigError(`Invalid strategy: ${String(config.strategy)}`);
  }

  if (config.strategy === 'uniform-cost') {
    return { strategy: config.strategy };
  }

  if (config.heuristic === undefined) {
    throw new SolverConfigError('A* search requires a heuristic');
  }
  if (!isHeuristic(config.heuristic)) {
    throw new SolverConfigError(`Invalid heuristic: ${String(config.heuristic)}`);
  }

  return { strategy: config.strategy, heuristic: config.heuristic };
}
