// Uniform Cost Search and A* over sliding puzzle states

import type {
  Board,
  BoardKey,
  SearchStats,
  SolverConfig,
  SolverOptions
} from '../types';
import { PuzzleState } from './PuzzleState';
import { Frontier } from './Frontier';
import { validateSolverConfig } from './config';
import { formatStats } from '../report';

interface SearchCounters {
  nodesExpanded: number;
  maxFrontierSize: number;
  startTime: number;
  endTime: number;
}

export interface SolveResult {
  goal: PuzzleState | null;
  // Boards from the initial board to the goal; empty when unsolved
  path: Board[];
  stats: SearchStats;
}

type RunOptions = Required<Omit<SolverOptions, keyof SolverConfig>>;

const defaultOptions: RunOptions = {
  silent: false,
  write: line => console.log(line),
  debug: false,
  progressInterval: 10000
};

export class Solver {
  readonly config: SolverConfig;
  readonly initialBoard: Board;

  private readonly options: RunOptions;
  private counters: SearchCounters = { nodesExpanded: 0, maxFrontierSize: 0, startTime: 0, endTime: 0 };
  private lastGoal: PuzzleState | null = null;

  // Throws SolverConfigError before any search work on a bad combination
  constructor(initialBoard: Board, options: SolverOptions) {
    this.config = validateSolverConfig(options);
    this.initialBoard = initialBoard;
    this.options = { ...defaultOptions, ...options };
  }

  // Estimated remaining moves under the configured heuristic
  heuristicCost(state: PuzzleState | null): number {
    if (!state) return 0;

    switch (this.config.heuristic) {
      case 'manhattan-distance':
        return state.manhattanDistance();
      case 'misplaced-tile':
        return state.misplacedTileCount();
      default:
        return 0;
    }
  }

  // Classic Dijkstra with unit edge weights
  uniformCostSearch(): PuzzleState | null {
    const frontier = new Frontier();
    const visited = new Set<BoardKey>();

    frontier.push(0, new PuzzleState(this.initialBoard));

    while (!frontier.isEmpty()) {
      const entry = frontier.pop();
      if (!entry) break;
      const { priority: cost, state } = entry;

      if (state.isGoal()) {
        return state;
      }

      visited.add(state.key);

      const children = state.successors(visited);
      this.recordExpansion();

      for (const child of children) {
        frontier.push(cost + 1, child);
      }

      this.recordFrontierSize(frontier.size);
    }

    return null;
  }

  /**
   * A* keyed by f = g + h.
   * Successors are generated without a visited filter; re-expansion is bounded
   * by relaxing the best known g per board and by never pushing the same
   * (f, board) pair twice. Stale entries for a board may coexist in the frontier.
   */
  aStarSearch(): PuzzleState | null {
    const frontier = new Frontier();
    const root = new PuzzleState(this.initialBoard);
    const bestKnownCost = new Map<BoardKey, number>([[root.key, 0]]);
    const pushed = new Set<string>();

    frontier.push(0, root);

    while (!frontier.isEmpty()) {
      const entry = frontier.pop();
      if (!entry) break;
      const { state } = entry;

      if (state.isGoal()) {
        return state;
      }

      const children = state.successors(null);
      this.recordExpansion();

      const tentative = (bestKnownCost.get(state.key) ?? state.pathCost) + 1;

      for (const child of children) {
        const best = bestKnownCost.get(child.key) ?? Infinity;
        if (tentative >= best) continue;

        bestKnownCost.set(child.key, tentative);
        const total = this.heuristicCost(child) + tentative;

        const pushKey = `${total}#${child.key}`;
        if (!pushed.has(pushKey)) {
          frontier.push(total, child);
          pushed.add(pushKey);
        }
      }

      this.recordFrontierSize(frontier.size);
    }

    return null;
  }

  // Run the configured strategy, report statistics and return the goal state
  search(): PuzzleState | null {
    this.counters = { nodesExpanded: 0, maxFrontierSize: 0, startTime: 0, endTime: 0 };
    this.lastGoal = null;

    if (this.options.debug) {
      console.log(`Starting ${this.config.strategy} search`, this.config);
    }

    this.counters.startTime = Date.now();
    const goal = this.config.strategy === 'a-star'
      ? this.aStarSearch()
      : this.uniformCostSearch();
    this.counters.endTime = Date.now();

    this.lastGoal = goal;

    if (!this.options.silent) {
      for (const line of formatStats(this.statistics, this.initialBoard.length)) {
        this.options.write(line);
      }
    }

    return goal;
  }

  get statistics(): SearchStats {
    const goal = this.lastGoal;
    return {
      solved: goal !== null,
      solutionDepth: goal ? PuzzleState.pathCostFromRoot(goal) : null,
      nodesExpanded: this.counters.nodesExpanded,
      maxFrontierSize: this.counters.maxFrontierSize,
      elapsedSeconds: (this.counters.endTime - this.counters.startTime) / 1000
    };
  }

  private recordExpansion(): void {
    this.counters.nodesExpanded++;

    if (this.options.debug && this.counters.nodesExpanded % this.options.progressInterval === 0) {
      console.log(`Expanded ${this.counters.nodesExpanded} nodes, max queue ${this.counters.maxFrontierSize}`);
    }
  }

  private recordFrontierSize(size: number): void {
    this.counters.maxFrontierSize = Math.max(this.counters.maxFrontierSize, size);
  }
}

// Main solve function
export function solve(board: Board, options: SolverOptions): SolveResult {
  const solver = new Solver(board, options);
  const goal = solver.search();

  return {
    goal,
    path: goal ? goal.pathFromRoot().map(state => state.board) : [],
    stats: solver.statistics
  };
}
