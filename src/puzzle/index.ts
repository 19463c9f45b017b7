// Puzzle System - Types, Solver, Analysis and Generator

// Re-export types
export type {
  Board,
  BoardKey,
  Position,
  Strategy,
  HeuristicKind,
  SolverConfig,
  SolverOptions,
  SearchStats,
  ScrambleConfig
} from './types';
export { STRATEGIES, HEURISTICS, boardKey, boardsEqual, cloneBoard } from './types';

export { PuzzleError, SolverConfigError, BoardFormatError } from './errors';

// Solver API
export {
  PuzzleState,
  Solver,
  solve,
  parseStrategy,
  parseHeuristic,
  validateSolverConfig
} from './solver';
export type { SolveResult } from './solver';

// Analysis API
export { countInversions, isSolvable } from './analysis';

// Generator API
export { scrambleBoard } from './generator';

// Report API
export { formatStats, formatSolutionPath } from './report';

// Board helpers
export { parseBoard, validateBoard, formatBoard, goalBoard, createGoalBoard } from '../board/Board';
