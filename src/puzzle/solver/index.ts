// Solver exports
export { PuzzleState } from './PuzzleState';
export { Solver, solve } from './Solver';
export type { SolveResult } from './Solver';
export { parseStrategy, parseHeuristic, validateSolverConfig } from './config';
