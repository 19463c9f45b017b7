// Puzzle system types

// ============= Basic Types =============

// Square grid of tile values, 0 is the blank
export type Board = number[][];

// Board key format: "1,2,3|4,5,6|7,8,0"
export type BoardKey = string;

export interface Position {
  row: number;
  col: number;
}

// ============= Solver Configuration =============

export type Strategy = 'uniform-cost' | 'a-star';
export type HeuristicKind = 'misplaced-tile' | 'manhattan-distance';

export const STRATEGIES: readonly Strategy[] = ['uniform-cost', 'a-star'];
export const HEURISTICS: readonly HeuristicKind[] = ['misplaced-tile', 'manhattan-distance'];

export interface SolverConfig {
  strategy: Strategy;
  heuristic?: HeuristicKind;
}

export interface SolverOptions extends SolverConfig {
  // Skip the statistics report at the end of search()
  silent?: boolean;
  // Sink for report lines (defaults to console.log)
  write?: (line: string) => void;
  debug?: boolean;
  progressInterval?: number;  // expansions between debug progress lines
}

// ============= Search Results =============

export interface SearchStats {
  solved: boolean;
  // Moves from root to goal; null when no solution was found
  solutionDepth: number | null;
  nodesExpanded: number;
  maxFrontierSize: number;
  elapsedSeconds: number;
}

// ============= Generator Types =============

export interface ScrambleConfig {
  dimension: number;
  moves: number;
  random?: () => number;  // uniform in [0, 1)
}

// ============= Utility Types =============

export function boardKey(board: Board): BoardKey {
  return board.map(row => row.join(',')).join('|');
}

export function cloneBoard(board: Board): Board {
  return board.map(row => [...row]);
}

export function boardsEqual(a: Board, b: Board): boolean {
  if (a.length !== b.length) return false;
  for (let row = 0; row < a.length; row++) {
    if (a[row].length !== b[row].length) return false;
    for (let col = 0; col < a[row].length; col++) {
      if (a[row][col] !== b[row][col]) return false;
    }
  }
  return true;
}
