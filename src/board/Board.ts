import type { Board, BoardKey } from '../puzzle/types';
import { boardKey } from '../puzzle/types';
import { BoardFormatError } from '../puzzle/errors';

// One read-only goal per dimension, built on first use
const goalBoards: Map<number, Board> = new Map();
const goalKeys: Map<number, BoardKey> = new Map();

// Canonical goal: 1..d²-1 in row-major order, blank in the last cell
export function createGoalBoard(dimension: number): Board {
  const board: Board = [];
  for (let i = 0; i < dimension; i++) {
    const row: number[] = [];
    for (let j = 0; j < dimension; j++) {
      row.push(i * dimension + j + 1);
    }
    board.push(row);
  }
  board[dimension - 1][dimension - 1] = 0;
  return board;
}

export function goalBoard(dimension: number): Board {
  let goal = goalBoards.get(dimension);
  if (!goal) {
    goal = createGoalBoard(dimension);
    goalBoards.set(dimension, goal);
  }
  return goal;
}

export function goalKey(dimension: number): BoardKey {
  let key = goalKeys.get(dimension);
  if (key === undefined) {
    key = boardKey(goalBoard(dimension));
    goalKeys.set(dimension, key);
  }
  return key;
}

/**
 * Parse board text such as `1,2,3/4,5,0/7,8,6`.
 * Rows are separated by `/`, `;` or newlines, cells by commas or whitespace.
 */
export function parseBoard(text: string): Board {
  const rows = text
    .trim()
    .split(/[/;\n]+/)
    .map(row => row.trim())
    .filter(row => row.length > 0);

  const board = rows.map(row =>
    row.split(/[\s,]+/).filter(cell => cell.length > 0).map(cell => {
      if (!/^\d+$/.test(cell)) {
        throw new BoardFormatError(`Invalid tile value "${cell}"`);
      }
      return Number(cell);
    })
  );

  validateBoard(board);
  return board;
}

// Throws unless the board is square and holds each of 0..N²-1 exactly once
export function validateBoard(board: Board): void {
  const dimension = board.length;
  if (dimension < 2) {
    throw new BoardFormatError(`Board must have at least 2 rows, got ${dimension}`);
  }

  for (let row = 0; row < dimension; row++) {
    if (board[row].length !== dimension) {
      throw new BoardFormatError(
        `Row ${row + 1} has ${board[row].length} cells, expected ${dimension}`
      );
    }
  }

  const cellCount = dimension * dimension;
  const seen = new Set<number>();
  for (const row of board) {
    for (const value of row) {
      if (!Number.isInteger(value) || value < 0 || value >= cellCount) {
        throw new BoardFormatError(`Tile ${value} is outside 0..${cellCount - 1}`);
      }
      if (seen.has(value)) {
        throw new BoardFormatError(`Tile ${value} appears more than once`);
      }
      seen.add(value);
    }
  }
}

// One line per row, e.g. "[1, 2, 3]"
export function formatBoard(board: Board): string[] {
  return board.map(row => `[${row.join(', ')}]`);
}
