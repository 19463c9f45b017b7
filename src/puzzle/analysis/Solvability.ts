// Solvability - permutation parity checks for sliding boards

import type { Board } from '../types';

// Pairs of non-blank tiles out of order when read row by row
export function countInversions(board: Board): number {
  const tiles = board.flat().filter(value => value !== 0);
  let inversions = 0;

  for (let i = 0; i < tiles.length; i++) {
    for (let j = i + 1; j < tiles.length; j++) {
      if (tiles[i] > tiles[j]) inversions++;
    }
  }

  return inversions;
}

// Blank row counted from the bottom, 1-based
function blankRowFromBottom(board: Board): number {
  const row = board.findIndex(cells => cells.includes(0));
  return board.length - row;
}

/**
 * Whether the board can reach the canonical goal.
 * Odd widths need an even inversion count; even widths need
 * inversions + blank row (from the bottom) to be odd.
 */
export function isSolvable(board: Board): boolean {
  const inversions = countInversions(board);

  if (board.length % 2 === 1) {
    return inversions % 2 === 0;
  }

  return (inversions + blankRowFromBottom(board)) % 2 === 1;
}
