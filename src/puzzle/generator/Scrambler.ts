// Scrambler - builds solvable start boards via random walk from the goal

import type { Board, ScrambleConfig } from '../types';
import { PuzzleState } from '../solver/PuzzleState';
import { goalBoard } from '../../board/Board';

function randomChoice<T>(arr: T[], random: () => number): T {
  return arr[Math.floor(random() * arr.length)];
}

// Walk `moves` random slides from the goal, never undoing the previous one
export function scrambleBoard(config: ScrambleConfig): Board {
  const { dimension, moves } = config;
  const random = config.random ?? Math.random;

  if (!Number.isInteger(dimension) || dimension < 2) {
    throw new RangeError(`Dimension must be an integer >= 2, got ${dimension}`);
  }
  if (!Number.isInteger(moves) || moves < 0) {
    throw new RangeError(`Move count must be a non-negative integer, got ${moves}`);
  }

  let state = new PuzzleState(goalBoard(dimension));

  for (let i = 0; i < moves; i++) {
    state = randomChoice(state.successors(null), random);
  }

  return state.board;
}
