// Stats Report - turns search results into printable lines

import type { SearchStats } from '../types';
import type { PuzzleState } from '../solver/PuzzleState';
import { formatBoard } from '../../board/Board';

export function formatStats(stats: SearchStats, dimension: number): string[] {
  const lines: string[] = [];

  if (stats.solved && stats.solutionDepth !== null) {
    lines.push(`Solution depth was: ${stats.solutionDepth}`);
  } else {
    lines.push(`${dimension * dimension - 1}-Puzzle provided is not solvable.`);
  }

  lines.push(`Number of nodes expanded: ${stats.nodesExpanded}`);
  lines.push(`Max queue size: ${stats.maxFrontierSize}`);
  // Only a solved run carries the unit
  const unit = stats.solved ? ' seconds' : '';
  lines.push(`Time taken: ${stats.elapsedSeconds.toFixed(2)}${unit}`);

  return lines;
}

// Ancestors first, so the boards read from the initial board to the goal
export function formatSolutionPath(goal: PuzzleState | null): string[] {
  if (!goal) return [];

  return [
    ...formatSolutionPath(goal.parent),
    ...formatBoard(goal.board),
    ''
  ];
}
