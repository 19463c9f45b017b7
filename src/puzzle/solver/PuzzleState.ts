// Puzzle state representation
// A board snapshot plus the bookkeeping the search attaches to it

import type { Board, BoardKey, Position } from '../types';
import { boardKey, boardsEqual, cloneBoard } from '../types';
import { goalBoard, goalKey } from '../../board/Board';

export class PuzzleState {
  // Owned copy, never mutated after construction
  readonly board: Board;
  readonly dimension: number;

  // Cached location of the blank (value 0)
  readonly blankRow: number;
  readonly blankCol: number;

  // Back-reference for path reconstruction and undo blocking only
  readonly parent: PuzzleState | null;

  // g-value: moves from the root along the path that produced this state
  pathCost = 0;
  depth = 0;

  private readonly goal: Board;
  private _key?: BoardKey;
  private _misplaced?: number;
  private _manhattan?: number;
  private _successors?: PuzzleState[];

  constructor(board: Board, parent: PuzzleState | null = null) {
    this.board = cloneBoard(board);
    this.dimension = this.board.length;
    this.parent = parent;
    this.goal = goalBoard(this.dimension);

    let blankRow = -1;
    let blankCol = -1;
    for (let row = 0; row < this.dimension; row++) {
      const col = this.board[row].indexOf(0);
      if (col !== -1) {
        blankRow = row;
        blankCol = col;
      }
    }
    this.blankRow = blankRow;
    this.blankCol = blankCol;
  }

  // Identity for visited-set purposes; depends on board contents only
  get key(): BoardKey {
    if (this._key === undefined) {
      this._key = boardKey(this.board);
    }
    return this._key;
  }

  equals(other: PuzzleState): boolean {
    return this.key === other.key;
  }

  // Cost first; equal cost and equal board fall back to depth.
  // The frontier breaks priority ties with this ordering.
  compareTo(other: PuzzleState): number {
    if (this.pathCost === other.pathCost && this.equals(other)) {
      return this.depth - other.depth;
    }
    return this.pathCost - other.pathCost;
  }

  /**
   * Orthogonal neighbours of the blank within the grid.
   * Scans rows blankRow-1..blankRow+1, then columns blankCol-1..blankCol+1,
   * keeping offsets where exactly one of row or column changes.
   */
  neighborPositions(): Position[] {
    const positions: Position[] = [];

    for (let row = this.blankRow - 1; row <= this.blankRow + 1; row++) {
      if (row < 0 || row >= this.dimension) continue;

      for (let col = this.blankCol - 1; col <= this.blankCol + 1; col++) {
        if (col < 0 || col >= this.dimension) continue;

        const sameRow = row === this.blankRow;
        const sameCol = col === this.blankCol;
        if (sameRow !== sameCol) {
          positions.push({ row, col });
        }
      }
    }

    return positions;
  }

  /**
   * Boards reachable by sliding one tile into the blank.
   * Skips the board of the parent (an immediate undo) and, when a visited
   * set is given, any board already in it. Computed once per state; later
   * calls return the cached list whatever filter they pass.
   */
  successors(visited: ReadonlySet<BoardKey> | null = null): PuzzleState[] {
    if (this._successors) {
      return this._successors;
    }

    const children: PuzzleState[] = [];

    for (const { row, col } of this.neighborPositions()) {
      const next = cloneBoard(this.board);
      next[this.blankRow][this.blankCol] = next[row][col];
      next[row][col] = 0;

      if (this.parent && boardsEqual(this.parent.board, next)) continue;
      if (visited && visited.has(boardKey(next))) continue;

      const child = new PuzzleState(next, this);
      child.depth = this.depth + 1;
      child.pathCost = this.pathCost + 1;
      children.push(child);
    }

    this._successors = children;
    return children;
  }

  isGoal(): boolean {
    return this.key === goalKey(this.dimension);
  }

  // Non-blank tiles not on their goal cell
  misplacedTileCount(): number {
    if (this._misplaced !== undefined) {
      return this._misplaced;
    }

    let count = 0;
    for (let row = 0; row < this.dimension; row++) {
      for (let col = 0; col < this.dimension; col++) {
        const value = this.board[row][col];
        if (value !== 0 && value !== this.goal[row][col]) {
          count++;
        }
      }
    }

    this._misplaced = count;
    return count;
  }

  // Sum of row and column distances of every non-blank tile from its goal cell
  manhattanDistance(): number {
    if (this._manhattan !== undefined) {
      return this._manhattan;
    }

    let distance = 0;
    for (let row = 0; row < this.dimension; row++) {
      for (let col = 0; col < this.dimension; col++) {
        const value = this.board[row][col];
        if (value === 0) continue;

        const goalRow = Math.floor((value - 1) / this.dimension);
        const goalCol = (value - 1) % this.dimension;
        distance += Math.abs(row - goalRow) + Math.abs(col - goalCol);
      }
    }

    this._manhattan = distance;
    return distance;
  }

  // States from the root down to this one
  pathFromRoot(): PuzzleState[] {
    const path: PuzzleState[] = [this];
    let current = this.parent;
    while (current) {
      path.unshift(current);
      current = current.parent;
    }
    return path;
  }

  // Edges between a state and its root; 0 for the root itself and for null
  static pathCostFromRoot(state: PuzzleState | null): number {
    let cost = 0;
    let current = state;
    while (current && current.parent) {
      cost++;
      current = current.parent;
    }
    return cost;
  }
}
