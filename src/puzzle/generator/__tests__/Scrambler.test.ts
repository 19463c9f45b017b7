import { describe, it, expect } from 'vitest';
import { scrambleBoard } from '../Scrambler';
import { isSolvable } from '../../analysis';
import { goalBoard } from '../../../board/Board';

describe('scrambleBoard', () => {
  it('returns the goal for zero moves', () => {
    expect(scrambleBoard({ dimension: 3, moves: 0 })).toEqual(goalBoard(3));
  });

  it('takes the first successor when random() is 0', () => {
    const random = () => 0;
    expect(scrambleBoard({ dimension: 3, moves: 1, random })).toEqual([
      [1, 2, 3],
      [4, 5, 0],
      [7, 8, 6]
    ]);
    expect(scrambleBoard({ dimension: 3, moves: 2, random })).toEqual([
      [1, 2, 0],
      [4, 5, 3],
      [7, 8, 6]
    ]);
  });

  it('takes the last successor when random() is close to 1', () => {
    expect(scrambleBoard({ dimension: 3, moves: 1, random: () => 0.999 })).toEqual([
      [1, 2, 3],
      [4, 5, 6],
      [7, 0, 8]
    ]);
  });

  it('always produces solvable boards', () => {
    for (let i = 0; i < 20; i++) {
      expect(isSolvable(scrambleBoard({ dimension: 3, moves: 30 }))).toBe(true);
      expect(isSolvable(scrambleBoard({ dimension: 4, moves: 30 }))).toBe(true);
    }
  });

  it('rejects bad arguments', () => {
    expect(() => scrambleBoard({ dimension: 3, moves: -1 })).toThrow(RangeError);
    expect(() => scrambleBoard({ dimension: 1, moves: 5 })).toThrow(RangeError);
  });
});
