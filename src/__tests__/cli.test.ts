import { describe, it, expect, vi } from 'vitest';
import { runCli } from '../cli';

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      out: (line: string) => { out.push(line); },
      err: (line: string) => { err.push(line); }
    }
  };
}

describe('runCli', () => {
  it('solves a board with uniform cost search', () => {
    const { out, err, io } = capture();
    const code = runCli(['--board', '1,2,3/4,5,0/7,8,6', '--strategy', 'ucs'], io);

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out.slice(0, 3)).toEqual([
      'Solution depth was: 1',
      'Number of nodes expanded: 3',
      'Max queue size: 5'
    ]);
    expect(out[3]).toMatch(/^Time taken: \d+\.\d{2} seconds$/);
  });

  it('defaults to A* with manhattan distance', () => {
    const { out, io } = capture();
    expect(runCli(['--board', '1,2,3/4,5,0/7,8,6'], io)).toBe(0);
    expect(out.slice(0, 3)).toEqual([
      'Solution depth was: 1',
      'Number of nodes expanded: 1',
      'Max queue size: 3'
    ]);
  });

  it('prints the solution path after the statistics', () => {
    const { out, io } = capture();
    runCli(['--board', '1,2,3/4,5,0/7,8,6', '--strategy', 'astar', '--heuristic', 'misplaced', '--path'], io);

    expect(out.slice(4)).toEqual([
      '',
      '[1, 2, 3]',
      '[4, 5, 0]',
      '[7, 8, 6]',
      '',
      '[1, 2, 3]',
      '[4, 5, 6]',
      '[7, 8, 0]',
      ''
    ]);
  });

  it('prints a scrambled start board', () => {
    const { out, io } = capture();
    expect(runCli(['--scramble', '0'], io)).toBe(0);
    expect(out.slice(0, 8)).toEqual([
      'Initial board:',
      '[1, 2, 3]',
      '[4, 5, 6]',
      '[7, 8, 0]',
      '',
      'Solution depth was: 0',
      'Number of nodes expanded: 0',
      'Max queue size: 0'
    ]);
  });

  it('fails on an unknown strategy without writing output', () => {
    const { out, err, io } = capture();
    expect(runCli(['--board', '1,2,3/4,5,0/7,8,6', '--strategy', 'greedy'], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      'SolverConfigError: Unknown strategy "greedy" (expected one of: ucs, uniform-cost, astar, a-star)'
    ]);
  });

  it('fails on an unknown heuristic', () => {
    const { out, err, io } = capture();
    expect(runCli(['--board', '1,2,3/4,5,0/7,8,6', '--heuristic', 'euclid'], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err[0]).toMatch(/^SolverConfigError: Unknown heuristic "euclid"/);
  });

  it('fails on a malformed board', () => {
    const { out, err, io } = capture();
    expect(runCli(['--board', '1,1,3/4,5,6/7,8,0'], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(['BoardFormatError: Tile 1 appears more than once']);
  });

  it('notes an odd-parity start board when debugging', () => {
    const { out, err, io } = capture();
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      expect(runCli(['--board', '2,1/3,0', '--debug'], io)).toBe(0);
    } finally {
      log.mockRestore();
    }
    expect(err).toEqual(['Start board has odd parity; the search will exhaust the state space']);
    expect(out[0]).toBe('3-Puzzle provided is not solvable.');
    expect(out[3]).toMatch(/^Time taken: \d+\.\d{2}$/);
  });

  it('requires a starting board', () => {
    const { err, io } = capture();
    expect(runCli([], io)).toBe(1);
    expect(err).toEqual(['PuzzleError: Provide a starting board with --board or --scramble']);
  });

  it('rejects unknown flags', () => {
    const { out, err, io } = capture();
    expect(runCli(['--fast'], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
  });

  it('prints usage', () => {
    const { out, io } = capture();
    expect(runCli(['--help'], io)).toBe(0);
    expect(out[0]).toMatch(/^Usage: sliding-puzzle/);
  });
});
