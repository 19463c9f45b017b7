// Command line front end for the sliding puzzle solver

import { parseArgs } from 'node:util';
import type { Board, HeuristicKind } from './puzzle';
import {
  PuzzleError,
  Solver,
  parseStrategy,
  parseHeuristic,
  isSolvable,
  scrambleBoard,
  formatSolutionPath
} from './puzzle';
import { parseBoard, formatBoard } from './board/Board';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

const USAGE = [
  'Usage: sliding-puzzle (--board <rows> | --scramble <moves> [--dimension <d>]) [options]',
  '',
  '  --board <rows>        e.g. "1,2,3/4,5,0/7,8,6" (rows split by / ; or newline)',
  '  --scramble <moves>    start from a random walk of <moves> slides from the goal',
  '  --dimension <d>       board width for --scramble (default 3)',
  '  --strategy <name>     ucs | astar (default astar)',
  '  --heuristic <name>    misplaced | manhattan (default manhattan, A* only)',
  '  --path                print every board from the start to the goal',
  '  --debug               log search progress',
  '  --help                show this message'
];

function parseCount(value: string, flag: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new PuzzleError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      board: { type: 'string' },
      scramble: { type: 'string' },
      dimension: { type: 'string' },
      strategy: { type: 'string' },
      heuristic: { type: 'string' },
      path: { type: 'boolean' },
      debug: { type: 'boolean' },
      help: { type: 'boolean' }
    }
  });
}

// Returns the process exit code
export function runCli(argv: string[], io: CliIO = defaultIO): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    return 1;
  }
  const { values } = parsed;

  if (values.help) {
    USAGE.forEach(line => io.out(line));
    return 0;
  }

  let solver: Solver;
  let scrambled = false;
  try {
    const strategy = parseStrategy(values.strategy ?? 'astar');
    let heuristic: HeuristicKind | undefined;
    if (values.heuristic !== undefined) {
      heuristic = parseHeuristic(values.heuristic);
    } else if (strategy === 'a-star') {
      heuristic = 'manhattan-distance';
    }

    let board: Board;
    if (values.board !== undefined) {
      board = parseBoard(values.board);
    } else if (values.scramble !== undefined) {
      const dimension = parseCount(values.dimension ?? '3', '--dimension');
      if (dimension < 2) {
        throw new PuzzleError(`--dimension must be at least 2, got ${dimension}`);
      }
      board = scrambleBoard({ dimension, moves: parseCount(values.scramble, '--scramble') });
      scrambled = true;
    } else {
      throw new PuzzleError('Provide a starting board with --board or --scramble');
    }

    solver = new Solver(board, {
      strategy,
      heuristic,
      write: io.out,
      debug: values.debug ?? false
    });
  } catch (error) {
    if (error instanceof PuzzleError) {
      io.err(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (values.debug && !isSolvable(solver.initialBoard)) {
    io.err('Start board has odd parity; the search will exhaust the state space');
  }

  if (scrambled) {
    io.out('Initial board:');
    formatBoard(solver.initialBoard).forEach(line => io.out(line));
    io.out('');
  }

  const goal = solver.search();

  if (values.path && goal) {
    io.out('');
    formatSolutionPath(goal).forEach(line => io.out(line));
  }

  return 0;
}
