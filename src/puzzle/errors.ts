// Error types raised at the solver and board boundaries

export class PuzzleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PuzzleError';
  }
}

// Invalid strategy/heuristic value or combination
export class SolverConfigError extends PuzzleError {
  constructor(message: string) {
    super(message);
    this.name = 'SolverConfigError';
  }
}

// Malformed board text or a board that is not a permutation of 0..N²-1
export class BoardFormatError extends PuzzleError {
  constructor(message: string) {
    super(message);
    this.name = 'BoardFormatError';
  }
}
