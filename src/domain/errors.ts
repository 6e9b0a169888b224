/**
 * Error classes for puzzle input problems
 */

/**
 * Base error class for puzzle errors
 */
export class PuzzleError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = [],
  ) {
    super(message);
    this.name = 'PuzzleError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PuzzleError);
    }
  }
}

/**
 * Error thrown when a grid is not a 3x3 permutation of 0-8
 */
export class InvalidGridError extends PuzzleError {
  constructor(errors: string[], label = 'Grid') {
    super(`${label} is not a valid 3x3 puzzle: ${errors.join('; ')}`, errors);
    this.name = 'InvalidGridError';
  }
}

/**
 * Error thrown when puzzle input text or JSON cannot be read
 */
export class GridParseError extends PuzzleError {
  constructor(
    message: string,
    public readonly input?: string,
  ) {
    super(message);
    this.name = 'GridParseError';
  }
}
