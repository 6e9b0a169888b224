/**
 * 8-Puzzle Solver
 *
 * Finds a minimal sequence of moves for the 3x3 sliding tile puzzle
 * using A* search with the Manhattan distance heuristic.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// State exports
export * from './state/grid.js';
export * from './state/grid-hash.js';

// Solver exports
export * from './solver/index.js';

// I/O exports
export * from './io/grid-parser.js';
export * from './io/solution-formatter.js';
