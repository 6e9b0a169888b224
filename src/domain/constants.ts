/**
 * Constants for the 8-puzzle solver
 */

import type { Grid, MoveVector, SolverOptions } from './types.js';

// Grid dimensions
export const GRID_SIZE = 3;
export const TILE_COUNT = GRID_SIZE * GRID_SIZE;

export const BLANK = 0;

// Distinct grids reachable from any start: 9! / 2
export const REACHABLE_STATE_COUNT = 181440;

// Goal configuration used when the caller does not supply one
export const DEFAULT_GOAL: Grid = [
  [2, 3, 4],
  [7, 0, 1],
  [8, 5, 6],
];

// Instance solved by the CLI when no grid is given
export const EXAMPLE_INITIAL: Grid = [
  [2, 1, 7],
  [8, 0, 6],
  [3, 4, 5],
];

// Successor generation order: down, up, right, left
export const MOVES: readonly MoveVector[] = [
  { move: 'DOWN', dRow: 1, dCol: 0 },
  { move: 'UP', dRow: -1, dCol: 0 },
  { move: 'RIGHT', dRow: 0, dCol: 1 },
  { move: 'LEFT', dRow: 0, dCol: -1 },
];

// Default solver options: no budget, search runs to completion
export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  maxIterations: Infinity,
  maxTime: Infinity,
};
