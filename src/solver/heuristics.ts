/**
 * Heuristic functions for A* search
 */

import { type Grid, type Position, positionDistance } from '../domain/types.js';
import { BLANK, TILE_COUNT } from '../domain/constants.js';
import { gridsEqual } from '../state/grid.js';

/**
 * Index the position of every tile value in a grid
 */
export function locateTiles(grid: Grid): Position[] {
  const positions: Position[] = new Array<Position>(TILE_COUNT);

  for (let row = 0; row < grid.length; row++) {
    for (let col = 0; col < grid[row].length; col++) {
      positions[grid[row][col]] = { row, col };
    }
  }

  return positions;
}

/**
 * Build a Manhattan-distance evaluator against a fixed goal.
 * The goal is scanned once rather than once per evaluated grid.
 */
export function createManhattanEvaluator(goal: Grid): (grid: Grid) => number {
  const goalPositions = locateTiles(goal);

  return (grid: Grid): number => {
    let distance = 0;

    for (let row = 0; row < grid.length; row++) {
      for (let col = 0; col < grid[row].length; col++) {
        const tile = grid[row][col];
        if (tile === BLANK) continue;
        distance += positionDistance({ row, col }, goalPositions[tile]);
      }
    }

    return distance;
  };
}

/**
 * Sum of L1 distances of every non-blank tile from its goal position.
 * Admissible and consistent: one move changes it by exactly one.
 */
export function manhattanDistance(grid: Grid, goal: Grid): number {
  return createManhattanEvaluator(goal)(grid);
}

/**
 * Check if a grid is the goal
 */
export function isGoalState(grid: Grid, goal: Grid): boolean {
  return gridsEqual(grid, goal);
}
