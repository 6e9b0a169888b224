/**
 * Main Solver Interface
 */

import type { Grid, Position, Solution, SolverOptions } from '../domain/types.js';
import { DEFAULT_GOAL } from '../domain/constants.js';
import { toGrid, blankPosition, neighbors } from '../state/grid.js';
import { astarSolve } from './astar.js';
import { manhattanDistance, isGoalState } from './heuristics.js';

/**
 * Main 8-puzzle solver class
 */
export class PuzzleSolver {
  constructor(private readonly options: Partial<SolverOptions> = {}) {}

  /**
   * Solve from the given grid to the goal.
   * Throws InvalidGridError when either grid is malformed; an unsolvable
   * or aborted search is reported through the returned Solution.
   */
  solve(
    initial: unknown,
    goal: unknown = DEFAULT_GOAL,
    options: Partial<SolverOptions> = {}
  ): Solution {
    const start = toGrid(initial, 'Initial grid');
    const target = toGrid(goal, 'Goal grid');

    return astarSolve(start, target, { ...this.options, ...options });
  }
}

/**
 * Quick solve function for simple cases
 */
export function solvePuzzle(
  initial: unknown,
  goal: unknown = DEFAULT_GOAL,
  options: Partial<SolverOptions> = {}
): Solution {
  return new PuzzleSolver().solve(initial, goal, options);
}

/**
 * Analyze a grid without solving
 */
export function analyzeGrid(grid: unknown, goal: unknown = DEFAULT_GOAL): {
  grid: Grid;
  blank: Position;
  heuristic: number;
  neighborCount: number;
  isGoal: boolean;
} {
  const current = toGrid(grid, 'Grid');
  const target = toGrid(goal, 'Goal grid');

  return {
    grid: current,
    blank: blankPosition(current),
    heuristic: manhattanDistance(current, target),
    neighborCount: neighbors(current).length,
    isGoal: isGoalState(current, target),
  };
}
