/**
 * A* Search Algorithm for the 8-puzzle
 */

import type {
  Grid,
  SolverOptions,
  Solution,
  SearchStats,
  AbortReason,
} from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';
import { successors } from '../state/grid.js';
import { hashGrid } from '../state/grid-hash.js';
import {
  type SearchNode,
  PriorityQueue,
  createSearchNode,
  extractGridPath,
  extractMovePath,
} from './search-node.js';
import { createManhattanEvaluator, isGoalState } from './heuristics.js';

/**
 * A* Search implementation for the 8-puzzle.
 * Both grids are assumed valid; PuzzleSolver checks them first.
 */
export function astarSolve(
  initial: Grid,
  goal: Grid,
  options: Partial<SolverOptions> = {}
): Solution {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  const startTime = Date.now();
  const evaluate = createManhattanEvaluator(goal);

  const frontier = new PriorityQueue<SearchNode>();
  const explored = new Set<string>();

  frontier.push(createSearchNode(initial, null, null, 0, evaluate(initial)));

  let nodesExplored = 0;
  let nodesGenerated = 1;
  let maxFrontierSize = 1;

  const stats = (): SearchStats => ({
    nodesExplored,
    nodesExpanded: explored.size,
    nodesGenerated,
    maxFrontierSize,
    timeTaken: Date.now() - startTime,
  });

  const abort = (reason: AbortReason): Solution => ({
    found: false,
    status: 'ABORTED',
    reason,
    stats: stats(),
  });

  while (!frontier.isEmpty()) {
    if (nodesExplored >= opts.maxIterations) {
      return abort('MAX_ITERATIONS');
    }

    if (Date.now() - startTime >= opts.maxTime) {
      return abort('MAX_TIME');
    }

    const current = frontier.pop();
    if (current === undefined) break;
    nodesExplored++;

    if (isGoalState(current.grid, goal)) {
      const path = extractGridPath(current);
      return {
        found: true,
        status: 'SOLVED',
        path,
        moves: extractMovePath(current),
        moveCount: path.length - 1,
        stats: stats(),
      };
    }

    const key = hashGrid(current.grid);

    // Already finalized through an equal or cheaper path
    if (explored.has(key)) continue;
    explored.add(key);

    for (const { grid, move } of successors(current.grid)) {
      if (explored.has(hashGrid(grid))) continue;

      frontier.push(createSearchNode(grid, current, move, current.cost + 1, evaluate(grid)));
      nodesGenerated++;
    }

    maxFrontierSize = Math.max(maxFrontierSize, frontier.size());
  }

  return {
    found: false,
    status: 'NO_SOLUTION',
    stats: stats(),
  };
}
