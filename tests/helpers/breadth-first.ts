/**
 * Uninformed breadth-first search, used as a reference for exact move counts
 */

import type { Grid } from '../../src/domain/types.js';
import { neighbors, gridsEqual } from '../../src/state/grid.js';
import { hashGrid } from '../../src/state/grid-hash.js';

/**
 * Exact number of moves between two grids, or null when unreachable
 */
export function shortestDistance(start: Grid, goal: Grid): number | null {
  if (gridsEqual(start, goal)) return 0;

  const visited = new Set<string>([hashGrid(start)]);
  let layer: Grid[] = [start];
  let depth = 0;

  while (layer.length > 0) {
    depth++;
    const next: Grid[] = [];

    for (const grid of layer) {
      for (const neighbor of neighbors(grid)) {
        if (gridsEqual(neighbor, goal)) return depth;

        const key = hashGrid(neighbor);
        if (visited.has(key)) continue;
        visited.add(key);
        next.push(neighbor);
      }
    }

    layer = next;
  }

  return null;
}

/**
 * Every grid within maxDepth moves of the origin, with its exact distance.
 * Moves are reversible, so this is also the distance from each grid to the origin.
 */
export function gridsWithin(origin: Grid, maxDepth: number): { grid: Grid; distance: number }[] {
  const visited = new Set<string>([hashGrid(origin)]);
  const result = [{ grid: origin, distance: 0 }];
  let layer: Grid[] = [origin];

  for (let depth = 1; depth <= maxDepth; depth++) {
    const next: Grid[] = [];

    for (const grid of layer) {
      for (const neighbor of neighbors(grid)) {
        const key = hashGrid(neighbor);
        if (visited.has(key)) continue;
        visited.add(key);
        next.push(neighbor);
        result.push({ grid: neighbor, distance: depth });
      }
    }

    layer = next;
  }

  return result;
}

/**
 * Walk a pseudo-random but repeatable sequence of moves from a grid.
 * The seed must be a positive integer.
 */
export function scramble(grid: Grid, steps: number, seed: number): Grid {
  let current = grid;
  let state = seed;

  for (let i = 0; i < steps; i++) {
    const options = neighbors(current);
    state = (state * 48271) % 2147483647;
    current = options[state % options.length];
  }

  return current;
}
