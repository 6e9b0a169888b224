/**
 * Grid hashing for duplicate detection during search
 */

import type { Grid } from '../domain/types.js';

/**
 * Create a hash string for a grid: its tiles row-major, e.g. "217806345".
 * Equal grids hash equal, so the explored set compares by value.
 */
export function hashGrid(grid: Grid): string {
  let key = '';

  for (const row of grid) {
    for (const tile of row) {
      key += tile;
    }
  }

  return key;
}
