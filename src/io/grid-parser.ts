/**
 * Parse puzzle grids from text and JSON input
 */

import type { Grid, Tile } from '../domain/types.js';
import { DEFAULT_GOAL, GRID_SIZE, TILE_COUNT } from '../domain/constants.js';
import { GridParseError } from '../domain/errors.js';
import { toGrid } from '../state/grid.js';

/**
 * Input format for a puzzle file
 */
export interface PuzzleInput {
  initial: Grid;
  goal: Grid;
}

/**
 * Parse a grid written as text.
 * Accepted layouts:
 * ```
 * 217806345
 * 2 1 7 8 0 6 3 4 5
 * 217/806/345
 * [[2,1,7],[8,0,6],[3,4,5]]
 * ```
 * or three lines of three values.
 */
export function parseGridText(text: string, label = 'Grid'): Grid {
  const tokens = text
    .replace(/[[\]]/g, ' ')
    .split(/[\s,\/]+/)
    .filter(t => t.length > 0);

  for (const token of tokens) {
    if (!/^\d+$/.test(token)) {
      throw new GridParseError(`Unrecognized value "${token}" in ${label.toLowerCase()}`, text);
    }
  }

  // Digits are only split apart when packed as one run or one run per row
  const packed = tokens.length === 1 ||
    (tokens.length < TILE_COUNT && tokens.every(t => t.length * tokens.length === TILE_COUNT));
  const values: Tile[] = packed
    ? tokens.join('').split('').map(Number)
    : tokens.map(Number);

  if (values.length !== TILE_COUNT) {
    throw new GridParseError(
      `${label} needs ${TILE_COUNT} values, found ${values.length}`,
      text
    );
  }

  const rows: Tile[][] = [];
  for (let r = 0; r < GRID_SIZE; r++) {
    rows.push(values.slice(r * GRID_SIZE, (r + 1) * GRID_SIZE));
  }

  return toGrid(rows, label);
}

/**
 * Read a grid given either as text or as nested arrays
 */
export function readGridValue(value: unknown, label: string): Grid {
  if (typeof value === 'string') {
    return parseGridText(value, label);
  }
  return toGrid(value, label);
}

/**
 * Parse JSON input into a puzzle.
 * Either `{ "initial": ..., "goal": ... }` (goal optional) or a bare grid.
 */
export function parsePuzzleFromJSON(json: string): PuzzleInput {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GridParseError(`Puzzle input is not valid JSON: ${reason}`, json);
  }

  if (Array.isArray(parsed) || typeof parsed === 'string') {
    return { initial: readGridValue(parsed, 'Initial grid'), goal: DEFAULT_GOAL };
  }

  if (typeof parsed !== 'object' || parsed === null || !('initial' in parsed)) {
    throw new GridParseError('Puzzle input must contain an "initial" grid', json);
  }

  const goal = 'goal' in parsed && parsed.goal !== undefined && parsed.goal !== null
    ? readGridValue(parsed.goal, 'Goal grid')
    : DEFAULT_GOAL;

  return {
    initial: readGridValue(parsed.initial, 'Initial grid'),
    goal,
  };
}
