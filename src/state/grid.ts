/**
 * Grid representation, validation and move generation
 */

import type { Grid, Move, Position, Successor, Tile, ValidationResult } from '../domain/types.js';
import { BLANK, GRID_SIZE, MOVES, TILE_COUNT } from '../domain/constants.js';
import { InvalidGridError } from '../domain/errors.js';

/**
 * Validate that an arbitrary value is a 3x3 permutation of 0-8
 */
export function validateGrid(input: unknown): ValidationResult {
  const errors: string[] = [];
  readCells(input, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Convert an arbitrary value into a Grid, throwing InvalidGridError
 * with every problem found. The returned grid shares no arrays with the input.
 */
export function toGrid(input: unknown, label = 'Grid'): Grid {
  const errors: string[] = [];
  const rows = readCells(input, errors);

  if (errors.length > 0) {
    throw new InvalidGridError(errors, label);
  }

  return rows;
}

function readCells(input: unknown, errors: string[]): Tile[][] {
  const rows: Tile[][] = [];

  if (!Array.isArray(input)) {
    errors.push('Grid must be an array of rows');
    return rows;
  }

  if (input.length !== GRID_SIZE) {
    errors.push(`Grid must have ${GRID_SIZE} rows, found ${input.length}`);
  }

  const seen = new Map<Tile, number>();
  let shapeValid = input.length === GRID_SIZE;

  for (let r = 0; r < input.length; r++) {
    const row: unknown = input[r];

    if (!Array.isArray(row)) {
      errors.push(`Row ${r + 1} must be an array`);
      shapeValid = false;
      continue;
    }

    if (row.length !== GRID_SIZE) {
      errors.push(`Row ${r + 1} must have ${GRID_SIZE} values, found ${row.length}`);
      shapeValid = false;
    }

    const cells: Tile[] = [];
    for (let c = 0; c < row.length; c++) {
      const value: unknown = row[c];

      if (typeof value !== 'number' || !Number.isInteger(value)) {
        errors.push(`Value at row ${r + 1}, column ${c + 1} is not an integer: ${String(value)}`);
        continue;
      }

      if (value < 0 || value >= TILE_COUNT) {
        errors.push(`Value ${value} at row ${r + 1}, column ${c + 1} is outside 0-${TILE_COUNT - 1}`);
        continue;
      }

      seen.set(value, (seen.get(value) ?? 0) + 1);
      cells.push(value);
    }

    rows.push(cells);
  }

  for (const [value, count] of seen) {
    if (count > 1) {
      errors.push(`Value ${value} appears ${count} times`);
    }
  }

  // Missing values are implied by a bad shape, only report them for a 3x3 grid
  if (shapeValid) {
    for (let value = 0; value < TILE_COUNT; value++) {
      if (!seen.has(value)) {
        errors.push(`Value ${value} is missing`);
      }
    }
  }

  return rows;
}

/**
 * Locate the blank tile
 */
export function blankPosition(grid: Grid): Position {
  for (let row = 0; row < grid.length; row++) {
    const col = grid[row].indexOf(BLANK);
    if (col !== -1) {
      return { row, col };
    }
  }

  throw new InvalidGridError(['Grid has no blank (0) tile']);
}

export function isInBounds(p: Position): boolean {
  return p.row >= 0 && p.row < GRID_SIZE && p.col >= 0 && p.col < GRID_SIZE;
}

/**
 * Copy a grid so that no row is shared with the source
 */
export function cloneGrid(grid: Grid): Tile[][] {
  return grid.map(row => [...row]);
}

function swapTiles(grid: Grid, a: Position, b: Position): Grid {
  const next = cloneGrid(grid);
  next[a.row][a.col] = grid[b.row][b.col];
  next[b.row][b.col] = grid[a.row][a.col];
  return next;
}

/**
 * Generate every grid one blank move away, tagged with the move.
 * Moves are tried in the order down, up, right, left.
 */
export function successors(grid: Grid): Successor[] {
  const blank = blankPosition(grid);
  const result: Successor[] = [];

  for (const { move, dRow, dCol } of MOVES) {
    const target = { row: blank.row + dRow, col: blank.col + dCol };
    if (isInBounds(target)) {
      result.push({ grid: swapTiles(grid, blank, target), move });
    }
  }

  return result;
}

/**
 * Generate every grid one blank move away
 */
export function neighbors(grid: Grid): Grid[] {
  return successors(grid).map(s => s.grid);
}

/**
 * Move the blank one cell; null when the move would leave the board
 */
export function applyMove(grid: Grid, move: Move): Grid | null {
  const vector = MOVES.find(m => m.move === move);
  if (!vector) return null;

  const blank = blankPosition(grid);
  const target = { row: blank.row + vector.dRow, col: blank.col + vector.dCol };

  return isInBounds(target) ? swapTiles(grid, blank, target) : null;
}

export function gridsEqual(a: Grid, b: Grid): boolean {
  if (a.length !== b.length) return false;

  for (let row = 0; row < a.length; row++) {
    if (a[row].length !== b[row].length) return false;
    for (let col = 0; col < a[row].length; col++) {
      if (a[row][col] !== b[row][col]) return false;
    }
  }

  return true;
}

/**
 * Check whether `to` is exactly one legal blank move away from `from`
 */
export function isAdjacentMove(from: Grid, to: Grid): boolean {
  return neighbors(from).some(n => gridsEqual(n, to));
}
