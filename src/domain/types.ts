/**
 * Core type definitions for the 8-puzzle solver
 */

// Tile values 0-8, 0 is the blank
export type Tile = number;

// A 3x3 puzzle configuration, never mutated once built
export type Grid = ReadonlyArray<ReadonlyArray<Tile>>;

// Zero-based cell position
export interface Position {
  row: number;
  col: number;
}

// Direction the blank travels in a single move
export type Move = 'DOWN' | 'UP' | 'RIGHT' | 'LEFT';

export interface MoveVector {
  move: Move;
  dRow: number;
  dCol: number;
}

// A grid reached from another grid by one move
export interface Successor {
  grid: Grid;
  move: Move;
}

// Validation result
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

// Solver options
export interface SolverOptions {
  maxIterations: number;
  maxTime: number; // milliseconds
}

// Search statistics
export interface SearchStats {
  nodesExplored: number;   // nodes popped from the frontier
  nodesExpanded: number;   // distinct grids finalized
  nodesGenerated: number;  // nodes pushed onto the frontier
  maxFrontierSize: number;
  timeTaken: number;
}

export type AbortReason = 'MAX_ITERATIONS' | 'MAX_TIME';

export interface SolvedResult {
  found: true;
  status: 'SOLVED';
  path: Grid[];
  moves: Move[];
  moveCount: number;
  stats: SearchStats;
}

export interface NoSolutionResult {
  found: false;
  status: 'NO_SOLUTION';
  stats: SearchStats;
}

export interface AbortedResult {
  found: false;
  status: 'ABORTED';
  reason: AbortReason;
  stats: SearchStats;
}

export type Solution = SolvedResult | NoSolutionResult | AbortedResult;

export function positionDistance(a: Position, b: Position): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}
