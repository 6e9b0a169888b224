#!/usr/bin/env node
/**
 * 8-Puzzle Solver - CLI Interface
 */

import { PuzzleError } from '../domain/errors.js';
import { PuzzleSolver, analyzeGrid } from '../solver/solver.js';
import {
  formatSolution,
  formatGrid,
  formatStats,
  formatCompactSummary,
  formatSolutionJSON,
} from '../io/solution-formatter.js';
import { type CLIOptions, parseArgs, resolvePuzzle, toSolverOptions } from './options.js';

const EXIT_INVALID_INPUT = 1;
const EXIT_UNSOLVED = 2;

function printHelp(): void {
  console.log(`
8-Puzzle Solver
===============

Finds a shortest sequence of moves for the 3x3 sliding tile puzzle
using A* search with the Manhattan distance heuristic.

USAGE:
  puzzle-solver <command> [options]

COMMANDS:
  solve       Solve a puzzle and print every step
  analyze     Show blank position and heuristic value without solving
  help        Show this help message

OPTIONS:
  -g, --grid <tiles>          Initial grid, 0 is the blank (e.g. 217806345)
  --goal <tiles>              Goal grid (default: 234701856)
  -i, --input <file>          Input file (JSON format), not with --grid
  -f, --format <type>         Output format: text (default) or json
  -n, --max-iterations <n>    Stop after exploring n nodes
  -t, --time <seconds>        Stop after the given number of seconds
  -h, --help                  Show help

EXAMPLES:
  # Solve the built-in example
  puzzle-solver solve

  # Solve a specific grid against the default goal
  puzzle-solver solve --grid "1 2 3 / 4 5 6 / 7 0 8"

  # Solve to a custom goal, JSON output
  puzzle-solver solve -g 123456708 --goal 123456780 -f json

INPUT FILE FORMAT (JSON):
  {
    "initial": [[2, 1, 7], [8, 0, 6], [3, 4, 5]],
    "goal": [[2, 3, 4], [7, 0, 1], [8, 5, 6]]
  }
`);
}

function runSolve(options: CLIOptions): void {
  const { initial, goal } = resolvePuzzle(options);
  const solver = new PuzzleSolver(toSolverOptions(options));
  const solution = solver.solve(initial, goal);

  if (options.outputFormat === 'json') {
    console.log(formatSolutionJSON(solution));
  } else {
    console.log('Initial State:');
    console.log(formatGrid(initial));
    console.log('');
    console.log('Goal State:');
    console.log(formatGrid(goal));
    console.log('');
    console.log(formatSolution(solution));
    console.log(formatStats(solution.stats));
    console.log('');
    console.log(formatCompactSummary(solution));
  }

  if (!solution.found) {
    process.exitCode = EXIT_UNSOLVED;
  }
}

function runAnalyze(options: CLIOptions): void {
  const { initial, goal } = resolvePuzzle(options);
  const analysis = analyzeGrid(initial, goal);

  if (options.outputFormat === 'json') {
    console.log(JSON.stringify(analysis, null, 2));
    return;
  }

  console.log('=== GRID ANALYSIS ===');
  console.log('');
  console.log(formatGrid(analysis.grid));
  console.log('');
  console.log(`Blank Position: row ${analysis.blank.row + 1}, column ${analysis.blank.col + 1}`);
  console.log(`Manhattan Distance: ${analysis.heuristic}`);
  console.log(`Available Moves: ${analysis.neighborCount}`);
  console.log(`Is Goal: ${analysis.isGoal ? 'Yes' : 'No'}`);
}

function reportPuzzleError(err: PuzzleError): void {
  console.error(`Error: ${err.message}`);
  for (const problem of err.errors) {
    console.error(`  - ${problem}`);
  }
  process.exitCode = EXIT_INVALID_INPUT;
}

// Main entry point
function main(): void {
  try {
    const options = parseArgs(process.argv.slice(2));

    switch (options.command) {
      case 'solve':
        runSolve(options);
        break;

      case 'analyze':
        runAnalyze(options);
        break;

      case 'help':
      default:
        printHelp();
        break;
    }
  } catch (err) {
    if (err instanceof PuzzleError) {
      reportPuzzleError(err);
      return;
    }
    throw err;
  }
}

try {
  main();
} catch (err) {
  console.error('Error:', err);
  process.exit(1);
}
