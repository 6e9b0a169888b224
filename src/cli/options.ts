/**
 * Command line argument parsing for the puzzle solver CLI
 */

import * as fs from 'fs';

import type { SolverOptions } from '../domain/types.js';
import { DEFAULT_GOAL, EXAMPLE_INITIAL } from '../domain/constants.js';
import { PuzzleError } from '../domain/errors.js';
import { type PuzzleInput, parseGridText, parsePuzzleFromJSON } from '../io/grid-parser.js';

export type CLICommand = 'solve' | 'analyze' | 'help';
export type OutputFormat = 'text' | 'json';

export interface CLIOptions {
  command: CLICommand;
  grid?: string;
  goal?: string;
  inputFile?: string;
  outputFormat: OutputFormat;
  maxIterations?: number;
  maxTime?: number; // milliseconds
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new PuzzleError(`Option ${flag} needs a value`);
  }
  return value;
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new PuzzleError(`Option ${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    outputFormat: 'text',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case 'solve':
      case 'analyze':
      case 'help':
        options.command = arg;
        break;

      case '-g':
      case '--grid':
        options.grid = takeValue(args, ++i, arg);
        break;

      case '--goal':
        options.goal = takeValue(args, ++i, arg);
        break;

      case '-i':
      case '--input':
        options.inputFile = takeValue(args, ++i, arg);
        break;

      case '-f':
      case '--format': {
        const format = takeValue(args, ++i, arg);
        if (format !== 'text' && format !== 'json') {
          throw new PuzzleError(`Unknown output format "${format}" (expected text or json)`);
        }
        options.outputFormat = format;
        break;
      }

      case '-n':
      case '--max-iterations':
        options.maxIterations = parsePositiveInt(takeValue(args, ++i, arg), arg);
        break;

      case '-t':
      case '--time':
        options.maxTime = parsePositiveInt(takeValue(args, ++i, arg), arg) * 1000;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;

      default:
        throw new PuzzleError(`Unknown argument "${arg}"`);
    }
  }

  return options;
}

/**
 * Solver limits requested on the command line
 */
export function toSolverOptions(options: CLIOptions): Partial<SolverOptions> {
  const solverOptions: Partial<SolverOptions> = {};

  if (options.maxIterations !== undefined) {
    solverOptions.maxIterations = options.maxIterations;
  }
  if (options.maxTime !== undefined) {
    solverOptions.maxTime = options.maxTime;
  }

  return solverOptions;
}

/**
 * Resolve the puzzle to work on: input file or --grid, else the example instance.
 * --goal overrides any goal read from the input file.
 */
export function resolvePuzzle(
  options: CLIOptions,
  readFile: (path: string) => string = path => fs.readFileSync(path, 'utf-8')
): PuzzleInput {
  if (options.inputFile && options.grid) {
    throw new PuzzleError('Options --input and --grid cannot be used together');
  }

  let puzzle: PuzzleInput;

  if (options.inputFile) {
    puzzle = parsePuzzleFromJSON(readFile(options.inputFile));
  } else if (options.grid) {
    puzzle = { initial: parseGridText(options.grid, 'Initial grid'), goal: DEFAULT_GOAL };
  } else {
    puzzle = { initial: EXAMPLE_INITIAL, goal: DEFAULT_GOAL };
  }

  if (options.goal) {
    puzzle = { ...puzzle, goal: parseGridText(options.goal, 'Goal grid') };
  }

  return puzzle;
}
