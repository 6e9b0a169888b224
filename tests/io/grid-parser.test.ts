/**
 * Tests for puzzle input parsing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseGridText, parsePuzzleFromJSON, readGridValue } from '../../src/io/grid-parser.js';
import { GridParseError, InvalidGridError } from '../../src/domain/errors.js';
import { DEFAULT_GOAL, EXAMPLE_INITIAL } from '../../src/domain/constants.js';

describe('Grid Text Parsing', () => {
  it('should parse nine digits', () => {
    assert.deepEqual(parseGridText('217806345'), EXAMPLE_INITIAL);
  });

  it('should parse space separated values', () => {
    assert.deepEqual(parseGridText('2 1 7 8 0 6 3 4 5'), EXAMPLE_INITIAL);
  });

  it('should parse rows separated by slashes', () => {
    assert.deepEqual(parseGridText('217/806/345'), EXAMPLE_INITIAL);
    assert.deepEqual(parseGridText('2 1 7 / 8 0 6 / 3 4 5'), EXAMPLE_INITIAL);
  });

  it('should parse three lines', () => {
    assert.deepEqual(parseGridText('2 1 7\n8 0 6\n3 4 5\n'), EXAMPLE_INITIAL);
  });

  it('should parse bracketed arrays', () => {
    assert.deepEqual(parseGridText('[[2,1,7],[8,0,6],[3,4,5]]'), EXAMPLE_INITIAL);
  });

  it('should reject too few values', () => {
    assert.throws(
      () => parseGridText('12345678'),
      (err: unknown) => {
        assert.ok(err instanceof GridParseError);
        assert.equal(err.message, 'Grid needs 9 values, found 8');
        assert.equal(err.input, '12345678');
        return true;
      }
    );
  });

  it('should not split multi-digit values into digits', () => {
    assert.throws(
      () => parseGridText('10 2 3 4 5 6 7 8'),
      (err: unknown) => {
        assert.ok(err instanceof GridParseError);
        assert.equal(err.message, 'Grid needs 9 values, found 8');
        return true;
      }
    );
    assert.throws(
      () => parseGridText('2170 806 345'),
      { name: 'GridParseError', message: 'Grid needs 9 values, found 3' }
    );
  });

  it('should reject non-numeric values', () => {
    assert.throws(
      () => parseGridText('2 1 7 8 x 6 3 4 5', 'Initial grid'),
      { name: 'GridParseError', message: 'Unrecognized value "x" in initial grid' }
    );
  });

  it('should reject a grid that is not a permutation', () => {
    assert.throws(
      () => parseGridText('1 2 3 4 5 6 7 8 8'),
      (err: unknown) => {
        assert.ok(err instanceof InvalidGridError);
        assert.deepEqual(err.errors, ['Value 8 appears 2 times', 'Value 0 is missing']);
        return true;
      }
    );
  });

  it('should keep multi-digit values whole when nine are given', () => {
    assert.throws(
      () => parseGridText('10 2 3 4 5 6 7 8 0'),
      (err: unknown) => {
        assert.ok(err instanceof InvalidGridError);
        assert.deepEqual(err.errors, [
          'Value 10 at row 1, column 1 is outside 0-8',
          'Value 1 is missing',
        ]);
        return true;
      }
    );
  });
});

describe('Grid Value Reading', () => {
  it('should accept text or nested arrays', () => {
    assert.deepEqual(readGridValue('217806345', 'Grid'), EXAMPLE_INITIAL);
    assert.deepEqual(readGridValue([[2, 1, 7], [8, 0, 6], [3, 4, 5]], 'Grid'), EXAMPLE_INITIAL);
  });
});

describe('Puzzle JSON Parsing', () => {
  it('should read initial and goal grids', () => {
    const puzzle = parsePuzzleFromJSON(JSON.stringify({
      initial: [[2, 1, 7], [8, 0, 6], [3, 4, 5]],
      goal: '123456780',
    }));

    assert.deepEqual(puzzle.initial, EXAMPLE_INITIAL);
    assert.deepEqual(puzzle.goal, [[1, 2, 3], [4, 5, 6], [7, 8, 0]]);
  });

  it('should fall back to the default goal', () => {
    const puzzle = parsePuzzleFromJSON('{"initial": "217806345"}');

    assert.deepEqual(puzzle.goal, DEFAULT_GOAL);
  });

  it('should accept a bare grid', () => {
    const puzzle = parsePuzzleFromJSON('[[2, 1, 7], [8, 0, 6], [3, 4, 5]]');

    assert.deepEqual(puzzle.initial, EXAMPLE_INITIAL);
    assert.deepEqual(puzzle.goal, DEFAULT_GOAL);
  });

  it('should reject invalid JSON', () => {
    assert.throws(
      () => parsePuzzleFromJSON('{initial:'),
      (err: unknown) => {
        assert.ok(err instanceof GridParseError);
        assert.ok(err.message.startsWith('Puzzle input is not valid JSON: '));
        return true;
      }
    );
  });

  it('should reject an object without an initial grid', () => {
    assert.throws(
      () => parsePuzzleFromJSON('{"goal": "123456780"}'),
      { name: 'GridParseError', message: 'Puzzle input must contain an "initial" grid' }
    );
  });

  it('should label errors in the goal grid', () => {
    assert.throws(
      () => parsePuzzleFromJSON('{"initial": "217806345", "goal": [[1, 2, 3]]}'),
      (err: unknown) => {
        assert.ok(err instanceof InvalidGridError);
        assert.ok(err.message.startsWith('Goal grid is not a valid 3x3 puzzle'));
        return true;
      }
    );
  });
});
