/**
 * Tests for grid hashing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { hashGrid } from '../../src/state/grid-hash.js';
import { cloneGrid } from '../../src/state/grid.js';
import { EXAMPLE_INITIAL } from '../../src/domain/constants.js';

describe('Grid Hashing', () => {
  it('should list tiles row by row', () => {
    assert.equal(hashGrid(EXAMPLE_INITIAL), '217806345');
  });

  it('should hash equal grids equally regardless of identity', () => {
    assert.equal(hashGrid(cloneGrid(EXAMPLE_INITIAL)), hashGrid(EXAMPLE_INITIAL));
  });

  it('should distinguish grids that differ by one move', () => {
    assert.notEqual(hashGrid([[2, 1, 7], [8, 6, 0], [3, 4, 5]]), hashGrid(EXAMPLE_INITIAL));
  });
});
