/**
 * Format solutions for human-readable output
 */

import type { Grid, Solution, SearchStats, AbortReason } from '../domain/types.js';
import { BLANK, GRID_SIZE } from '../domain/constants.js';

/**
 * Format each row of a grid as a bracketed list, e.g. "[2, 1, 7]"
 */
export function formatGridRows(grid: Grid): string[] {
  return grid.map(row => `[${row.join(', ')}]`);
}

/**
 * Format a complete solution for console output
 */
export function formatSolution(solution: Solution): string {
  switch (solution.status) {
    case 'NO_SOLUTION':
      return 'No solution found.';

    case 'ABORTED':
      return formatAbort(solution.reason, solution.stats);

    case 'SOLVED': {
      const lines: string[] = ['Solution steps:'];

      solution.path.forEach((grid, index) => {
        lines.push(`Step ${index + 1}:`);
        lines.push(...formatGridRows(grid));
        lines.push('');
      });

      return lines.join('\n');
    }
  }
}

function formatAbort(reason: AbortReason, stats: SearchStats): string {
  const limit = reason === 'MAX_ITERATIONS'
    ? `iteration limit reached after ${stats.nodesExplored} nodes`
    : `time limit reached after ${stats.timeTaken}ms`;

  return `Search aborted: ${limit}.`;
}

/**
 * Format search statistics
 */
export function formatStats(stats: SearchStats): string {
  const lines: string[] = [];

  lines.push('=== SEARCH STATISTICS ===');
  lines.push(`Nodes Explored: ${stats.nodesExplored}`);
  lines.push(`Nodes Expanded: ${stats.nodesExpanded}`);
  lines.push(`Nodes Generated: ${stats.nodesGenerated}`);
  lines.push(`Max Frontier Size: ${stats.maxFrontierSize}`);
  lines.push(`Time Taken: ${stats.timeTaken}ms`);

  return lines.join('\n');
}

/**
 * Format a grid as an ASCII box, blank drawn as an empty cell
 */
export function formatGrid(grid: Grid): string {
  const border = '+' + '---+'.repeat(GRID_SIZE);
  const lines: string[] = [border];

  for (const row of grid) {
    const cells = row.map(tile => (tile === BLANK ? ' ' : String(tile)));
    lines.push(`| ${cells.join(' | ')} |`);
    lines.push(border);
  }

  return lines.join('\n');
}

/**
 * Format a compact solution summary
 */
export function formatCompactSummary(solution: Solution): string {
  const explored = `${solution.stats.nodesExplored} nodes explored`;

  switch (solution.status) {
    case 'SOLVED':
      return `✓ SOLVED | ${solution.moveCount} moves | ${explored}`;
    case 'NO_SOLUTION':
      return `✗ NO SOLUTION | ${explored}`;
    case 'ABORTED':
      return `⚠ ABORTED (${solution.reason}) | ${explored}`;
  }
}

/**
 * Format solution as JSON
 */
export function formatSolutionJSON(solution: Solution): string {
  const base = {
    found: solution.found,
    status: solution.status,
  };

  switch (solution.status) {
    case 'SOLVED':
      return JSON.stringify({
        ...base,
        moveCount: solution.moveCount,
        moves: solution.moves,
        path: solution.path,
        stats: solution.stats,
      }, null, 2);
    case 'ABORTED':
      return JSON.stringify({ ...base, reason: solution.reason, stats: solution.stats }, null, 2);
    case 'NO_SOLUTION':
      return JSON.stringify({ ...base, stats: solution.stats }, null, 2);
  }
}
