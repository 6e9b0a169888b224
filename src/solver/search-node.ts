/**
 * Search tree node for A* algorithm
 */

import type { Grid, Move } from '../domain/types.js';

export interface SearchNode {
  readonly grid: Grid;
  readonly parent: SearchNode | null;
  readonly move: Move | null;
  readonly cost: number;      // g(n) - moves from start
  readonly heuristic: number; // h(n) - estimated moves to goal
  readonly priority: number;  // f(n) = g(n) + h(n)
}

/**
 * Create a search node
 */
export function createSearchNode(
  grid: Grid,
  parent: SearchNode | null,
  move: Move | null,
  cost: number,
  heuristic: number
): SearchNode {
  return {
    grid,
    parent,
    move,
    cost,
    heuristic,
    priority: cost + heuristic,
  };
}

/**
 * Extract the grids from root to this node
 */
export function extractGridPath(node: SearchNode): Grid[] {
  const path: Grid[] = [];
  let current: SearchNode | null = node;

  while (current !== null) {
    path.push(current.grid);
    current = current.parent;
  }

  return path.reverse();
}

/**
 * Extract the moves from root to this node
 */
export function extractMovePath(node: SearchNode): Move[] {
  const moves: Move[] = [];
  let current: SearchNode | null = node;

  while (current !== null) {
    if (current.move !== null) {
      moves.unshift(current.move);
    }
    current = current.parent;
  }

  return moves;
}

interface QueueEntry<T> {
  item: T;
  sequence: number;
}

/**
 * Priority queue for A* search.
 * Lowest priority first; equal priorities come out in insertion order.
 */
export class PriorityQueue<T extends { priority: number }> {
  private items: QueueEntry<T>[] = [];
  private nextSequence = 0;

  push(item: T): void {
    // Binary heap insert
    this.items.push({ item, sequence: this.nextSequence++ });
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result.item;
  }

  peek(): T | undefined {
    return this.items[0]?.item;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  private precedes(a: QueueEntry<T>, b: QueueEntry<T>): boolean {
    if (a.item.priority !== b.item.priority) {
      return a.item.priority < b.item.priority;
    }
    return a.sequence < b.sequence;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.precedes(this.items[index], this.items[parentIndex])) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length &&
          this.precedes(this.items[leftChild], this.items[smallest])) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length &&
          this.precedes(this.items[rightChild], this.items[smallest])) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}
