/**
 * Ordered deque of recorded transactions. Playback drains it from the head (with
 * pushFront to undo a pop that did not match); record appends at the tail.
 * Single owner: one agent per store.
 */

import type { Transaction } from '../../types/schema';

export class TransactionStore {
  private queue: Transaction[] = [];

  constructor(transactions: readonly Transaction[] = []) {
    this.loadFrom(transactions);
  }

  /** Replaces the contents with the given transactions, in order. */
  loadFrom(transactions: readonly Transaction[]): void {
    this.queue = [...transactions];
  }

  /** Removes and returns the head, or undefined when the store is exhausted. */
  popFront(): Transaction | undefined {
    return this.queue.shift();
  }

  pushFront(transaction: Transaction): void {
    this.queue.unshift(transaction);
  }

  pushBack(transaction: Transaction): void {
    this.queue.push(transaction);
  }

  /** Copy of the current contents in order; later store changes do not affect it. */
  snapshot(): readonly Transaction[] {
    return [...this.queue];
  }

  get size(): number {
    return this.queue.length;
  }
}
