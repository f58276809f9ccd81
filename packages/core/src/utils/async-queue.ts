// AsyncQueue - in-memory FIFO that consumers await on
// Backs each worker's work queue. Single event loop, so length reads and
// push/shift are never interleaved.

import { QueueFullError } from '../errors.js';

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  /** @param capacity maximum queued items, 0 for unbounded */
  constructor(private readonly capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Queue capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Append an item, handing it straight to a waiting consumer if there is one.
   * Throws QueueFullError when a bounded queue is full; nothing is added in that case.
   */
  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push onto a closed queue');
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }

    if (this.capacity > 0 && this.items.length >= this.capacity) {
      throw new QueueFullError(this.capacity);
    }
    this.items.push(item);
  }

  /** Resolves with the next item, or undefined once the queue is closed and empty. */
  shift(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  /** Remove a specific queued item. Returns false if it was already taken. */
  remove(item: T): boolean {
    const index = this.items.indexOf(item);
    if (index === -1) {
      return false;
    }
    this.items.splice(index, 1);
    return true;
  }

  toArray(): readonly T[] {
    return [...this.items];
  }

  /** Stop accepting items. Waiting consumers resolve with undefined; queued items can still be shifted. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(undefined);
    }
  }
}
