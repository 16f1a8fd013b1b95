/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * FIFO hand-off between producers and a consumer. `push` waits while the
 * queue is full; `take` waits while it is empty and resolves `undefined`
 * once the queue is closed and drained.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<(item: T | undefined) => void> = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity = 64) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  async push(item: T): Promise<void> {
    while (!this.closed && this.takers.length === 0 && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    if (this.closed) {
      throw new Error('Queue is closed');
    }
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return;
    }
    this.items.push(item);
  }

  async take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      this.spaceWaiters.shift()?.();
      return item;
    }
    if (this.closed) {
      return undefined;
    }
    return new Promise<T | undefined>((resolve) => this.takers.push(resolve));
  }

  /** Rejects further pushes; queued items are still handed out. */
  close(): void {
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      taker(undefined);
    }
    for (const waiter of this.spaceWaiters.splice(0)) {
      waiter();
    }
  }
}
