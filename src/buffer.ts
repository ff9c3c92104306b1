/**
 * Streaming Buffer
 *
 * Bounded FIFO between the sample producer and the learner. When full,
 * `block` suspends the producer until space frees up; `drop-oldest`
 * evicts the oldest unconsumed item and counts the loss.
 */

import type { BackpressurePolicy } from './types.js';

type Waiter = () => void;

export class StreamBuffer<T> {
  readonly capacity: number;
  readonly policy: BackpressurePolicy;

  private slots: Array<T | undefined>;
  private head = 0;
  private length = 0;
  private isClosed = false;
  private droppedCount = 0;

  private spaceWaiters: Waiter[] = [];
  private itemWaiters: Waiter[] = [];

  constructor(capacity: number, policy: BackpressurePolicy = 'block') {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer (got ${capacity})`);
    }
    this.capacity = capacity;
    this.policy = policy;
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  isFull(): boolean {
    return this.length === this.capacity;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Resolves true once the item is queued, false if the buffer was closed first
   */
  async enqueue(item: T): Promise<boolean> {
    if (this.policy === 'block') {
      while (this.isFull() && !this.isClosed) {
        await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
      }
    }
    if (this.isClosed) return false;

    if (this.isFull()) {
      // drop-oldest
      this.shift();
      this.droppedCount++;
    }

    this.slots[(this.head + this.length) % this.capacity] = item;
    this.length++;
    this.wake(this.itemWaiters);
    return true;
  }

  tryDequeue(): T | undefined {
    if (this.length === 0) return undefined;
    const item = this.shift();
    this.wake(this.spaceWaiters);
    return item;
  }

  /**
   * Remove up to `max` items in FIFO order
   */
  takeBatch(max: number): T[] {
    const batch: T[] = [];
    while (batch.length < max && this.length > 0) {
      const item = this.shift();
      if (item !== undefined) batch.push(item);
    }
    if (batch.length > 0) this.wake(this.spaceWaiters);
    return batch;
  }

  /**
   * Wait until an item is available, the buffer closes, or `timeoutMs` elapses.
   * Resolves true when items are available.
   */
  waitForItems(timeoutMs: number): Promise<boolean> {
    if (this.length > 0) return Promise.resolve(true);
    if (this.isClosed) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = () => {
        clearTimeout(timer);
        resolve(this.length > 0);
      };
      const timer = setTimeout(() => {
        this.itemWaiters = this.itemWaiters.filter((w) => w !== waiter);
        resolve(this.length > 0);
      }, timeoutMs);
      this.itemWaiters.push(waiter);
    });
  }

  /**
   * Stop accepting items; pending producers resolve false, idle consumers wake
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.wake(this.spaceWaiters);
    this.wake(this.itemWaiters);
  }

  /**
   * Remove and return everything still queued
   */
  drain(): T[] {
    return this.takeBatch(this.length);
  }

  private shift(): T | undefined {
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.length--;
    return item;
  }

  private wake(waiters: Waiter[]): void {
    const pending = waiters.splice(0, waiters.length);
    for (const w of pending) w();
  }
}
