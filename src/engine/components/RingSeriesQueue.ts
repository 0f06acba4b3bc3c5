/**
 * RingSeriesQueue - fixed-capacity ring buffer
 *
 * Bounded strategy: at most `capacity` unmatched values are held. A push
 * beyond that is rejected with an overflow result and the caller drops the
 * value. Backing storage is allocated once and reused across clears.
 */

import { ACCEPTED } from "./SeriesQueue.js";

import type { SeriesQueue } from "./SeriesQueue.js";
import type { PushResult } from "../../types/index.js";

export class RingSeriesQueue<T = number> implements SeriesQueue<T> {
  readonly strategy = "bounded" as const;
  readonly capacity: number;
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity);
  }

  push(value: T): PushResult<T> {
    if (this.count >= this.capacity) {
      return { accepted: false, overflow: { capacity: this.capacity, value } };
    }
    this.slots[(this.head + this.count) % this.capacity] = value;
    this.count++;
    return ACCEPTED;
  }

  pop(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const value = this.slots[this.head];
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    if (this.count === 0) {
      this.head = 0;
    }
    return value;
  }

  peek(): T | undefined {
    return this.count === 0 ? undefined : this.slots[this.head];
  }

  size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  isFull(): boolean {
    return this.count >= this.capacity;
  }

  clear(): void {
    this.head = 0;
    this.count = 0;
  }

  toArray(): T[] {
    const values: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const value = this.slots[(this.head + i) % this.capacity];
      if (value !== undefined) {
        values.push(value);
      }
    }
    return values;
  }
}
