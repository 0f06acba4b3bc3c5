/**
 * GrowableSeriesQueue - ring buffer with geometric growth
 *
 * Unbounded strategy: pushes never overflow. When the ring is full its
 * storage doubles (amortized O(1) push) up to `growthLimit` slots. Reaching
 * the limit, or the runtime refusing the allocation, raises
 * QueueExhaustedError with the previous contents intact.
 */

import { QueueExhaustedError } from "../errors.js";

import { ACCEPTED } from "./SeriesQueue.js";

import type { SeriesQueue } from "./SeriesQueue.js";
import type { PushResult } from "../../types/index.js";

export const DEFAULT_INITIAL_CAPACITY = 16;

export interface GrowableQueueOptions {
  initialCapacity?: number;
  growthLimit?: number;
}

export class GrowableSeriesQueue<T = number> implements SeriesQueue<T> {
  readonly strategy = "unbounded" as const;
  readonly growthLimit: number;
  private readonly initialCapacity: number;
  private slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(options: GrowableQueueOptions = {}) {
    this.growthLimit = options.growthLimit ?? Number.MAX_SAFE_INTEGER;
    this.initialCapacity = Math.min(options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY, this.growthLimit);
    if (!Number.isInteger(this.initialCapacity) || this.initialCapacity < 1) {
      throw new RangeError(`Initial capacity must be a positive integer, got ${this.initialCapacity}`);
    }
    this.slots = new Array<T | undefined>(this.initialCapacity);
  }

  /** Slots currently allocated. */
  get capacity(): number {
    return this.slots.length;
  }

  push(value: T): PushResult<T> {
    if (this.count === this.slots.length) {
      this.grow();
    }
    this.slots[(this.head + this.count) % this.slots.length] = value;
    this.count++;
    return ACCEPTED;
  }

  pop(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const value = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.slots.length;
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

  /**
   * Storage that grew past its initial size is released and reallocated;
   * otherwise the ring is reused.
   */
  clear(): void {
    if (this.slots.length > this.initialCapacity) {
      this.slots = new Array<T | undefined>(this.initialCapacity);
    }
    this.head = 0;
    this.count = 0;
  }

  toArray(): T[] {
    const values: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const value = this.slots[(this.head + i) % this.slots.length];
      if (value !== undefined) {
        values.push(value);
      }
    }
    return values;
  }

  private grow(): void {
    const current = this.slots.length;
    if (current >= this.growthLimit) {
      throw new QueueExhaustedError(current * 2);
    }
    const next = Math.min(current * 2, this.growthLimit);

    let resized: Array<T | undefined>;
    try {
      resized = new Array<T | undefined>(next);
    } catch (error: unknown) {
      throw new QueueExhaustedError(next, error);
    }

    for (let i = 0; i < this.count; i++) {
      resized[i] = this.slots[(this.head + i) % current];
    }
    this.slots = resized;
    this.head = 0;
  }
}
