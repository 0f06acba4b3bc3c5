/**
 * SeriesQueue - FIFO contract shared by both queueing strategies
 *
 * One queue is created per series and owned by the block state. Values come
 * out in exactly the order they went in.
 */

import type { PushResult, QueueStrategy } from "../../types/index.js";

export interface SeriesQueue<T = number> {
  readonly strategy: QueueStrategy;

  /**
   * Append at the back. A bounded queue at capacity rejects the value and
   * leaves its contents untouched.
   */
  push(value: T): PushResult<T>;

  /** Remove and return the oldest value, or undefined when empty. */
  pop(): T | undefined;

  /** Oldest value without removing it. */
  peek(): T | undefined;

  size(): number;

  isEmpty(): boolean;

  /** Drop every value in O(1). */
  clear(): void;

  /** Live values, oldest first. */
  toArray(): T[];
}

export const ACCEPTED = { accepted: true } as const;
