/**
 * BlockState - the single live block
 *
 * Holds the label slots and the two series queues for the block currently
 * being read. It is created once per run and reset (never recreated) at
 * every block boundary. The queues are private: values only leave them as
 * matched pairs through takePair().
 */

import { truncateText } from "../../parsers/xml/utils/xmlValueParsing.js";
import { flushPairs } from "../pairing.js";

import { createSeriesQueue } from "./queueFactory.js";

import type { QueueSettings } from "./queueFactory.js";
import type { SeriesQueue } from "./SeriesQueue.js";
import type { LabelRule, PairListener, PushResult, SeriesId } from "../../types/index.js";

export interface BlockStateOptions {
  labels: readonly Pick<LabelRule, "name" | "sentinel">[];
  first: QueueSettings;
  second: QueueSettings;
  /** Labels longer than this are truncated. */
  maxLabelLength?: number;
  onPair: PairListener;
}

/**
 * What a reset threw away.
 */
export interface ResetSummary {
  labels: string[];
  first: number;
  second: number;
}

export class BlockState {
  private readonly slots: readonly Pick<LabelRule, "name" | "sentinel">[];
  private readonly values: Array<string | undefined>;
  private readonly firstQueue: SeriesQueue;
  private readonly secondQueue: SeriesQueue;
  private readonly maxLabelLength: number;
  private readonly onPair: PairListener;
  private pairIndex = 1;
  private open = false;

  constructor(options: BlockStateOptions) {
    this.slots = options.labels;
    this.values = options.labels.map(() => undefined);
    this.firstQueue = createSeriesQueue(options.first);
    this.secondQueue = createSeriesQueue(options.second);
    this.maxLabelLength = options.maxLabelLength ?? Number.MAX_SAFE_INTEGER;
    this.onPair = options.onPair;
  }

  /**
   * Replace a label. Every pair emitted from now until the next reset
   * carries it.
   */
  setLabel(text: string, slot = 0): void {
    this.checkSlot(slot);
    this.values[slot] = truncateText(text, this.maxLabelLength);
  }

  clearLabel(slot = 0): void {
    this.checkSlot(slot);
    this.values[slot] = undefined;
  }

  hasLabel(slot = 0): boolean {
    const value = this.values[slot];
    return value !== undefined && value !== "";
  }

  /** Current label, or the slot's sentinel when unset or empty. */
  label(slot = 0): string {
    this.checkSlot(slot);
    const value = this.values[slot];
    if (value !== undefined && value !== "") {
      return value;
    }
    return this.slots[slot]?.sentinel ?? "";
  }

  labels(): string[] {
    return this.slots.map((_, slot) => this.label(slot));
  }

  pushFirst(value: number): PushResult {
    return this.push("first", value);
  }

  pushSecond(value: number): PushResult {
    return this.push("second", value);
  }

  /**
   * Pop the oldest value of each series, but only when both have one.
   */
  takePair(): [number, number] | undefined {
    if (this.firstQueue.isEmpty() || this.secondQueue.isEmpty()) {
      return undefined;
    }
    const first = this.firstQueue.pop();
    const second = this.secondQueue.pop();
    if (first === undefined || second === undefined) {
      return undefined;
    }
    return [first, second];
  }

  /** 1-based position of the next pair within this block. */
  nextIndex(): number {
    return this.pairIndex++;
  }

  pending(series: SeriesId): number {
    return series === "first" ? this.firstQueue.size() : this.secondQueue.size();
  }

  pendingValues(series: SeriesId): number[] {
    return series === "first" ? this.firstQueue.toArray() : this.secondQueue.toArray();
  }

  isOpen(): boolean {
    return this.open;
  }

  markOpen(): void {
    this.open = true;
  }

  markClosed(): void {
    this.open = false;
  }

  /**
   * Clear both queues, every label and the pair index. Safe to call from any
   * state, any number of times.
   */
  reset(): ResetSummary {
    const summary: ResetSummary = {
      labels: this.labels(),
      first: this.firstQueue.size(),
      second: this.secondQueue.size(),
    };
    this.firstQueue.clear();
    this.secondQueue.clear();
    this.values.fill(undefined);
    this.pairIndex = 1;
    return summary;
  }

  private push(series: SeriesId, value: number): PushResult {
    const queue = series === "first" ? this.firstQueue : this.secondQueue;
    const result = queue.push(value);
    if (result.accepted) {
      flushPairs(this, this.onPair);
    }
    return result;
  }

  private checkSlot(slot: number): void {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.slots.length) {
      throw new RangeError(`Label slot ${slot} is out of range (0..${this.slots.length - 1})`);
    }
  }
}
