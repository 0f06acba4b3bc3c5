/**
 * PairStream Core Types
 */

export type NumericKind = 'float' | 'integer';

export type QueueStrategy = 'bounded' | 'unbounded';

export type LeftoverPolicy = 'discard' | 'report';

export type SeriesId = 'first' | 'second';

// Profile vocabulary
export type LabelSource = { attribute: string } | 'text';

export interface LabelRule {
  name: string;
  element: string;
  source: LabelSource;
  sentinel: string;
}

export interface SeriesRule {
  name: string;
  element: string;
  kind: NumericKind;
}

export interface ExtractionProfile {
  name: string;
  description: string;
  blockElement: string;
  labels: LabelRule[];
  first: SeriesRule;
  second: SeriesRule;
  sideChannel: string[];
  indexed: boolean;
}

// Tokenizer notifications
export interface ElementEntered {
  kind: 'enter';
  name: string;
  attribute(name: string): string | undefined;
}

export interface ElementText {
  kind: 'text';
  name: string;
  text: string;
}

export interface ElementExited {
  kind: 'exit';
  name: string;
}

export type ElementNotification = ElementEntered | ElementText | ElementExited;

export type NotificationHandler = (notification: ElementNotification) => void;

/**
 * One matched value from each series. Never stored: consumed by the
 * emitter as soon as it is built.
 */
export interface Pair {
  index: number;
  labels: readonly string[];
  first: number;
  second: number;
}

export type PairListener = (pair: Pair) => void;

// Queue push outcome
export interface QueueOverflow<T = number> {
  capacity: number;
  value: T;
}

export type PushResult<T = number> =
  | { accepted: true }
  | { accepted: false; overflow: QueueOverflow<T> };

// Diagnostics for recoverable conditions
export type Diagnostic =
  | { type: 'overflow'; series: SeriesId; element: string; capacity: number; value: number }
  | { type: 'malformed-value'; series: SeriesId; element: string; text: string }
  | { type: 'out-of-range'; series: SeriesId; element: string; text: string }
  | { type: 'missing-attribute'; element: string; attribute: string }
  | { type: 'leftovers-discarded'; labels: readonly string[]; first: number; second: number };

export type DiagnosticListener = (diagnostic: Diagnostic) => void;

export interface EngineStats {
  pairsEmitted: number;
  blocksOpened: number;
  blocksClosed: number;
  sideChannelLines: number;
  acceptedFirst: number;
  acceptedSecond: number;
  droppedOverflow: number;
  droppedMalformed: number;
  droppedOutOfRange: number;
  missingAttributes: number;
  leftoversDiscarded: number;
}

export interface LineSink {
  write(line: string): void;
}
