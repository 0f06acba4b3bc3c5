/**
 * PairedStreamEngine - wires block state, dispatcher and output together
 *
 * Driven synchronously: each handle() call runs to completion before the
 * next notification is accepted. The engine has no thread of control of its
 * own and no suspension points.
 */

import {
  FIRST_SERIES_CAPACITY,
  GROWTH_LIMIT,
  LEFTOVER_POLICY,
  MAX_TEXT_LENGTH,
  QUEUE_STRATEGY,
  SECOND_SERIES_CAPACITY,
  isLeftoverPolicy,
  isQueueStrategy,
} from "../config.js";
import { scopedLogger } from "../logging/index.js";

import { BlockState } from "./components/BlockState.js";
import { RecordFormatter } from "./components/RecordFormatter.js";
import { StatsTracker } from "./components/StatsTracker.js";
import { EventDispatcher } from "./EventDispatcher.js";
import { validateProfile } from "./profiles.js";

import type {
  Diagnostic,
  DiagnosticListener,
  ElementNotification,
  EngineStats,
  ExtractionProfile,
  LeftoverPolicy,
  LineSink,
  Pair,
  QueueStrategy,
} from "../types/index.js";

const logger = scopedLogger("ENGINE");

export interface EngineSettings {
  queueStrategy: QueueStrategy;
  firstCapacity: number;
  secondCapacity: number;
  growthLimit: number;
  maxTextLength: number;
  leftoverPolicy: LeftoverPolicy;
}

export interface EngineOptions extends Partial<EngineSettings> {
  profile: ExtractionProfile;
  sink: LineSink;
  /** Replaces the default logging of recoverable conditions. */
  onDiagnostic?: DiagnosticListener;
}

/**
 * Settings from config.json with per-call overrides applied.
 */
export function resolveEngineSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    queueStrategy: overrides.queueStrategy ?? (isQueueStrategy(QUEUE_STRATEGY) ? QUEUE_STRATEGY : "bounded"),
    firstCapacity: overrides.firstCapacity ?? FIRST_SERIES_CAPACITY,
    secondCapacity: overrides.secondCapacity ?? SECOND_SERIES_CAPACITY,
    growthLimit: overrides.growthLimit ?? GROWTH_LIMIT,
    maxTextLength: overrides.maxTextLength ?? MAX_TEXT_LENGTH,
    leftoverPolicy: overrides.leftoverPolicy ?? (isLeftoverPolicy(LEFTOVER_POLICY) ? LEFTOVER_POLICY : "discard"),
  };
}

export function describeDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.type) {
    case "overflow":
      return `${diagnostic.element} queue full (max ${diagnostic.capacity}), dropping value ${diagnostic.value}`;
    case "malformed-value":
      return `${diagnostic.element} value "${diagnostic.text}" is not a number, dropping it`;
    case "out-of-range":
      return `${diagnostic.element} value "${diagnostic.text}" is out of range for a ${diagnostic.series} series value, dropping it`;
    case "missing-attribute":
      return `${diagnostic.element} has no "${diagnostic.attribute}" attribute, label cleared`;
    case "leftovers-discarded":
      return `block ${diagnostic.labels.join(" ")} ended with ${diagnostic.first}/${diagnostic.second} unmatched values, discarded`;
  }
}

export function createDiagnosticLogger(policy: LeftoverPolicy): DiagnosticListener {
  return (diagnostic) => {
    const message = describeDiagnostic(diagnostic);
    if (diagnostic.type === "overflow" || diagnostic.type === "out-of-range" || (diagnostic.type === "leftovers-discarded" && policy === "report")) {
      logger.warn(message);
    } else {
      logger.debug(message);
    }
  };
}

export class PairedStreamEngine {
  readonly profile: ExtractionProfile;
  readonly settings: EngineSettings;
  readonly block: BlockState;
  private readonly dispatcher: EventDispatcher;
  private readonly formatter: RecordFormatter;
  private readonly sink: LineSink;
  private readonly stats = new StatsTracker();

  constructor(options: EngineOptions) {
    validateProfile(options.profile);
    this.profile = options.profile;
    this.sink = options.sink;
    this.settings = resolveEngineSettings(options);
    this.formatter = new RecordFormatter(options.profile);

    const emitPair = (pair: Pair): void => this.emit(pair);

    this.block = new BlockState({
      labels: options.profile.labels,
      first: {
        strategy: this.settings.queueStrategy,
        capacity: this.settings.firstCapacity,
        growthLimit: this.settings.growthLimit,
      },
      second: {
        strategy: this.settings.queueStrategy,
        capacity: this.settings.secondCapacity,
        growthLimit: this.settings.growthLimit,
      },
      maxLabelLength: this.settings.maxTextLength,
      onPair: emitPair,
    });

    this.dispatcher = new EventDispatcher(options.profile, {
      sink: options.sink,
      emitPair,
      report: options.onDiagnostic ?? createDiagnosticLogger(this.settings.leftoverPolicy),
      stats: this.stats,
      maxTextLength: this.settings.maxTextLength,
    });

    logger.debug(
      `Profile ${this.profile.name}: ${this.settings.queueStrategy} queues ` +
        `(${this.settings.firstCapacity}/${this.settings.secondCapacity})`,
    );
  }

  handle(notification: ElementNotification): void {
    this.dispatcher.dispatch(notification, this.block);
  }

  wantsText(name: string): boolean {
    return this.dispatcher.wantsText(name);
  }

  /**
   * End of input. Unmatched values still queued are abandoned without a
   * flush; only a block-end drains a block.
   */
  finish(): Readonly<EngineStats> {
    const first = this.block.pending("first");
    const second = this.block.pending("second");
    if (first + second > 0) {
      logger.debug(`Input ended with ${first}/${second} unmatched values in an open block`);
    }
    return this.getStats();
  }

  getStats(): Readonly<EngineStats> {
    return this.stats.getStats();
  }

  resetStats(): void {
    this.stats.reset();
  }

  private emit(pair: Pair): void {
    this.sink.write(this.formatter.formatPair(pair));
    this.stats.recordPair();
  }
}
