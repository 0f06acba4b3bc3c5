/**
 * EventDispatcher - routes tokenizer notifications to block mutations
 *
 * The routing table is built once from a profile: element name → handler,
 * one table per notification kind. Each notification triggers at most one
 * action; names not in the table are ignored. The dispatcher holds no block
 * state of its own: the BlockState is passed into every call.
 *
 * Per-value problems (unreadable numerals, overflow, missing attributes) are
 * reported as diagnostics and never thrown.
 */

import { readNumericValue, truncateText } from "../parsers/xml/utils/xmlValueParsing.js";

import { flushPairs } from "./pairing.js";

import type { BlockState } from "./components/BlockState.js";
import type { StatsTracker } from "./components/StatsTracker.js";
import type {
  DiagnosticListener,
  ElementEntered,
  ElementExited,
  ElementNotification,
  ElementText,
  ExtractionProfile,
  LineSink,
  PairListener,
  SeriesId,
  SeriesRule,
} from "../types/index.js";

type EnterHandler = (notification: ElementEntered, block: BlockState) => void;
type TextHandler = (notification: ElementText, block: BlockState) => void;
type ExitHandler = (notification: ElementExited, block: BlockState) => void;

export interface DispatcherDependencies {
  /** Receives side-channel lines. */
  sink: LineSink;
  /** Receives pairs drained at block boundaries. */
  emitPair: PairListener;
  report: DiagnosticListener;
  stats: StatsTracker;
  maxTextLength: number;
}

export class EventDispatcher {
  private readonly onEnter = new Map<string, EnterHandler>();
  private readonly onText = new Map<string, TextHandler>();
  private readonly onExit = new Map<string, ExitHandler>();
  private readonly deps: DispatcherDependencies;

  constructor(profile: ExtractionProfile, deps: DispatcherDependencies) {
    this.deps = deps;

    this.onEnter.set(profile.blockElement, (_notification, block) => this.startBlock(block));
    this.onExit.set(profile.blockElement, (_notification, block) => this.endBlock(block));

    profile.labels.forEach((rule, slot) => {
      const source = rule.source;
      if (source === "text") {
        this.onText.set(rule.element, (notification, block) => {
          block.setLabel(truncateText(notification.text, this.deps.maxTextLength), slot);
        });
      } else {
        this.onEnter.set(rule.element, (notification, block) => {
          this.readLabelAttribute(notification, block, source.attribute, slot);
        });
      }
    });

    this.onText.set(profile.first.element, (notification, block) =>
      this.pushValue(notification, block, "first", profile.first),
    );
    this.onText.set(profile.second.element, (notification, block) =>
      this.pushValue(notification, block, "second", profile.second),
    );

    for (const element of profile.sideChannel) {
      this.onText.set(element, (notification) => this.passThrough(notification));
    }
  }

  /**
   * Whether the text of this element is needed. Tokenizer adapters use
   * this to avoid accumulating text nobody reads.
   */
  wantsText(name: string): boolean {
    return this.onText.has(name);
  }

  dispatch(notification: ElementNotification, block: BlockState): void {
    switch (notification.kind) {
      case "enter":
        this.onEnter.get(notification.name)?.(notification, block);
        break;
      case "text":
        this.onText.get(notification.name)?.(notification, block);
        break;
      case "exit":
        this.onExit.get(notification.name)?.(notification, block);
        break;
    }
  }

  /**
   * A new block-start supersedes whatever block was open: its last pairs
   * are drained and its leftovers discarded.
   */
  private startBlock(block: BlockState): void {
    this.closeBoundary(block);
    block.markOpen();
    this.deps.stats.recordBlockOpened();
  }

  private endBlock(block: BlockState): void {
    this.closeBoundary(block);
    if (block.isOpen()) {
      this.deps.stats.recordBlockClosed();
    }
    block.markClosed();
  }

  private closeBoundary(block: BlockState): void {
    flushPairs(block, this.deps.emitPair);
    const discarded = block.reset();
    const total = discarded.first + discarded.second;
    if (total > 0) {
      this.deps.stats.recordLeftovers(total);
      this.deps.report({
        type: "leftovers-discarded",
        labels: discarded.labels,
        first: discarded.first,
        second: discarded.second,
      });
    }
  }

  private readLabelAttribute(
    notification: ElementEntered,
    block: BlockState,
    attribute: string,
    slot: number,
  ): void {
    const value = notification.attribute(attribute);
    if (value === undefined) {
      block.clearLabel(slot);
      this.deps.stats.recordMissingAttribute();
      this.deps.report({ type: "missing-attribute", element: notification.name, attribute });
      return;
    }
    block.setLabel(truncateText(value, this.deps.maxTextLength), slot);
  }

  private pushValue(notification: ElementText, block: BlockState, series: SeriesId, rule: SeriesRule): void {
    const reading = readNumericValue(notification.text, rule.kind);
    if (!("value" in reading)) {
      const text = truncateText(notification.text, this.deps.maxTextLength);
      if (reading.problem === "out-of-range") {
        this.deps.stats.recordOutOfRange();
        this.deps.report({ type: "out-of-range", series, element: notification.name, text });
      } else {
        this.deps.stats.recordMalformed();
        this.deps.report({ type: "malformed-value", series, element: notification.name, text });
      }
      return;
    }

    const value = reading.value;

    const result = series === "first" ? block.pushFirst(value) : block.pushSecond(value);
    if (!result.accepted) {
      this.deps.stats.recordOverflow();
      this.deps.report({
        type: "overflow",
        series,
        element: notification.name,
        capacity: result.overflow.capacity,
        value,
      });
      return;
    }
    this.deps.stats.recordAccepted(series);
  }

  private passThrough(notification: ElementText): void {
    this.deps.sink.write(truncateText(notification.text, this.deps.maxTextLength));
    this.deps.stats.recordSideChannel();
  }
}
