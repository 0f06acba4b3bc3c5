import { expect } from "chai";
import { beforeEach, describe, it } from "mocha";

import { SITES_PROFILE, TRAFFIC_PROFILE } from "../../../constants/profiles.js";
import { BlockState } from "../../../engine/components/BlockState.js";
import { CollectingLineSink } from "../../../engine/components/LineSink.js";
import { StatsTracker } from "../../../engine/components/StatsTracker.js";
import { EventDispatcher } from "../../../engine/EventDispatcher.js";

import type { Diagnostic, ElementNotification, ExtractionProfile, Pair } from "../../../types/index.js";

const enter = (name: string, attributes: Record<string, string> = {}): ElementNotification => ({
  kind: "enter",
  name,
  attribute: (attributeName) => attributes[attributeName],
});
const text = (name: string, value: string): ElementNotification => ({ kind: "text", name, text: value });
const exit = (name: string): ElementNotification => ({ kind: "exit", name });

/** Notifications a tokenizer sends for one leaf element with text. */
const leaf = (name: string, value: string): ElementNotification[] => [enter(name), text(name, value), exit(name)];

interface Harness {
  dispatcher: EventDispatcher;
  block: BlockState;
  pairs: Pair[];
  diagnostics: Diagnostic[];
  sink: CollectingLineSink;
  stats: StatsTracker;
  send: (...notifications: Array<ElementNotification | ElementNotification[]>) => void;
}

function createHarness(profile: ExtractionProfile, capacity = 8): Harness {
  const pairs: Pair[] = [];
  const diagnostics: Diagnostic[] = [];
  const sink = new CollectingLineSink();
  const stats = new StatsTracker();
  const emitPair = (pair: Pair): void => {
    pairs.push(pair);
  };
  const block = new BlockState({
    labels: profile.labels,
    first: { strategy: "bounded", capacity },
    second: { strategy: "bounded", capacity },
    maxLabelLength: 16,
    onPair: emitPair,
  });
  const dispatcher = new EventDispatcher(profile, {
    sink,
    emitPair,
    report: (diagnostic) => diagnostics.push(diagnostic),
    stats,
    maxTextLength: 16,
  });
  const send = (...notifications: Array<ElementNotification | ElementNotification[]>): void => {
    for (const notification of notifications.flat()) {
      dispatcher.dispatch(notification, block);
    }
  };
  return { dispatcher, block, pairs, diagnostics, sink, stats, send };
}

const summarize = (pairs: Pair[]): Array<[number, string, number, number]> =>
  pairs.map((pair) => [pair.index, pair.labels.join(" "), pair.first, pair.second]);

describe("EventDispatcher", () => {
  describe("traffic profile", () => {
    let harness: Harness;

    beforeEach(() => {
      harness = createHarness(TRAFFIC_PROFILE);
    });

    it("pairs speeds and flows within a block", () => {
      harness.send(
        enter("siteMeasurements"),
        enter("measurementSiteReference", { id: "S1" }),
        exit("measurementSiteReference"),
        leaf("speed", "10.5"),
        leaf("speed", "11.0"),
        leaf("vehicleFlowRate", "200"),
        leaf("vehicleFlowRate", "210"),
        exit("siteMeasurements"),
      );

      expect(summarize(harness.pairs)).to.deep.equal([
        [1, "S1", 10.5, 200],
        [2, "S1", 11, 210],
      ]);
      expect(harness.diagnostics).to.deep.equal([]);
    });

    it("discards values left unmatched at block end", () => {
      harness.send(
        enter("siteMeasurements"),
        enter("measurementSiteReference", { id: "S1" }),
        leaf("speed", "10.5"),
        leaf("vehicleFlowRate", "200"),
        leaf("speed", "5.0"),
        exit("siteMeasurements"),
      );

      expect(summarize(harness.pairs)).to.deep.equal([[1, "S1", 10.5, 200]]);
      expect(harness.diagnostics).to.deep.equal([
        { type: "leftovers-discarded", labels: ["S1"], first: 1, second: 0 },
      ]);
      expect(harness.block.pending("first")).to.equal(0);
      expect(harness.stats.getStats().leftoversDiscarded).to.equal(1);
    });

    it("never pairs values across blocks", () => {
      harness.send(
        enter("siteMeasurements"),
        enter("measurementSiteReference", { id: "S1" }),
        leaf("speed", "10.5"),
        exit("siteMeasurements"),
        enter("siteMeasurements"),
        enter("measurementSiteReference", { id: "S2" }),
        leaf("vehicleFlowRate", "300"),
        leaf("speed", "20.0"),
        exit("siteMeasurements"),
      );

      expect(summarize(harness.pairs)).to.deep.equal([[1, "S2", 20, 300]]);
    });

    it("uses the sentinel when a block has no site reference", () => {
      harness.send(
        enter("siteMeasurements"),
        leaf("speed", "50"),
        leaf("vehicleFlowRate", "12"),
        exit("siteMeasurements"),
      );

      expect(summarize(harness.pairs)).to.deep.equal([[1, "(unknown_site)", 50, 12]]);
    });

    it("clears the label when the reference has no id", () => {
      harness.send(
        enter("siteMeasurements"),
        enter("measurementSiteReference", { id: "S1" }),
        enter("measurementSiteReference", { version: "2" }),
        leaf("speed", "50"),
        leaf("vehicleFlowRate", "12"),
      );

      expect(summarize(harness.pairs)).to.deep.equal([[1, "(unknown_site)", 50, 12]]);
      expect(harness.diagnostics).to.deep.equal([
        { type: "missing-attribute", element: "measurementSiteReference", attribute: "id" },
      ]);
    });

    it("drops malformed numerals and keeps pairing the rest", () => {
      harness.send(
        enter("siteMeasurements"),
        leaf("speed", "fast"),
        leaf("speed", "42.5"),
        leaf("vehicleFlowRate", "n/a"),
        leaf("vehicleFlowRate", "7"),
        exit("siteMeasurements"),
      );

      expect(summarize(harness.pairs)).to.deep.equal([[1, "(unknown_site)", 42.5, 7]]);
      expect(harness.diagnostics).to.deep.equal([
        { type: "malformed-value", series: "first", element: "speed", text: "fast" },
        { type: "malformed-value", series: "second", element: "vehicleFlowRate", text: "n/a" },
      ]);
      expect(harness.stats.getStats().droppedMalformed).to.equal(2);
    });

    it("reports numerals too large for the series as out of range", () => {
      harness.send(
        enter("siteMeasurements"),
        leaf("speed", "1e400"),
        leaf("speed", "3.5"),
        leaf("vehicleFlowRate", "90071992547409930"),
        leaf("vehicleFlowRate", "12"),
        exit("siteMeasurements"),
      );

      expect(summarize(harness.pairs)).to.deep.equal([[1, "(unknown_site)", 3.5, 12]]);
      expect(harness.diagnostics).to.deep.equal([
        { type: "out-of-range", series: "first", element: "speed", text: "1e400" },
        { type: "out-of-range", series: "second", element: "vehicleFlowRate", text: "90071992547409930" },
      ]);
      expect(harness.stats.getStats().droppedOutOfRange).to.equal(2);
      expect(harness.stats.getStats().droppedMalformed).to.equal(0);
    });

    it("reports overflow and drops only the rejected value", () => {
      harness = createHarness(TRAFFIC_PROFILE, 2);
      harness.send(
        enter("siteMeasurements"),
        enter("measurementSiteReference", { id: "S9" }),
        leaf("speed", "1"),
        leaf("speed", "2"),
        leaf("speed", "3"),
        leaf("vehicleFlowRate", "10"),
        leaf("vehicleFlowRate", "20"),
        leaf("vehicleFlowRate", "30"),
        exit("siteMeasurements"),
      );

      expect(summarize(harness.pairs)).to.deep.equal([
        [1, "S9", 1, 10],
        [2, "S9", 2, 20],
      ]);
      expect(harness.diagnostics).to.deep.equal([
        { type: "overflow", series: "first", element: "speed", capacity: 2, value: 3 },
        { type: "leftovers-discarded", labels: ["S9"], first: 0, second: 1 },
      ]);
      expect(harness.stats.getStats()).to.include({ droppedOverflow: 1, acceptedFirst: 2, acceptedSecond: 3 });
    });

    it("a new block start flushes and discards the open block", () => {
      harness.send(
        enter("siteMeasurements"),
        enter("measurementSiteReference", { id: "S1" }),
        leaf("speed", "1"),
        enter("siteMeasurements"),
        leaf("vehicleFlowRate", "2"),
      );

      expect(harness.pairs).to.deep.equal([]);
      expect(harness.diagnostics).to.deep.equal([
        { type: "leftovers-discarded", labels: ["S1"], first: 1, second: 0 },
      ]);
      expect(harness.block.pendingValues("second")).to.deep.equal([2]);
      expect(harness.stats.getStats().blocksOpened).to.equal(2);
    });

    it("pairs values that arrive outside any block", () => {
      harness.send(leaf("speed", "3.5"), leaf("vehicleFlowRate", "4"));

      expect(summarize(harness.pairs)).to.deep.equal([[1, "(unknown_site)", 3.5, 4]]);
    });

    it("counts a block close only for an open block", () => {
      harness.send(exit("siteMeasurements"), enter("siteMeasurements"), exit("siteMeasurements"));

      expect(harness.stats.getStats()).to.include({ blocksOpened: 1, blocksClosed: 1 });
    });

    it("writes side-channel text to the sink, truncated", () => {
      harness.send(leaf("publicationTime", "2024-03-01T10:00:00Z"));

      expect(harness.sink.lines).to.deep.equal(["2024-03-01T10:00"]);
      expect(harness.stats.getStats().sideChannelLines).to.equal(1);
    });

    it("ignores elements outside the profile", () => {
      harness.send(
        enter("siteMeasurements"),
        enter("measuredValue", { index: "1" }),
        leaf("accuracy", "95"),
        exit("measuredValue"),
        leaf("speed", "9"),
      );

      expect(harness.pairs).to.deep.equal([]);
      expect(harness.block.pendingValues("first")).to.deep.equal([9]);
      expect(harness.diagnostics).to.deep.equal([]);
    });

    it("asks only for the text it routes", () => {
      const { dispatcher } = harness;
      expect(dispatcher.wantsText("speed")).to.be.true;
      expect(dispatcher.wantsText("vehicleFlowRate")).to.be.true;
      expect(dispatcher.wantsText("publicationTime")).to.be.true;
      expect(dispatcher.wantsText("measurementSiteReference")).to.be.false;
      expect(dispatcher.wantsText("siteMeasurements")).to.be.false;
    });
  });

  describe("sites profile", () => {
    it("labels pairs with the record id and version time", () => {
      const harness = createHarness(SITES_PROFILE);
      harness.send(
        enter("measurementSiteTable"),
        enter("measurementSiteRecord", { id: "R1" }),
        leaf("measurementSiteRecordVersionTime", "2024-01-01"),
        leaf("latitude", "52.37"),
        leaf("longitude", "4.89"),
        exit("measurementSiteRecord"),
        exit("measurementSiteTable"),
      );

      expect(harness.pairs).to.deep.equal([{ index: 1, labels: ["R1", "2024-01-01"], first: 52.37, second: 4.89 }]);
      expect(harness.dispatcher.wantsText("measurementSiteRecordVersionTime")).to.be.true;
    });
  });
});
