/**
 * StatsTracker - run counters for one engine
 *
 * Every recoverable condition the dispatcher handles locally is counted
 * here so a caller can see what was dropped without parsing logs.
 */

import type { EngineStats, SeriesId } from "../../types/index.js";

function emptyStats(): EngineStats {
  return {
    pairsEmitted: 0,
    blocksOpened: 0,
    blocksClosed: 0,
    sideChannelLines: 0,
    acceptedFirst: 0,
    acceptedSecond: 0,
    droppedOverflow: 0,
    droppedMalformed: 0,
    droppedOutOfRange: 0,
    missingAttributes: 0,
    leftoversDiscarded: 0,
  };
}

export class StatsTracker {
  private stats: EngineStats = emptyStats();

  recordPair(): void {
    this.stats.pairsEmitted++;
  }

  recordBlockOpened(): void {
    this.stats.blocksOpened++;
  }

  recordBlockClosed(): void {
    this.stats.blocksClosed++;
  }

  recordSideChannel(): void {
    this.stats.sideChannelLines++;
  }

  recordAccepted(series: SeriesId): void {
    if (series === "first") {
      this.stats.acceptedFirst++;
    } else {
      this.stats.acceptedSecond++;
    }
  }

  recordOverflow(): void {
    this.stats.droppedOverflow++;
  }

  recordMalformed(): void {
    this.stats.droppedMalformed++;
  }

  recordOutOfRange(): void {
    this.stats.droppedOutOfRange++;
  }

  recordMissingAttribute(): void {
    this.stats.missingAttributes++;
  }

  recordLeftovers(count: number): void {
    this.stats.leftoversDiscarded += count;
  }

  /**
   * Get current stats (readonly)
   * @returns Copy of the counters
   */
  getStats(): Readonly<EngineStats> {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = emptyStats();
  }
}
