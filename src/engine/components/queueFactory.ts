import { GrowableSeriesQueue } from "./GrowableSeriesQueue.js";
import { RingSeriesQueue } from "./RingSeriesQueue.js";

import type { SeriesQueue } from "./SeriesQueue.js";
import type { QueueStrategy } from "../../types/index.js";

export interface QueueSettings {
  strategy: QueueStrategy;
  /** Ceiling for a bounded queue; ignored by the unbounded strategy. */
  capacity: number;
  /** Ceiling on slots a growable queue may allocate. */
  growthLimit?: number;
}

export function createSeriesQueue<T = number>(settings: QueueSettings): SeriesQueue<T> {
  switch (settings.strategy) {
    case "bounded":
      return new RingSeriesQueue<T>(settings.capacity);
    case "unbounded":
      return settings.growthLimit === undefined
        ? new GrowableSeriesQueue<T>()
        : new GrowableSeriesQueue<T>({ growthLimit: settings.growthLimit });
  }
}
