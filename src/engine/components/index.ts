/**
 * Engine Components
 *
 * - Each component has a SINGLE responsibility
 * - Queues are owned by BlockState and never shared
 */

export { RingSeriesQueue } from "./RingSeriesQueue.js";
export { GrowableSeriesQueue, DEFAULT_INITIAL_CAPACITY } from "./GrowableSeriesQueue.js";
export type { GrowableQueueOptions } from "./GrowableSeriesQueue.js";
export { createSeriesQueue } from "./queueFactory.js";
export type { QueueSettings } from "./queueFactory.js";
export type { SeriesQueue } from "./SeriesQueue.js";
export { BlockState } from "./BlockState.js";
export type { BlockStateOptions, ResetSummary } from "./BlockState.js";
export { RecordFormatter } from "./RecordFormatter.js";
export { StatsTracker } from "./StatsTracker.js";
export { WritableLineSink, CollectingLineSink } from "./LineSink.js";
