/**
 * Paired-stream extraction engine - public surface
 */

export * from "./components/index.js";
export { flushPairs } from "./pairing.js";
export { EventDispatcher } from "./EventDispatcher.js";
export type { DispatcherDependencies } from "./EventDispatcher.js";
export {
  PairedStreamEngine,
  resolveEngineSettings,
  describeDiagnostic,
  createDiagnosticLogger,
} from "./PairedStreamEngine.js";
export type { EngineOptions, EngineSettings } from "./PairedStreamEngine.js";
export { listProfiles, parseProfile, resolveProfile, validateProfile } from "./profiles.js";
export {
  PairStreamError,
  StreamReadError,
  QueueExhaustedError,
  OutputClosedError,
  ProfileError,
  isPairStreamError,
} from "./errors.js";
export type { PairStreamErrorCode } from "./errors.js";
export type * from "../types/index.js";
