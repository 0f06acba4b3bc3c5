/**
 * Error classes that escape the engine.
 *
 * Per-value problems (overflow, malformed numerals, missing attributes) are
 * diagnostics, not errors, and never leave the dispatcher. Everything here
 * stops a run.
 */

export type PairStreamErrorCode = "STREAM_READ" | "OUTPUT_CLOSED" | "QUEUE_EXHAUSTED" | "PROFILE";

export class PairStreamError extends Error {
  readonly code: PairStreamErrorCode;

  constructor(code: PairStreamErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The notification source failed: malformed markup, a broken transport or a
 * document that ended with elements still open.
 */
export class StreamReadError extends PairStreamError {
  constructor(message: string, cause?: unknown) {
    super("STREAM_READ", message, cause);
  }
}

/**
 * The output target closed while records were still waiting to be written,
 * e.g. an HTTP client that disconnected mid-response.
 */
export class OutputClosedError extends PairStreamError {
  constructor(message: string) {
    super("OUTPUT_CLOSED", message);
  }
}

/**
 * A growable queue could not allocate more room. The queue still holds
 * everything it held before the attempt.
 */
export class QueueExhaustedError extends PairStreamError {
  readonly requested: number;

  constructor(requested: number, cause?: unknown) {
    super("QUEUE_EXHAUSTED", `Queue cannot grow to ${requested} slots`, cause);
    this.requested = requested;
  }
}

export class ProfileError extends PairStreamError {
  constructor(message: string) {
    super("PROFILE", message);
  }
}

export function isPairStreamError(error: unknown): error is PairStreamError {
  return error instanceof PairStreamError;
}
