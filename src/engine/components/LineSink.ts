/**
 * Line sinks - where records and side-channel lines go
 *
 * WritableLineSink batches lines into one write once `maxBufferSize`
 * characters are pending (or on flush()), and reports backpressure so the
 * driving loop can wait for the target before feeding more input. A target
 * that closes while the loop waits ends the run with OutputClosedError.
 */

import { once } from "events";

import { OUTPUT_BUFFER_SIZE } from "../../config.js";
import { OutputClosedError } from "../errors.js";
import { scopedLogger } from "../../logging/index.js";

import type { LineSink } from "../../types/index.js";

const logger = scopedLogger("LINE SINK");

function isClosed(target: NodeJS.WritableStream): boolean {
  return "destroyed" in target && target.destroyed === true;
}

export class WritableLineSink implements LineSink {
  private readonly target: NodeJS.WritableStream;
  private readonly maxBufferSize: number;
  private pending: string[] = [];
  private pendingSize = 0;
  private blocked = false;
  private linesWritten = 0;

  /**
   * @param maxBufferSize - Characters held before a write (defaults to config.performance.outputBufferSize)
   */
  constructor(target: NodeJS.WritableStream, maxBufferSize?: number) {
    this.target = target;
    this.maxBufferSize = maxBufferSize ?? OUTPUT_BUFFER_SIZE;
  }

  write(line: string): void {
    const chunk = line + "\n";
    this.pending.push(chunk);
    this.pendingSize += chunk.length;
    this.linesWritten++;
    if (this.pendingSize >= this.maxBufferSize) {
      this.flush();
    }
  }

  /** Hand every pending line to the target in one write. */
  flush(): void {
    if (this.pending.length === 0) {
      return;
    }
    const content = this.pending.join("");
    this.pending = [];
    this.pendingSize = 0;
    if (!this.target.write(content)) {
      this.blocked = true;
    }
  }

  /**
   * Resolves once the target has drained whatever it refused to buffer.
   * Rejects with OutputClosedError when the target closes first.
   */
  async drain(): Promise<void> {
    if (!this.blocked) {
      return;
    }
    if (isClosed(this.target)) {
      throw new OutputClosedError(`Output closed after ${this.linesWritten} lines`);
    }
    logger.debug(`Waiting for drain after ${this.linesWritten} lines`);

    const controller = new AbortController();
    try {
      const event = await Promise.race([
        once(this.target, "drain", { signal: controller.signal }).then(() => "drain" as const),
        once(this.target, "close", { signal: controller.signal }).then(() => "close" as const),
      ]);
      if (event === "close") {
        throw new OutputClosedError(`Output closed after ${this.linesWritten} lines`);
      }
      this.blocked = false;
    } finally {
      // Detaches the listener of whichever event did not fire
      controller.abort();
    }
  }

  getPendingSize(): number {
    return this.pendingSize;
  }

  getLinesWritten(): number {
    return this.linesWritten;
  }
}

/**
 * Keeps every line in memory.
 */
export class CollectingLineSink implements LineSink {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  toString(): string {
    return this.lines.map((line) => line + "\n").join("");
  }
}
