/**
 * Output sinks: a Node.js writable stream adapter and an in-memory sink.
 */

import { SinkBrokenError } from "../errors.js";
import type { OutputSink } from "../types.js";

/** Error codes meaning the reader on the other end has gone away */
const BROKEN_SINK_CODES = new Set([
  "EPIPE",
  "ECONNRESET",
  "ERR_STREAM_DESTROYED",
  "ERR_STREAM_WRITE_AFTER_END",
]);

function brokenSinkCode(error: unknown): string | null {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    BROKEN_SINK_CODES.has(error.code)
  ) {
    return error.code;
  }
  return null;
}

/**
 * Map a stream write failure to SinkBrokenError when it means the
 * consumer is gone; any other error is returned unchanged.
 */
export function toSinkError(error: unknown): unknown {
  if (error instanceof SinkBrokenError) {
    return error;
  }
  const code = brokenSinkCode(error);
  return code !== null ? new SinkBrokenError(code) : error;
}

export type WritableWithTTY = NodeJS.WritableStream & { isTTY?: boolean };

/**
 * Adapt a writable stream (typically process.stdout).
 *
 * Each write resolves once the stream has accepted the chunk. A broken pipe,
 * whether reported through the write callback or the stream's 'error' event,
 * rejects the current and every later write with SinkBrokenError.
 */
export function streamSink(stream: WritableWithTTY): OutputSink {
  let failure: unknown = null;

  stream.on("error", (error: unknown) => {
    failure ??= toSinkError(error);
  });

  return {
    isTTY: stream.isTTY === true,
    write(chunk: string): Promise<void> {
      if (failure !== null) {
        return Promise.reject(failure);
      }
      return new Promise<void>((resolve, reject) => {
        stream.write(chunk, (error?: Error | null) => {
          if (error) {
            failure ??= toSinkError(error);
            reject(failure);
          } else {
            resolve();
          }
        });
      });
    },
  };
}

export interface MemorySinkOptions {
  /** Reported TTY state (default: false) */
  isTTY?: boolean;
  /** Reject with SinkBrokenError once this many writes have succeeded */
  breakAfter?: number;
}

/**
 * Collects output in memory. Used by tests and by callers that want the
 * whole result as a string.
 */
export class MemorySink implements OutputSink {
  readonly isTTY: boolean;
  readonly chunks: string[] = [];
  private readonly breakAfter: number;

  constructor(options: MemorySinkOptions = {}) {
    this.isTTY = options.isTTY ?? false;
    this.breakAfter = options.breakAfter ?? Number.POSITIVE_INFINITY;
  }

  async write(chunk: string): Promise<void> {
    if (this.chunks.length >= this.breakAfter) {
      throw new SinkBrokenError("EPIPE");
    }
    this.chunks.push(chunk);
  }

  get text(): string {
    return this.chunks.join("");
  }

  /** Output split into records, without the trailing empty entry */
  get lines(): string[] {
    const text = this.text;
    if (text === "") {
      return [];
    }
    return text.endsWith("\n")
      ? text.slice(0, -1).split("\n")
      : text.split("\n");
  }
}
