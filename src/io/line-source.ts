/**
 * LineSource - splits a byte stream into delimited lines.
 *
 * Decisions are made one byte at a time: every byte goes into a rolling
 * suffix window the size of the delimiter, and a line ends exactly when that
 * window equals the delimiter. Content beyond the line cap is dropped while
 * the scan for the delimiter continues.
 */

import { DEFAULT_LIMITS } from "../limits.js";
import type { ByteSource, Line } from "../types.js";

const LF = 0x0a;
const CR = 0x0d;

const textEncoder = new TextEncoder();
// A leading BOM is content like any other byte sequence
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export interface LineSourceOptions {
  /** Line delimiter (default: "\n"); strings are UTF-8 encoded */
  delimiter?: Uint8Array | string;
  /** Maximum bytes retained per line (default: 131072) */
  maxLineBytes?: number;
}

/**
 * Normalize a delimiter option to bytes.
 * @throws RangeError for an empty delimiter
 */
export function toDelimiterBytes(delimiter: Uint8Array | string): Uint8Array {
  const bytes =
    typeof delimiter === "string" ? textEncoder.encode(delimiter) : delimiter;
  if (bytes.length === 0) {
    throw new RangeError("Line delimiter must not be empty");
  }
  return bytes;
}

/**
 * Decode line bytes, falling back to one character per byte when the
 * content is not valid UTF-8.
 */
export function decodeLine(bytes: Uint8Array): {
  text: string;
  binary: boolean;
} {
  try {
    return { text: utf8Decoder.decode(bytes), binary: false };
  } catch {
    // One character per byte (the WHATWG "latin1" label is windows-1252)
    return {
      text: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length).toString(
        "latin1",
      ),
      binary: true,
    };
  }
}

interface PendingLine {
  bytes: Uint8Array;
  overflow: boolean;
}

export class LineSource implements AsyncIterable<Line> {
  readonly name: string;
  private readonly source: ByteSource;
  private readonly delimiter: Uint8Array;
  private readonly maxLineBytes: number;
  private readonly stripCarriageReturn: boolean;

  private chunks: AsyncIterator<Uint8Array> | null = null;
  private chunk: Uint8Array = new Uint8Array(0);
  private offset = 0;
  private ended = false;

  // Per-line scanning state
  private readonly accumulator: Uint8Array;
  /** The last delimiter-length bytes, preceded by the byte before them */
  private readonly window: Uint8Array;
  private kept = 0;
  private total = 0;

  // One line of lookahead, so the last line can carry eof
  private lookahead: PendingLine | null = null;
  private index = 0;

  constructor(source: ByteSource, options: LineSourceOptions = {}) {
    this.source = source;
    this.name = source.name;
    this.delimiter = toDelimiterBytes(options.delimiter ?? "\n");
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_LIMITS.maxLineBytes;
    if (!Number.isInteger(this.maxLineBytes) || this.maxLineBytes < 1) {
      throw new RangeError(
        `maxLineBytes must be a positive integer, got ${this.maxLineBytes}`,
      );
    }
    this.stripCarriageReturn = this.delimiter[0] === LF;
    this.accumulator = new Uint8Array(this.maxLineBytes);
    this.window = new Uint8Array(this.delimiter.length + 1);
  }

  /**
   * Open the underlying byte source.
   * Errors from the source (SourceOpenError) propagate to the caller.
   */
  async open(): Promise<void> {
    const iterable = await this.source.open();
    this.chunks = iterable[Symbol.asyncIterator]();
  }

  /**
   * Read the next line, or null at end of stream.
   */
  async next(): Promise<Line | null> {
    if (this.chunks === null) {
      throw new Error(`LineSource '${this.name}' read before open()`);
    }
    if (this.lookahead === null) {
      this.lookahead = await this.scan();
      if (this.lookahead === null) {
        return null;
      }
    }
    const current = this.lookahead;
    this.lookahead = await this.scan();
    return this.toLine(current, this.lookahead === null);
  }

  /**
   * Release the underlying source. Safe to call more than once.
   */
  async close(): Promise<void> {
    const chunks = this.chunks;
    this.ended = true;
    if (chunks?.return) {
      await chunks.return();
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Line> {
    if (this.chunks === null) {
      await this.open();
    }
    try {
      for (
        let line = await this.next();
        line !== null;
        line = await this.next()
      ) {
        yield line;
      }
    } finally {
      await this.close();
    }
  }

  private toLine(pending: PendingLine, eof: boolean): Line {
    const { text, binary } = decodeLine(pending.bytes);
    this.index++;
    return {
      bytes: pending.bytes,
      text,
      binary,
      index: this.index,
      overflow: pending.overflow,
      eof,
    };
  }

  /**
   * Consume bytes up to and including the next delimiter.
   */
  private async scan(): Promise<PendingLine | null> {
    const delimiterLength = this.delimiter.length;

    for (;;) {
      if (this.offset >= this.chunk.length) {
        if (!(await this.fill())) {
          return this.finishAtEnd();
        }
      }

      const byte = this.chunk[this.offset++];
      this.window.copyWithin(0, 1);
      this.window[delimiterLength] = byte;
      if (this.kept < this.maxLineBytes) {
        this.accumulator[this.kept++] = byte;
      }
      this.total++;

      if (this.total >= delimiterLength && this.suffixIsDelimiter()) {
        let contentLength = this.total - delimiterLength;
        // A CR stripped before the newline does not count against the cap
        if (
          this.stripCarriageReturn &&
          contentLength > 0 &&
          this.window[0] === CR
        ) {
          contentLength--;
        }
        const overflow = contentLength > this.maxLineBytes;
        const line: PendingLine = {
          bytes: this.accumulator.slice(
            0,
            overflow ? this.maxLineBytes : contentLength,
          ),
          overflow,
        };
        this.resetLine();
        return line;
      }
    }
  }

  private finishAtEnd(): PendingLine | null {
    if (this.total === 0) {
      return null;
    }
    // Truncation of a delimiter-less final line is not reported as overflow
    const line: PendingLine = {
      bytes: this.takeContent(this.kept, this.total <= this.maxLineBytes),
      overflow: false,
    };
    this.resetLine();
    return line;
  }

  private takeContent(length: number, complete: boolean): Uint8Array {
    let end = length;
    if (
      complete &&
      this.stripCarriageReturn &&
      end > 0 &&
      this.accumulator[end - 1] === CR
    ) {
      end--;
    }
    return this.accumulator.slice(0, end);
  }

  private suffixIsDelimiter(): boolean {
    for (let i = 0; i < this.delimiter.length; i++) {
      if (this.window[i + 1] !== this.delimiter[i]) {
        return false;
      }
    }
    return true;
  }

  private resetLine(): void {
    this.kept = 0;
    this.total = 0;
    this.window.fill(0);
  }

  private async fill(): Promise<boolean> {
    if (this.ended || this.chunks === null) {
      return false;
    }
    for (;;) {
      const result = await this.chunks.next();
      if (result.done) {
        this.ended = true;
        return false;
      }
      if (result.value.length > 0) {
        this.chunk = result.value;
        this.offset = 0;
        return true;
      }
    }
  }
}
