/** Pattern syntax a raw pattern string is written in */
export type Dialect = "fixed" | "basic" | "extended";

/** When highlighting escape codes are written to the sink */
export type ColorMode = "auto" | "always" | "never";

/**
 * One delimited record read from a byte source.
 *
 * `text` is the UTF-8 decoding of `bytes`. When the bytes are not valid
 * UTF-8 the line is flagged `binary` and `text` holds the Latin-1 decoding,
 * one character per byte, so matching still runs byte-wise.
 */
export interface Line {
  /** Retained content, delimiter stripped */
  readonly bytes: Uint8Array;
  readonly text: string;
  readonly binary: boolean;
  /** 1-based position within the source */
  readonly index: number;
  /** Content exceeded the line cap before the delimiter was found */
  readonly overflow: boolean;
  /** Last line of its source */
  readonly eof: boolean;
}

/**
 * A match location within `Line.text`.
 * Invariant: 0 <= start <= end <= text.length
 */
export interface MatchSpan {
  start: number;
  end: number;
  /** Index of the pattern that produced the span */
  pattern: number;
}

export interface MatchResult {
  /** Whether the line is selected (already flipped under invert) */
  matched: boolean;
  spans: MatchSpan[];
}

/**
 * A named producer of bytes: a file, standard input, or an in-memory buffer.
 * Opening may fail with SourceOpenError.
 */
export interface ByteSource {
  readonly name: string;
  open(): Promise<AsyncIterable<Uint8Array>>;
}

/**
 * Destination for formatted output.
 * `write` rejects with SinkBrokenError once the consumer has gone away.
 */
export interface OutputSink {
  write(chunk: string): Promise<void>;
  /** Whether the sink is an interactive terminal (drives colorMode "auto") */
  readonly isTTY?: boolean;
}

/**
 * Logger interface for search execution logging.
 * Implement this interface to receive execution logs.
 */
export interface SearchLogger {
  /** Log informational messages (compilation, sources, errors) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (per-source summaries) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/** Outcome of a command-line invocation */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}
