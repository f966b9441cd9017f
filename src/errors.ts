/**
 * Error classes raised by the search pipeline.
 *
 * Pattern and configuration errors are fatal and surface before any input
 * is read. Source errors are reported per source and the run continues.
 * A broken sink ends the run quietly.
 */

/**
 * Error thrown when a pattern cannot be compiled for its dialect,
 * or when no usable pattern was supplied.
 */
export class PatternError extends Error {
  constructor(
    message: string,
    public readonly pattern?: string,
  ) {
    super(message);
    this.name = "PatternError";
  }
}

/**
 * Error thrown when the configuration record fails validation
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Error thrown when a byte source cannot be opened or read
 */
export class SourceOpenError extends Error {
  constructor(
    public readonly source: string,
    public readonly reason: string,
    public readonly code?: string,
  ) {
    super(`${source}: ${reason}`);
    this.name = "SourceOpenError";
  }
}

/**
 * Error thrown when the output consumer has gone away (e.g. EPIPE)
 */
export class SinkBrokenError extends Error {
  constructor(public readonly code?: string) {
    super(`Output sink closed${code ? ` (${code})` : ""}`);
    this.name = "SinkBrokenError";
  }
}

/**
 * Error thrown when a style interval map is inconsistent, e.g. a remove
 * event refers to a style instance that is not active.
 */
export class StyleStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StyleStateError";
  }
}
