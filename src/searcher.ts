/**
 * LineSearcher - runs compiled patterns over a list of byte sources and
 * writes the selected lines to an output sink.
 *
 * Two tasks share one bounded queue: the producer reads, matches and
 * formats lines; the consumer writes finished records in order. Sources are
 * searched one after another, never concurrently.
 */

import {
  parseConfig,
  type ResolvedConfig,
  type SearchConfig,
} from "./config.js";
import {
  ConfigError,
  PatternError,
  SinkBrokenError,
  SourceOpenError,
} from "./errors.js";
import { highlightSpans } from "./highlight/ansi-string.js";
import {
  createPalette,
  DEFAULT_PALETTE,
  type Palette,
} from "./highlight/palette.js";
import { stdinSource, toSourceOpenError } from "./io/byte-sources.js";
import { LineSource } from "./io/line-source.js";
import { OutputQueue } from "./io/output-queue.js";
import { LineReporter } from "./reporter/line-reporter.js";
import { compilePatterns, type Pattern } from "./search-engine/compiler.js";
import { evaluate } from "./search-engine/matcher.js";
import type { ByteSource, OutputSink, SearchLogger } from "./types.js";

/** Prefix of every diagnostic message */
export const PROGRAM_NAME = "linesift";

export type ExitCode = 0 | 1 | 2;

/** Destination for diagnostics, such as process.stderr */
export interface DiagnosticWriter {
  write(chunk: string): unknown;
}

export interface LineSearcherOptions {
  /** Colours used when output is coloured (default: DEFAULT_PALETTE) */
  palette?: Palette;
  /**
   * Optional logger for execution tracing.
   * Receives compile, source, source-error, summary and sink-closed events.
   */
  logger?: SearchLogger;
  /** Source searched when run() is given none (default: standard input) */
  defaultSource?: () => ByteSource;
  /**
   * Receives each diagnostic as soon as it occurs. SearchRunResult.stderr
   * collects the same text either way.
   */
  stderr?: DiagnosticWriter;
}

export interface SearchRunResult {
  /** 0 if a line was selected, 1 if none was, 2 if a source failed */
  exitCode: ExitCode;
  matched: boolean;
  selectedLines: number;
  /** All diagnostics of the run, in the order they occurred */
  stderr: string;
  /** The sink went away before all output was written */
  sinkClosed: boolean;
}

interface RunState {
  selected: number;
  failed: boolean;
  stderr: string;
}

export class LineSearcher {
  readonly config: ResolvedConfig;
  readonly patterns: readonly Pattern[];
  readonly palette: Palette;
  private readonly logger?: SearchLogger;
  private readonly defaultSource: () => ByteSource;
  private readonly stderr?: DiagnosticWriter;

  /**
   * @throws ConfigError if the configuration is invalid
   * @throws PatternError if no pattern is given or one fails to compile
   */
  constructor(
    patterns: readonly string[],
    config: SearchConfig = {},
    options: LineSearcherOptions = {},
  ) {
    this.config = parseConfig(config);
    this.patterns = compilePatterns(patterns, {
      dialect: this.config.dialect,
      ignoreCase: this.config.ignoreCase,
      wordRegexp: this.config.wordRegexp,
      lineRegexp: this.config.lineRegexp,
    });
    this.palette = createPalette(options.palette ?? DEFAULT_PALETTE);
    this.logger = options.logger;
    this.defaultSource = options.defaultSource ?? (() => stdinSource());
    this.stderr = options.stderr;

    this.logger?.info("compile", {
      patterns: this.patterns.length,
      dialect: this.config.dialect,
    });
  }

  /**
   * Whether output to `sink` is coloured under the configured mode
   */
  colorFor(sink: OutputSink): boolean {
    switch (this.config.colorMode) {
      case "always":
        return true;
      case "never":
        return false;
      case "auto":
        return sink.isTTY === true;
    }
  }

  /**
   * Search every source in order and write the selected lines to `sink`.
   * An empty source list searches the default source.
   */
  async run(
    sources: readonly ByteSource[],
    sink: OutputSink,
  ): Promise<SearchRunResult> {
    const queue = new OutputQueue<string>(this.config.queueCapacity);
    const state: RunState = { selected: 0, failed: false, stderr: "" };
    const color = this.colorFor(sink);
    const reporter = new LineReporter({
      withFilename: this.config.withFilename,
      lineNumber: this.config.lineNumber,
      resultSeparator: this.config.resultSeparator,
      nameNumberSeparator: this.config.nameNumberSeparator,
      color,
      palette: this.palette,
      maxLineBytes: this.config.maxLineBytes,
    });
    const targets = sources.length > 0 ? sources : [this.defaultSource()];

    const [, sinkClosed] = await Promise.all([
      this.produce(targets, queue, reporter, color, state),
      this.consume(queue, sink),
    ]);

    let exitCode: ExitCode = state.selected > 0 ? 0 : 1;
    if (state.failed) {
      exitCode = 2;
    }
    return {
      exitCode,
      matched: state.selected > 0,
      selectedLines: state.selected,
      stderr: state.stderr,
      sinkClosed,
    };
  }

  private async produce(
    sources: readonly ByteSource[],
    queue: OutputQueue<string>,
    reporter: LineReporter,
    color: boolean,
    state: RunState,
  ): Promise<void> {
    try {
      for (const source of sources) {
        const more = await this.searchSource(
          source,
          queue,
          reporter,
          color,
          state,
        );
        if (!more) {
          break;
        }
      }
    } finally {
      queue.close();
    }
  }

  /**
   * Search one source.
   *
   * A source that fails part-way still gets its binary and overflow
   * summaries for the lines read before the failure.
   * @returns false once the consumer has gone away
   */
  private async searchSource(
    source: ByteSource,
    queue: OutputQueue<string>,
    reporter: LineReporter,
    color: boolean,
    state: RunState,
  ): Promise<boolean> {
    const { invertMatch, delimiter, maxLineBytes } = this.config;
    const lines = new LineSource(source, { delimiter, maxLineBytes });
    const read = async () => {
      try {
        return await lines.next();
      } catch (error) {
        throw toSourceOpenError(source.name, error);
      }
    };

    this.logger?.info("source", { name: source.name });
    reporter.beginSource(source.name);

    let failed = false;
    try {
      try {
        await lines.open();
      } catch (error) {
        throw toSourceOpenError(source.name, error);
      }
      for (let line = await read(); line !== null; line = await read()) {
        const match = evaluate(line, this.patterns, {
          invert: invertMatch,
          highlight: color,
        });
        if (!match.matched) {
          reporter.report(line, match, "");
          continue;
        }
        const text =
          match.spans.length > 0
            ? highlightSpans(line.text, match.spans, this.palette.match)
            : line.text;
        const record = reporter.report(line, match, text);
        if (record !== null && !(await queue.push(record))) {
          return false;
        }
      }
    } catch (error) {
      if (!(error instanceof SourceOpenError)) {
        throw error;
      }
      failed = true;
      this.sourceFailed(error, state);
    } finally {
      state.selected += reporter.current.selected;
      await lines.close();
    }

    if (!failed) {
      this.logger?.debug("summary", {
        name: source.name,
        selected: reporter.current.selected,
        binary: reporter.current.binaryMatches,
        overflow: reporter.current.overflowLines,
      });
    }
    for (const record of reporter.endSource()) {
      if (!(await queue.push(record))) {
        return false;
      }
    }
    return !queue.isCancelled;
  }

  private sourceFailed(error: SourceOpenError, state: RunState): void {
    state.failed = true;
    this.logger?.info("source-error", {
      name: error.source,
      message: error.reason,
    });
    if (!this.config.noMessages) {
      const message = `${PROGRAM_NAME}: ${error.message}\n`;
      state.stderr += message;
      this.stderr?.write(message);
    }
  }

  /**
   * Write queued records to the sink.
   * @returns true if the sink broke before the queue was drained
   */
  private async consume(
    queue: OutputQueue<string>,
    sink: OutputSink,
  ): Promise<boolean> {
    try {
      for await (const record of queue) {
        await sink.write(`${record}\n`);
      }
      return false;
    } catch (error) {
      queue.cancel();
      if (error instanceof SinkBrokenError) {
        this.logger?.info("sink-closed", { code: error.code });
        return true;
      }
      throw error;
    }
  }
}

export interface SearchRequest {
  patterns: readonly string[];
  /** Sources to search (default: standard input) */
  sources?: readonly ByteSource[];
  sink: OutputSink;
  config?: SearchConfig;
  palette?: Palette;
  logger?: SearchLogger;
  /** Receives diagnostics as they occur, pattern and config errors included */
  stderr?: DiagnosticWriter;
}

/**
 * Build a searcher and run it. Pattern and configuration errors become
 * exit status 2 with a message instead of an exception.
 */
export async function runSearch(
  request: SearchRequest,
): Promise<SearchRunResult> {
  let searcher: LineSearcher;
  try {
    searcher = new LineSearcher(request.patterns, request.config, {
      palette: request.palette,
      logger: request.logger,
      stderr: request.stderr,
    });
  } catch (error) {
    if (error instanceof PatternError || error instanceof ConfigError) {
      const message = `${PROGRAM_NAME}: ${error.message}\n`;
      request.stderr?.write(message);
      return {
        exitCode: 2,
        matched: false,
        selectedLines: 0,
        stderr: message,
        sinkClosed: false,
      };
    }
    throw error;
  }
  return searcher.run(request.sources ?? [], request.sink);
}
