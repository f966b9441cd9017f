/**
 * LineReporter - assembles output records for selected lines and the
 * end-of-source summary records.
 *
 * A record is built in a fixed order: filename, separator, line number,
 * separator, text. Each field is included only when its option is on.
 */

import { styled } from "../highlight/ansi-string.js";
import { DEFAULT_PALETTE, type Palette } from "../highlight/palette.js";
import { DEFAULT_LIMITS } from "../limits.js";
import type { Line, MatchResult } from "../types.js";

export interface ReporterOptions {
  withFilename?: boolean;
  lineNumber?: boolean;
  /** Between the prefix fields and the line text (default: ":") */
  resultSeparator?: string;
  /** Between the filename and the line number (default: ":") */
  nameNumberSeparator?: string;
  /** Style prefix fields with the palette */
  color?: boolean;
  palette?: Palette;
  /** Line cap, quoted in the truncation summary */
  maxLineBytes?: number;
}

/** Counters for the source currently being reported */
export interface SourceStats {
  name: string;
  selected: number;
  binaryMatches: number;
  overflowLines: number;
}

export class LineReporter {
  private readonly withFilename: boolean;
  private readonly lineNumber: boolean;
  private readonly resultSeparator: string;
  private readonly nameNumberSeparator: string;
  private readonly color: boolean;
  private readonly palette: Palette;
  private readonly maxLineBytes: number;
  private stats: SourceStats = LineReporter.emptyStats("");

  constructor(options: ReporterOptions = {}) {
    this.withFilename = options.withFilename ?? false;
    this.lineNumber = options.lineNumber ?? false;
    this.resultSeparator = options.resultSeparator ?? ":";
    this.nameNumberSeparator = options.nameNumberSeparator ?? ":";
    this.color = options.color ?? false;
    this.palette = options.palette ?? DEFAULT_PALETTE;
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_LIMITS.maxLineBytes;
  }

  private static emptyStats(name: string): SourceStats {
    return { name, selected: 0, binaryMatches: 0, overflowLines: 0 };
  }

  /** Reset the per-source counters */
  beginSource(name: string): void {
    this.stats = LineReporter.emptyStats(name);
  }

  get current(): Readonly<SourceStats> {
    return this.stats;
  }

  /**
   * Account for one line and build its record.
   *
   * Every line is passed in so overflow is counted whether or not the line
   * was selected. Returns null for unselected lines and for selected binary
   * lines, which are only counted.
   */
  report(line: Line, match: MatchResult, formattedText: string): string | null {
    if (line.overflow) {
      this.stats.overflowLines++;
    }
    if (!match.matched) {
      return null;
    }
    this.stats.selected++;
    if (line.binary) {
      this.stats.binaryMatches++;
      return null;
    }

    let record = "";
    if (this.withFilename) {
      record += this.field(this.stats.name, this.palette.filename);
      record += this.field(
        this.lineNumber ? this.nameNumberSeparator : this.resultSeparator,
        this.palette.separator,
      );
    }
    if (this.lineNumber) {
      record += this.field(String(line.index), this.palette.lineNumber);
      record += this.field(this.resultSeparator, this.palette.separator);
    }
    return record + formattedText;
  }

  /**
   * Summary records for the source just finished, then reset the counters.
   */
  endSource(): string[] {
    const { name, binaryMatches, overflowLines } = this.stats;
    const records: string[] = [];
    if (binaryMatches > 0) {
      records.push(`Binary file ${name} matches`);
    }
    if (overflowLines > 0) {
      const noun = overflowLines === 1 ? "line" : "lines";
      records.push(
        `${name}: ${overflowLines} ${noun} truncated to ${this.maxLineBytes} bytes`,
      );
    }
    this.stats = LineReporter.emptyStats(name);
    return records;
  }

  private field(text: string, style: string): string {
    return this.color ? styled(text, style) : text;
  }
}
