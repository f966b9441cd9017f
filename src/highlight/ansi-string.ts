/**
 * AnsiString - text with offset-keyed style intervals, rendered to SGR
 * escape sequences.
 *
 * Styles may overlap and nest freely. Each apply() creates a distinct style
 * instance, and removal always refers to that instance, so two intervals with
 * the same codes never cancel each other out.
 */

import { StyleStateError } from "../errors.js";
import type { MatchSpan } from "../types.js";

const ESC = "\x1b";

/** Terminates all active styles */
export const SGR_CLEAR = `${ESC}[m`;

/**
 * SGR parameter string ("01;31") or a list of parameters joined with ";"
 */
export type Style = string | readonly string[];

interface StyleInstance {
  codes: string;
  /** A remove event exists (or none is ever needed) */
  ended: boolean;
}

interface IntervalEntry {
  apply: number[];
  remove: number[];
}

export function sgr(codes: string): string {
  return `${ESC}[${codes}m`;
}

function toCodes(style: Style): string {
  return typeof style === "string" ? style : style.join(";");
}

export class AnsiString {
  private readonly intervals = new Map<number, IntervalEntry>();
  private readonly instances = new Map<number, StyleInstance>();
  private nextId = 0;

  constructor(readonly text: string) {}

  /** True when no interval has been recorded */
  get isPlain(): boolean {
    return this.intervals.size === 0;
  }

  /**
   * Apply `style` from `start` for `length` characters, or to the end of
   * the text when `length` is omitted.
   * @returns the style instance id, usable with end()
   */
  apply(style: Style, start = 0, length?: number): number {
    if (!Number.isInteger(start) || start < 0) {
      throw new RangeError(`Invalid style start: ${start}`);
    }
    if (length !== undefined && (!Number.isInteger(length) || length < 0)) {
      throw new RangeError(`Invalid style length: ${length}`);
    }
    const id = this.nextId++;
    const codes = toCodes(style);
    if (codes === "" || length === 0) {
      this.instances.set(id, { codes, ended: true });
      return id;
    }
    this.instances.set(id, { codes, ended: length !== undefined });
    this.entry(start).apply.push(id);
    if (length !== undefined) {
      this.entry(start + length).remove.push(id);
    }
    return id;
  }

  /** Apply `style` over a match span */
  applyMatch(style: Style, span: Pick<MatchSpan, "start" | "end">): number {
    return this.apply(style, span.start, span.end - span.start);
  }

  /**
   * Record the remove event of an open-ended instance.
   * @throws StyleStateError for an unknown or already ended instance
   */
  end(id: number, offset: number): void {
    const instance = this.instances.get(id);
    if (!instance) {
      throw new StyleStateError(`Unknown style instance ${id}`);
    }
    if (instance.ended) {
      throw new StyleStateError(`Style instance ${id} already has an end`);
    }
    instance.ended = true;
    this.entry(offset).remove.push(id);
  }

  /** Drop every recorded interval */
  clear(): void {
    this.intervals.clear();
    this.instances.clear();
  }

  /**
   * Flatten the intervals into one string of text and escape sequences.
   *
   * At each offset removals happen before applies. Whenever something was
   * removed and styles remain active, the emitted list starts with a reset
   * so the removed styles do not persist.
   * @throws StyleStateError if a remove event names an inactive instance
   */
  render(): string {
    if (this.intervals.size === 0) {
      return this.text;
    }
    const offsets = [...this.intervals.keys()]
      .filter((offset) => offset < this.text.length)
      .sort((a, b) => a - b);

    const active: number[] = [];
    let out = "";
    let previous = 0;

    for (const offset of offsets) {
      const entry = this.intervals.get(offset);
      if (!entry) {
        continue;
      }
      out += this.text.slice(previous, offset);
      previous = offset;

      for (const id of entry.remove) {
        const idx = active.indexOf(id);
        if (idx === -1) {
          throw new StyleStateError(
            `Style instance ${id} removed at offset ${offset} but not active`,
          );
        }
        active.splice(idx, 1);
      }
      active.push(...entry.apply);

      const codes = active.map((id) => this.codesOf(id));
      if (entry.remove.length > 0 && codes.length > 0) {
        codes.unshift("0");
      }
      out += sgr(codes.join(";"));
    }

    out += this.text.slice(previous);
    if (active.length > 0) {
      out += SGR_CLEAR;
    }
    return out;
  }

  toString(): string {
    return this.render();
  }

  private codesOf(id: number): string {
    return this.instances.get(id)?.codes ?? "";
  }

  private entry(offset: number): IntervalEntry {
    let entry = this.intervals.get(offset);
    if (!entry) {
      entry = { apply: [], remove: [] };
      this.intervals.set(offset, entry);
    }
    return entry;
  }
}

/**
 * Render `text` with `style` over each span. An empty style, or no spans,
 * returns the text unchanged.
 */
export function highlightSpans(
  text: string,
  spans: readonly Pick<MatchSpan, "start" | "end">[],
  style: Style,
): string {
  const formatted = new AnsiString(text);
  for (const span of spans) {
    formatted.applyMatch(style, span);
  }
  return formatted.render();
}

/** Render `text` entirely in `style` */
export function styled(text: string, style: Style): string {
  const formatted = new AnsiString(text);
  formatted.apply(style);
  return formatted.render();
}
