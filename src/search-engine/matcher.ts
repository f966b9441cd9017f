/**
 * Core line matching logic for the search engine
 */

import type { Line, MatchResult, MatchSpan } from "../types.js";
import { foldAsciiCase, foldCase, type Pattern } from "./compiler.js";

export interface EvaluateOptions {
  /** Select lines that match no pattern */
  invert?: boolean;
  /** Collect every span of every pattern instead of stopping at the first hit */
  highlight?: boolean;
}

/**
 * Per-line scan state shared by all patterns
 */
interface ScanContext {
  text: string;
  /** The text is a binary line's bytes, one character per byte */
  binary: boolean;
  /** Case-folded text, computed on first use */
  folded(): string;
  /** Span accumulator, or null when only the first hit matters */
  spans: MatchSpan[] | null;
}

function scanLiteral(
  needle: string,
  haystack: string,
  index: number,
  spans: MatchSpan[] | null,
): boolean {
  // An empty literal matches every line and marks nothing
  if (needle === "") {
    return true;
  }
  let from = 0;
  let matched = false;
  for (
    let idx = haystack.indexOf(needle, from);
    idx !== -1;
    idx = haystack.indexOf(needle, from)
  ) {
    matched = true;
    if (spans === null) {
      break;
    }
    spans.push({ start: idx, end: idx + needle.length, pattern: index });
    from = idx + needle.length;
  }
  return matched;
}

/**
 * Scan one pattern, appending its spans to the context when collecting.
 */
function scanPattern(
  pattern: Pattern,
  index: number,
  ctx: ScanContext,
): boolean {
  const { text, binary, spans } = ctx;

  if (pattern.kind === "literal") {
    const haystack = pattern.ignoreCase ? ctx.folded() : text;
    const needle = binary ? pattern.byteText : pattern.text;
    return scanLiteral(needle, haystack, index, spans);
  }

  const regex = binary ? pattern.byteRegex : pattern.regex;
  if (pattern.lineAnchor) {
    if (!regex.fullMatch(text)) {
      return false;
    }
    if (spans !== null && text.length > 0) {
      spans.push({ start: 0, end: text.length, pattern: index });
    }
    return true;
  }

  let matched = false;
  for (const { start, end } of regex.spans(text, pattern.wordAnchor ? 1 : 0)) {
    matched = true;
    if (spans === null) {
      break;
    }
    // Zero-length matches select the line but have nothing to highlight
    if (start < end) {
      spans.push({ start, end, pattern: index });
    }
  }
  return matched;
}

/**
 * Evaluate the pattern set against one line.
 *
 * Without highlighting (and always under invert) scanning stops at the
 * first match. Under invert the result never carries spans. Binary lines
 * are matched byte for byte against the UTF-8 form of each pattern.
 */
export function evaluate(
  line: Pick<Line, "text"> & Partial<Pick<Line, "binary">>,
  patterns: readonly Pattern[],
  options: EvaluateOptions = {},
): MatchResult {
  const { invert = false, highlight = false } = options;
  const text = line.text;
  const binary = line.binary === true;

  let foldedText: string | null = null;
  const ctx: ScanContext = {
    text,
    binary,
    folded: () => {
      foldedText ??= binary ? foldAsciiCase(text) : foldCase(text);
      return foldedText;
    },
    spans: highlight && !invert ? [] : null,
  };

  let anyMatch = false;
  for (let index = 0; index < patterns.length; index++) {
    if (scanPattern(patterns[index], index, ctx)) {
      anyMatch = true;
      if (ctx.spans === null) {
        break;
      }
    }
  }

  if (invert) {
    return { matched: !anyMatch, spans: [] };
  }
  const spans = ctx.spans ?? [];
  spans.sort((a, b) => a.start - b.start || a.pattern - b.pattern);
  return { matched: anyMatch, spans };
}
