/**
 * Colour palette for highlighted output, and GREP_COLORS parsing.
 *
 * A palette is snapshotted once when a searcher is built and never re-read
 * during a run.
 */

export interface Palette {
  /** Matched text */
  readonly match: string;
  readonly filename: string;
  readonly lineNumber: string;
  /** Separators between filename, line number and text */
  readonly separator: string;
}

export const DEFAULT_PALETTE: Palette = Object.freeze({
  match: "01;31",
  filename: "35",
  lineNumber: "32",
  separator: "36",
});

const PALETTE_KEYS = new Map<string, keyof Palette>([
  ["mt", "match"],
  ["ms", "match"],
  ["fn", "filename"],
  ["ln", "lineNumber"],
  ["se", "separator"],
]);

/** Recognized capabilities with no effect on this output format */
const IGNORED_KEYS = new Set(["mc", "sl", "cx", "bn", "rv", "ne"]);

const SGR_PARAMS = /^\d+(?:;\d+)*$/;

/**
 * Build a frozen palette from `overrides`, falling back to `base`.
 */
export function createPalette(
  overrides: Partial<Palette> = {},
  base: Palette = DEFAULT_PALETTE,
): Palette {
  return Object.freeze({
    match: overrides.match ?? base.match,
    filename: overrides.filename ?? base.filename,
    lineNumber: overrides.lineNumber ?? base.lineNumber,
    separator: overrides.separator ?? base.separator,
  });
}

/**
 * Parse a GREP_COLORS value such as "ms=01;32:fn=34:ln=33".
 *
 * Entries whose value is not a list of integers separated by ";" are
 * skipped, as are unknown keys.
 */
export function parseGrepColors(
  value: string | undefined,
  base: Palette = DEFAULT_PALETTE,
): Palette {
  const overrides: { -readonly [K in keyof Palette]?: string } = {};
  if (value) {
    for (const entry of value.split(":")) {
      const eq = entry.indexOf("=");
      if (eq === -1) {
        continue;
      }
      const key = entry.slice(0, eq);
      const codes = entry.slice(eq + 1);
      if (IGNORED_KEYS.has(key)) {
        continue;
      }
      const field = PALETTE_KEYS.get(key);
      if (field !== undefined && SGR_PARAMS.test(codes)) {
        overrides[field] = codes;
      }
    }
  }
  return createPalette(overrides, base);
}
