/**
 * Pattern compilation for the search engine.
 *
 * Normalizes the three pattern dialects (fixed strings, basic and extended
 * regular expressions) plus the word, line and case modifiers into one
 * tagged representation. Compilation happens once, before any input is read,
 * so an invalid pattern fails the whole run up front.
 */

import { PatternError } from "../errors.js";
import {
  createUserRegex,
  escapeRegex,
  translatePattern,
  type UserRegex,
} from "../regex/index.js";
import type { Dialect } from "../types.js";

/** Metacharacters whose escaping differs between basic and extended syntax */
export const BASIC_REGEX_METACHARS = "?+{}|()";

const DIALECTS: readonly Dialect[] = ["fixed", "basic", "extended"];

/** Anything but a Unicode letter, digit or underscore */
const NON_WORD_CHAR = "[^\\p{L}\\p{N}_]";

export function isDialect(value: string): value is Dialect {
  return DIALECTS.some((dialect) => dialect === value);
}

export interface LiteralPattern {
  kind: "literal";
  /** Search text, already case-folded when ignoreCase is set */
  text: string;
  /** `text` as UTF-8 bytes, one character per byte, for binary lines */
  byteText: string;
  ignoreCase: boolean;
}

export interface CompiledPattern {
  kind: "compiled";
  regex: UserRegex;
  /** `regex` rebuilt over UTF-8 bytes, one character per byte, for binary lines */
  byteRegex: UserRegex;
  /** Regex source after dialect translation and anchoring */
  source: string;
  ignoreCase: boolean;
  /** Match the entire line rather than a substring */
  lineAnchor: boolean;
  /** Matches sit in capture group 1, between non-word characters or line ends */
  wordAnchor: boolean;
}

export type Pattern = LiteralPattern | CompiledPattern;

export interface CompileOptions {
  /** "fixed", "basic" or "extended" (default: "basic") */
  dialect?: Dialect | string;
  ignoreCase?: boolean;
  /** Match only whole words */
  wordRegexp?: boolean;
  /** Match only whole lines (ignored when wordRegexp is set) */
  lineRegexp?: boolean;
}

/**
 * Case-fold text one UTF-16 code unit at a time.
 *
 * Unlike String#toLowerCase this never changes the length (e.g. "İ" stays
 * one unit), so offsets found in folded text are valid in the original.
 */
export function foldCase(text: string): string {
  const lowered = text.toLowerCase();
  if (lowered.length === text.length) {
    return lowered;
  }
  let result = "";
  for (const unit of text.split("")) {
    const folded = unit.toLowerCase();
    result += folded.length === 1 ? folded : unit;
  }
  return result;
}

/**
 * Lowercase ASCII letters only. Binary lines are folded this way so that
 * bytes of multi-byte sequences keep their values.
 */
export function foldAsciiCase(text: string): string {
  return text.replace(/[A-Z]+/g, (run) => run.toLowerCase());
}

/**
 * Re-express text as its UTF-8 bytes, one character per byte, the form
 * binary lines are decoded to.
 */
export function toByteString(text: string): string {
  return Buffer.from(text, "utf8").toString("latin1");
}

/**
 * Swap escaped and unescaped forms of each character in `chars`.
 *
 * Used to turn basic regex syntax, where `\(` groups and `(` is literal,
 * into extended syntax, where it is the other way round. Applying it twice
 * restores the input when every backslash escapes one of `chars`.
 */
export function invertEscapes(
  pattern: string,
  chars: string = BASIC_REGEX_METACHARS,
): string {
  let result = pattern;
  for (const char of chars) {
    const escaped = `\\${char}`;
    result = result
      .split(escaped)
      .map((piece) => piece.split(char).join(escaped))
      .join(char);
  }
  return result;
}

/**
 * Compile one raw pattern.
 * @throws PatternError if the pattern is not valid for its dialect
 */
export function compilePattern(
  raw: string,
  options: CompileOptions = {},
): Pattern {
  const {
    dialect = "basic",
    ignoreCase = false,
    wordRegexp = false,
    lineRegexp = false,
  } = options;

  if (!isDialect(dialect)) {
    throw new PatternError(`unknown pattern dialect: ${dialect}`, raw);
  }

  let source = raw;
  if (dialect === "fixed" && ignoreCase) {
    source = foldCase(source);
  }
  if (dialect === "basic") {
    source = invertEscapes(source);
  }

  const lineAnchor = lineRegexp && !wordRegexp;
  if (dialect === "fixed") {
    if (!wordRegexp && !lineAnchor) {
      return {
        kind: "literal",
        text: source,
        byteText: toByteString(source),
        ignoreCase,
      };
    }
    source = escapeRegex(source);
  }

  const flags = ignoreCase ? "i" : "";
  const build = (text: string): { source: string; regex: UserRegex } => {
    if (!wordRegexp) {
      return { source: text, regex: compileRegex(text, flags, true, raw) };
    }
    // RE2's \b only knows ASCII word characters
    const inner = dialect === "fixed" ? text : translateInner(text, raw);
    const wrapped = `(?:^|${NON_WORD_CHAR})(${inner})(?:$|${NON_WORD_CHAR})`;
    return { source: wrapped, regex: compileRegex(wrapped, flags, false, raw) };
  };

  const compiled = build(source);
  // Non-ASCII characters in the pattern become their UTF-8 byte sequences
  const byteSource = toByteString(source);
  return {
    kind: "compiled",
    regex: compiled.regex,
    byteRegex:
      byteSource === source ? compiled.regex : build(byteSource).regex,
    source: compiled.source,
    ignoreCase,
    lineAnchor,
    wordAnchor: wordRegexp,
  };
}

function translateInner(source: string, raw: string): string {
  try {
    return translatePattern(source);
  } catch (error) {
    throw toPatternError(error, raw);
  }
}

function compileRegex(
  source: string,
  flags: string,
  translate: boolean,
  raw: string,
): UserRegex {
  try {
    return createUserRegex(source, flags, { translate });
  } catch (error) {
    throw toPatternError(error, raw);
  }
}

function toPatternError(error: unknown, raw: string): PatternError {
  const detail = error instanceof Error ? error.message : String(error);
  return new PatternError(detail, raw);
}

/**
 * Compile the full pattern list.
 * @throws PatternError for an empty list or any invalid pattern
 */
export function compilePatterns(
  raw: readonly string[],
  options: CompileOptions = {},
): Pattern[] {
  if (raw.length === 0) {
    throw new PatternError("no pattern supplied");
  }
  return raw.map((pattern) => compilePattern(pattern, options));
}
