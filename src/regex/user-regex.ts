/**
 * UserRegex - Centralized regex handling for user-provided patterns
 *
 * Every pattern a user hands to the search engine is compiled here.
 * Uses RE2JS for ReDoS protection via linear-time matching, so a hostile
 * pattern cannot stall a stream of lines.
 */

import { RE2JS, RE2JSSyntaxException } from "re2js";

/** Offsets of one match within the searched string */
export interface RegexSpan {
  start: number;
  end: number;
}

/**
 * Convert string flags to RE2JS numeric flags.
 * RE2 has no 'g' flag - iteration is driven by spans().
 */
function convertFlags(flags: string): number {
  let re2Flags = 0;
  if (flags.includes("i")) {
    re2Flags |= RE2JS.CASE_INSENSITIVE;
  }
  if (flags.includes("m")) {
    re2Flags |= RE2JS.MULTILINE;
  }
  if (flags.includes("s")) {
    re2Flags |= RE2JS.DOTALL;
  }
  return re2Flags;
}

/**
 * Translate a JavaScript-flavoured pattern to RE2-compatible syntax.
 */
export function translatePattern(pattern: string): string {
  return RE2JS.translateRegExp(pattern);
}

function explainUnsupported(pattern: string, msg: string): string {
  if (
    pattern.includes("(?=") ||
    pattern.includes("(?!") ||
    pattern.includes("(?<=") ||
    pattern.includes("(?<!")
  ) {
    return " Lookahead and lookbehind assertions are not supported: the regex engine is RE2, which guarantees linear-time matching.";
  }
  if (msg.includes("backreference") || /\\[1-9]/.test(pattern)) {
    return " Backreferences (\\1, \\2, etc.) are not supported: the regex engine is RE2, which guarantees linear-time matching.";
  }
  return "";
}

export interface UserRegexOptions {
  /** Pass the pattern through translatePattern() first (default: true) */
  translate?: boolean;
}

/**
 * A compiled user pattern.
 * Throws SyntaxError from the constructor when the pattern is invalid.
 */
export class UserRegex {
  private readonly _re2: RE2JS;
  private readonly _pattern: string;
  private readonly _flags: string;

  constructor(pattern: string, flags = "", options: UserRegexOptions = {}) {
    this._pattern = pattern;
    this._flags = flags;
    const { translate = true } = options;

    try {
      this._re2 = RE2JS.compile(
        translate ? translatePattern(pattern) : pattern,
        convertFlags(flags),
      );
    } catch (e) {
      if (e instanceof RE2JSSyntaxException) {
        const msg = e.message || "";
        throw new SyntaxError(
          `Invalid regular expression: /${pattern}/: ${msg}${explainUnsupported(pattern, msg)}`,
        );
      }
      throw e;
    }
  }

  /**
   * Test if the pattern matches anywhere in the input string.
   */
  test(input: string): boolean {
    return this._re2.matcher(input).find();
  }

  /**
   * Test if the pattern matches the entire input string.
   */
  fullMatch(input: string): boolean {
    return this._re2.matcher(input).matches();
  }

  /**
   * Iterate over all non-overlapping matches, left to right.
   * Zero-length matches are yielded; the scan then advances one position.
   *
   * With `group` set, each span is that capture group's and the next search
   * starts where the group ended, so text matched after the group can take
   * part in the next match.
   */
  *spans(input: string, group = 0): IterableIterator<RegexSpan> {
    const matcher = this._re2.matcher(input);
    let pos = 0;

    while (pos <= input.length && matcher.find(pos)) {
      const start = matcher.start(group);
      const end = matcher.end(group);
      if (start < 0) {
        pos = matcher.end(0) > pos ? matcher.end(0) : pos + 1;
        continue;
      }
      yield { start, end };
      // Prevent infinite loop on zero-length matches
      pos = start === end ? end + 1 : end;
    }
  }

  /**
   * Get the pattern string.
   */
  get source(): string {
    return this._pattern;
  }

  get flags(): string {
    return this._flags;
  }

  get ignoreCase(): boolean {
    return this._flags.includes("i");
  }
}

/**
 * Create a UserRegex from a pattern string and flags.
 * This is the primary entry point for user-provided regex patterns.
 *
 * @param flags - Optional regex flags (i, m, s)
 * @throws SyntaxError if the pattern is invalid
 */
export function createUserRegex(
  pattern: string,
  flags = "",
  options?: UserRegexOptions,
): UserRegex {
  return new UserRegex(pattern, flags, options);
}

/**
 * Escape every regex metacharacter so the string matches literally.
 */
export function escapeRegex(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
