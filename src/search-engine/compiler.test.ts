import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { PatternError } from "../errors.js";
import {
  BASIC_REGEX_METACHARS,
  compilePattern,
  compilePatterns,
  foldCase,
  invertEscapes,
  isDialect,
} from "./compiler.js";

describe("invertEscapes", () => {
  it("turns basic grouping into extended grouping", () => {
    expect(invertEscapes("a\\(b\\)")).toBe("a(b)");
  });

  it("escapes bare metacharacters", () => {
    expect(invertEscapes("a+")).toBe("a\\+");
    expect(invertEscapes("x|y")).toBe("x\\|y");
  });

  it("leaves other escapes alone", () => {
    expect(invertEscapes("\\.\\*\\b")).toBe("\\.\\*\\b");
  });

  it("is an involution for well-formed escaping", () => {
    const metachar = fc.constantFrom(...BASIC_REGEX_METACHARS.split(""));
    const token = fc.oneof(
      fc.constantFrom("a", "b", "z", ".", "*", "^", "$", " "),
      metachar,
      metachar.map((char) => `\\${char}`),
    );
    fc.assert(
      fc.property(fc.array(token, { maxLength: 20 }), (tokens) => {
        const pattern = tokens.join("");
        expect(invertEscapes(invertEscapes(pattern))).toBe(pattern);
      }),
    );
  });
});

describe("foldCase", () => {
  it("lowercases ASCII", () => {
    expect(foldCase("FOO Bar")).toBe("foo bar");
  });

  it("keeps units whose lowercase form changes length", () => {
    expect(foldCase("AİB")).toBe("aİb");
  });
});

describe("isDialect", () => {
  it("recognizes the three dialects", () => {
    expect(isDialect("fixed")).toBe(true);
    expect(isDialect("basic")).toBe(true);
    expect(isDialect("extended")).toBe(true);
    expect(isDialect("perl")).toBe(false);
  });
});

describe("compilePattern", () => {
  it("keeps fixed strings literal", () => {
    expect(compilePattern("a.b", { dialect: "fixed" })).toEqual({
      kind: "literal",
      text: "a.b",
      byteText: "a.b",
      ignoreCase: false,
    });
  });

  it("case-folds fixed strings under ignoreCase", () => {
    expect(
      compilePattern("ABC", { dialect: "fixed", ignoreCase: true }),
    ).toEqual({
      kind: "literal",
      text: "abc",
      byteText: "abc",
      ignoreCase: true,
    });
  });

  it("keeps the UTF-8 bytes of a literal for binary lines", () => {
    expect(compilePattern("é", { dialect: "fixed" })).toMatchObject({
      text: "é",
      byteText: "\u00c3\u00a9",
    });
  });

  it("builds a byte-level regex for non-ASCII patterns", () => {
    const pattern = compilePattern("é+", { dialect: "extended" });
    if (pattern.kind !== "compiled") {
      throw new Error("expected a compiled pattern");
    }
    expect(pattern.byteRegex.source).toBe("\u00c3\u00a9+");
    expect(pattern.byteRegex.test("x\u00c3\u00a9")).toBe(true);
    const ascii = compilePattern("ab", { dialect: "extended" });
    expect(ascii.kind === "compiled" && ascii.byteRegex === ascii.regex).toBe(
      true,
    );
  });

  it("translates basic syntax to extended", () => {
    const pattern = compilePattern("a\\(b\\)");
    expect(pattern.kind).toBe("compiled");
    if (pattern.kind === "compiled") {
      expect(pattern.source).toBe("a(b)");
      expect(pattern.regex.test("xaby")).toBe(true);
    }
  });

  it("treats a bare + as a literal in basic syntax", () => {
    const pattern = compilePattern("a+");
    if (pattern.kind !== "compiled") {
      throw new Error("expected a compiled pattern");
    }
    expect(pattern.source).toBe("a\\+");
    expect(pattern.regex.test("a+")).toBe(true);
    expect(pattern.regex.test("aa")).toBe(false);
  });

  it("escapes and wraps fixed strings for word matching", () => {
    const pattern = compilePattern("a.b", { dialect: "fixed", wordRegexp: true });
    expect(pattern).toMatchObject({
      kind: "compiled",
      source: "(?:^|[^\\p{L}\\p{N}_])(a\\.b)(?:$|[^\\p{L}\\p{N}_])",
      wordAnchor: true,
      lineAnchor: false,
    });
  });

  it("groups regex patterns before adding word boundaries", () => {
    const pattern = compilePattern("cat|dog", {
      dialect: "extended",
      wordRegexp: true,
    });
    if (pattern.kind !== "compiled") {
      throw new Error("expected a compiled pattern");
    }
    expect(pattern.regex.test("hot dog!")).toBe(true);
    expect(pattern.regex.test("dogma")).toBe(false);
  });

  it("compiles fixed strings for whole-line matching", () => {
    const pattern = compilePattern("a.b", { dialect: "fixed", lineRegexp: true });
    expect(pattern).toMatchObject({
      kind: "compiled",
      source: "a\\.b",
      lineAnchor: true,
      wordAnchor: false,
    });
  });

  it("ignores lineRegexp when wordRegexp is set", () => {
    const pattern = compilePattern("cat", {
      dialect: "extended",
      wordRegexp: true,
      lineRegexp: true,
    });
    expect(pattern).toMatchObject({ lineAnchor: false, wordAnchor: true });
  });

  it("sets the case-insensitive flag on compiled patterns", () => {
    const pattern = compilePattern("foo", {
      dialect: "extended",
      ignoreCase: true,
    });
    if (pattern.kind !== "compiled") {
      throw new Error("expected a compiled pattern");
    }
    expect(pattern.regex.ignoreCase).toBe(true);
    expect(pattern.regex.test("FOO")).toBe(true);
  });

  it("rejects an invalid extended pattern", () => {
    expect(() => compilePattern("(", { dialect: "extended" })).toThrow(
      PatternError,
    );
  });

  it("rejects a basic pattern with an unbalanced group", () => {
    try {
      compilePattern("\\(");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PatternError);
      expect(error instanceof PatternError && error.pattern).toBe("\\(");
    }
  });

  it("rejects an unknown dialect", () => {
    expect(() => compilePattern("x", { dialect: "perl" })).toThrow(
      "unknown pattern dialect: perl",
    );
  });
});

describe("compilePatterns", () => {
  it("compiles every pattern in order", () => {
    const patterns = compilePatterns(["one", "two"], { dialect: "fixed" });
    expect(patterns.map((p) => (p.kind === "literal" ? p.text : ""))).toEqual([
      "one",
      "two",
    ]);
  });

  it("rejects an empty pattern list", () => {
    expect(() => compilePatterns([])).toThrow(
      new PatternError("no pattern supplied"),
    );
  });
});
