import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { StyleStateError } from "../errors.js";
import {
  AnsiString,
  highlightSpans,
  SGR_CLEAR,
  sgr,
  styled,
} from "./ansi-string.js";

describe("AnsiString", () => {
  it("renders plain text unchanged", () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        expect(new AnsiString(text).render()).toBe(text);
      }),
    );
  });

  it("wraps a single interval", () => {
    const s = new AnsiString("a cat sat");
    s.apply("01;31", 2, 3);
    expect(s.render()).toBe(`a ${sgr("01;31")}cat${SGR_CLEAR} sat`);
  });

  it("joins a list of parameters", () => {
    const s = new AnsiString("ab");
    s.apply(["01", "31"], 0, 1);
    expect(s.render()).toBe("\x1b[01;31ma\x1b[mb");
  });

  it("keeps the second of two overlapping styles active", () => {
    const s = new AnsiString("abcdefghijklmnopqrst");
    s.apply("01;31", 0, 10);
    s.apply("32", 5, 10);
    expect(s.render()).toBe(
      "\x1b[01;31mabcde" +
        "\x1b[01;31;32mfghij" +
        "\x1b[0;32mklmno" +
        "\x1b[mpqrst",
    );
  });

  it("removes same-valued styles by instance", () => {
    const s = new AnsiString("abcdefgh");
    s.apply("1", 0, 4);
    s.apply("1", 2, 4);
    expect(s.render()).toBe(
      "\x1b[1mab\x1b[1;1mcd\x1b[0;1mef\x1b[mgh",
    );
  });

  it("closes an open-ended style at the end of the text", () => {
    const s = new AnsiString("abcd");
    s.apply("4", 2);
    expect(s.render()).toBe("ab\x1b[4mcd\x1b[m");
  });

  it("ignores offsets past the end of the text", () => {
    const s = new AnsiString("abc");
    s.apply("1", 5, 2);
    expect(s.render()).toBe("abc");
  });

  it("emits a clear code for an interval ending at the last character", () => {
    const s = new AnsiString("abc");
    s.applyMatch("35", { start: 1, end: 3 });
    expect(s.render()).toBe("a\x1b[35mbc\x1b[m");
  });

  it("records nothing for empty styles or zero-length intervals", () => {
    const s = new AnsiString("abc");
    s.apply("", 0, 2);
    s.apply("1", 1, 0);
    expect(s.isPlain).toBe(true);
    expect(s.render()).toBe("abc");
  });

  it("ends an open-ended instance explicitly", () => {
    const s = new AnsiString("abcdef");
    const id = s.apply("7", 1);
    s.end(id, 3);
    expect(s.render()).toBe("a\x1b[7mbc\x1b[mdef");
  });

  it("rejects ending an instance twice", () => {
    const s = new AnsiString("abcdef");
    const id = s.apply("7", 1, 2);
    expect(() => s.end(id, 4)).toThrow(StyleStateError);
    expect(() => s.end(99, 4)).toThrow(StyleStateError);
  });

  it("throws when removing an instance that is not active", () => {
    const s = new AnsiString("abcdef");
    const id = s.apply("7", 3);
    s.end(id, 1);
    expect(() => s.render()).toThrow(StyleStateError);
  });

  it("rejects negative offsets and lengths", () => {
    const s = new AnsiString("abc");
    expect(() => s.apply("1", -1)).toThrow(RangeError);
    expect(() => s.apply("1", 0, -2)).toThrow(RangeError);
  });

  it("renders the same output twice", () => {
    const s = new AnsiString("abc");
    s.apply("1", 0, 1);
    expect(s.render()).toBe(s.render());
  });

  it("forgets intervals on clear", () => {
    const s = new AnsiString("abc");
    s.apply("1", 0, 1);
    s.clear();
    expect(s.render()).toBe("abc");
  });
});

describe("highlightSpans", () => {
  it("marks every span", () => {
    expect(
      highlightSpans(
        "foo foo",
        [
          { start: 0, end: 3 },
          { start: 4, end: 7 },
        ],
        "01;31",
      ),
    ).toBe("\x1b[01;31mfoo\x1b[m \x1b[01;31mfoo\x1b[m");
  });

  it("colours overlapping spans from different patterns", () => {
    expect(
      highlightSpans(
        "abcd",
        [
          { start: 0, end: 2 },
          { start: 1, end: 3 },
        ],
        "1",
      ),
    ).toBe("\x1b[1ma\x1b[1;1mb\x1b[0;1mc\x1b[md");
  });

  it("returns the text unchanged without spans", () => {
    expect(highlightSpans("abc", [], "1")).toBe("abc");
  });
});

describe("styled", () => {
  it("wraps the whole text", () => {
    expect(styled("file.txt", "35")).toBe("\x1b[35mfile.txt\x1b[m");
  });

  it("skips empty text and empty styles", () => {
    expect(styled("", "35")).toBe("");
    expect(styled("x", "")).toBe("x");
  });
});
