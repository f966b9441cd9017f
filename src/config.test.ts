import { describe, expect, it } from "vitest";
import { parseConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig()).toEqual({
      dialect: "basic",
      ignoreCase: false,
      wordRegexp: false,
      lineRegexp: false,
      invertMatch: false,
      delimiter: "\n",
      lineNumber: false,
      withFilename: false,
      noMessages: false,
      resultSeparator: ":",
      nameNumberSeparator: ":",
      colorMode: "auto",
      maxLineBytes: 131072,
      queueCapacity: 256,
    });
  });

  it("keeps supplied values", () => {
    const config = parseConfig({
      dialect: "fixed",
      delimiter: new Uint8Array([0]),
      resultSeparator: "-",
      colorMode: "never",
    });
    expect(config.dialect).toBe("fixed");
    expect(config.delimiter).toEqual(new Uint8Array([0]));
    expect(config.resultSeparator).toBe("-");
    expect(config.colorMode).toBe("never");
  });

  it("reports every invalid field", () => {
    try {
      parseConfig({ dialect: "perl", maxLineBytes: 0, delimiter: "" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues).toHaveLength(3);
      expect(issues.some((issue) => issue.startsWith("dialect: "))).toBe(true);
      expect(issues.some((issue) => issue.startsWith("maxLineBytes: "))).toBe(
        true,
      );
      expect(issues).toContain("delimiter: delimiter must not be empty");
    }
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig({ ignorecase: true })).toThrow(ConfigError);
  });

  it("rejects a non-object", () => {
    expect(() => parseConfig("fixed")).toThrow(ConfigError);
  });
});
