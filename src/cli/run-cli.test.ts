import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable, Writable } from "node:stream";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { type CliIO, runCli, splitPatterns } from "./run-cli.js";

interface Harness {
  io: CliIO;
  stdout(): string;
  stderr(): string;
}

function collector(isTTY: boolean) {
  const chunks: string[] = [];
  const stream = Object.assign(
    new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString("utf8"));
        callback();
      },
    }),
    { isTTY },
  );
  return { stream, text: () => chunks.join("") };
}

function harness(
  stdin = "",
  overrides: Partial<CliIO> = {},
  env: Record<string, string> = {},
): Harness {
  const out = collector(false);
  const err: string[] = [];
  return {
    io: {
      stdout: out.stream,
      stderr: { write: (chunk: string) => err.push(chunk) },
      stdin: Readable.from([Buffer.from(stdin)]),
      env,
      ...overrides,
    },
    stdout: out.text,
    stderr: () => err.join(""),
  };
}

describe("runCli", () => {
  let dir: string;
  let alpha: string;
  let beta: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "linesift-cli-"));
    alpha = join(dir, "a.txt");
    beta = join(dir, "b.txt");
    await writeFile(alpha, "alpha\nbeta\ngamma\n");
    await writeFile(beta, "beta\n");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints help", async () => {
    const h = harness();
    expect(await runCli(["--help"], h.io)).toBe(0);
    expect(
      h.stdout().startsWith(
        "linesift - print lines that match patterns\n\nUsage: linesift [OPTION]... PATTERNS [FILE]...\n",
      ),
    ).toBe(true);
    expect(h.stdout()).toContain(
      "\nExamples:\n  linesift -n error app.log\n",
    );
  });

  it("searches standard input by default", async () => {
    const h = harness("apple\nbanana\n");
    expect(await runCli(["an"], h.io)).toBe(0);
    expect(h.stdout()).toBe("banana\n");
  });

  it("exits with 1 when nothing matches", async () => {
    const h = harness("apple\n");
    expect(await runCli(["kiwi"], h.io)).toBe(1);
    expect(h.stdout()).toBe("");
  });

  it("rejects unknown options with status 1", async () => {
    const short = harness();
    expect(await runCli(["-q", "x"], short.io)).toBe(1);
    expect(short.stderr()).toBe("linesift: invalid option -- 'q'\n");

    const long = harness();
    expect(await runCli(["--bogus", "x"], long.io)).toBe(1);
    expect(long.stderr()).toBe("linesift: unrecognized option '--bogus'\n");
  });

  it("requires a pattern", async () => {
    const h = harness();
    expect(await runCli([], h.io)).toBe(2);
    expect(h.stderr()).toBe(
      "linesift: no pattern supplied\nTry 'linesift --help' for more information.\n",
    );
  });

  it("rejects conflicting dialects", async () => {
    const h = harness();
    expect(await runCli(["-E", "-F", "x"], h.io)).toBe(2);
    expect(h.stderr()).toBe(
      "linesift: conflicting matchers specified\nTry 'linesift --help' for more information.\n",
    );
  });

  it("reports an invalid pattern with status 2", async () => {
    const h = harness("x\n");
    expect(await runCli(["-E", "("], h.io)).toBe(2);
    expect(h.stderr().startsWith("linesift: Invalid regular expression: /(/")).toBe(
      true,
    );
    expect(h.stdout()).toBe("");
  });

  it("combines -e patterns and numbers lines", async () => {
    const h = harness();
    expect(await runCli(["-e", "alpha", "-e", "gamma", "-n", alpha], h.io)).toBe(
      0,
    );
    expect(h.stdout()).toBe("1:alpha\n3:gamma\n");
  });

  it("prefixes file names across files", async () => {
    const h = harness();
    await runCli(["-H", "beta", alpha, beta], h.io);
    expect(h.stdout()).toBe(`${alpha}:beta\n${beta}:beta\n`);
  });

  it("reports a missing file and keeps going", async () => {
    const missing = join(dir, "missing.txt");
    const h = harness();
    expect(await runCli(["beta", missing, beta], h.io)).toBe(2);
    expect(h.stdout()).toBe("beta\n");
    expect(h.stderr()).toBe(`linesift: ${missing}: No such file or directory\n`);

    const quiet = harness();
    expect(await runCli(["-s", "beta", missing], quiet.io)).toBe(2);
    expect(quiet.stderr()).toBe("");
  });

  it("highlights with colours from GREP_COLORS", async () => {
    const h = harness("beta\n", {}, { GREP_COLORS: "ms=04" });
    await runCli(["--color=always", "beta"], h.io);
    expect(h.stdout()).toBe("\x1b[04mbeta\x1b[m\n");
  });

  it("rejects an unknown colour mode", async () => {
    const h = harness();
    expect(await runCli(["--color=sometimes", "x"], h.io)).toBe(2);
  });

  it("reads patterns from a file", async () => {
    const h = harness("", {
      readPatternFile: async () => "alpha\ngamma\n",
    });
    expect(await runCli(["-f", "pats", alpha], h.io)).toBe(0);
    expect(h.stdout()).toBe("alpha\ngamma\n");
  });

  it("reports an unreadable pattern file", async () => {
    const h = harness("", {
      readPatternFile: async () => {
        throw Object.assign(new Error("ENOENT: open 'pats'"), {
          code: "ENOENT",
        });
      },
    });
    expect(await runCli(["-f", "pats", alpha], h.io)).toBe(2);
    expect(h.stderr()).toBe("linesift: pats: No such file or directory\n");
  });

  it("splits input on NUL with -z", async () => {
    const h = harness("one\0two\0");
    await runCli(["-z", "two"], h.io);
    expect(h.stdout()).toBe("two\n");
  });

  it("lets --no-ignore-case override -i", async () => {
    const h = harness("alpha\n");
    expect(await runCli(["-i", "--no-ignore-case", "ALPHA"], h.io)).toBe(1);
  });

  it("reads standard input for the - operand", async () => {
    const h = harness("x\n");
    await runCli(["-H", "x", "-"], h.io);
    expect(h.stdout()).toBe("(standard input):x\n");
  });

  it("treats each line of PATTERNS as a pattern", async () => {
    const h = harness("foo\nbar\nbaz\n");
    await runCli(["foo\nbar"], h.io);
    expect(h.stdout()).toBe("foo\nbar\n");
  });

  it("uses custom separators", async () => {
    const h = harness("x\n");
    await runCli(["-n", "--result-sep= ", "x"], h.io);
    expect(h.stdout()).toBe("1 x\n");
  });
});

describe("splitPatterns", () => {
  it("splits on LF and CRLF", () => {
    expect(splitPatterns("a\nb\r\nc")).toEqual(["a", "b", "c"]);
  });
});
