/**
 * linesift command line front end.
 *
 * Parses arguments, gathers patterns, opens sources, loads the colour
 * palette from GREP_COLORS and hands everything to runSearch().
 */

import { readFile } from "node:fs/promises";
import type { SearchConfig } from "../config.js";
import { parseGrepColors } from "../highlight/palette.js";
import {
  fileSource,
  stdinSource,
  toSourceOpenError,
} from "../io/byte-sources.js";
import { streamSink, type WritableWithTTY } from "../io/sinks.js";
import { PROGRAM_NAME, runSearch } from "../searcher.js";
import type { ByteSource, ColorMode, Dialect, ExecResult } from "../types.js";
import { type ArgDef, parseArgs } from "../utils/args.js";
import { hasHelpFlag, showHelp, usageError } from "./help.js";

export interface CliIO {
  stdout: WritableWithTTY;
  stderr: { write(chunk: string): unknown };
  stdin: NodeJS.ReadableStream;
  env: Record<string, string | undefined>;
  /** Reads a -f pattern file (default: fs.readFile as UTF-8) */
  readPatternFile?: (path: string) => Promise<string>;
}

const linesiftHelp = {
  name: PROGRAM_NAME,
  summary: "print lines that match patterns",
  usage: `${PROGRAM_NAME} [OPTION]... PATTERNS [FILE]...`,
  description: [
    "Search each FILE for PATTERNS. PATTERNS can contain multiple patterns",
    "separated by newlines. With no FILE, or when FILE is -, read standard input.",
  ],
  options: [
    "-E, --extended-regexp    PATTERNS are extended regular expressions",
    "-F, --fixed-strings      PATTERNS are strings",
    "-G, --basic-regexp       PATTERNS are basic regular expressions (default)",
    "-e, --regexp=PATTERNS    use PATTERNS for matching",
    "-f, --file=FILE          take PATTERNS from FILE",
    "-i, --ignore-case        ignore case distinctions in patterns and data",
    "    --no-ignore-case     do not ignore case distinctions (default)",
    "-w, --word-regexp        match only whole words",
    "-x, --line-regexp        match only whole lines",
    "-z, --null-data          a data line ends in 0 byte, not newline",
    "-v, --invert-match       select non-matching lines",
    "-s, --no-messages        suppress error messages",
    "-n, --line-number        print line number with output lines",
    "-H, --with-filename      print file name with output lines",
    "    --result-sep=SEP     string between the line prefix and the line",
    "    --name-num-sep=SEP   string between file name and line number",
    "    --color[=WHEN]       highlight matches; WHEN is 'always', 'never', or 'auto'",
    "    --help               display this help and exit",
  ],
  examples: [
    `${PROGRAM_NAME} -n error app.log`,
    `${PROGRAM_NAME} -iw -e warn -e fail build.log test.log`,
    `some-command | ${PROGRAM_NAME} --color=always -v DEBUG`,
  ],
  notes: [
    "Exit status is 0 if any line is selected, 1 otherwise;",
    "if an error occurred the exit status is 2.",
    "GREP_COLORS keys ms/mt, fn, ln and se set the highlight colours.",
  ],
};

const linesiftOptions = {
  extended: { short: "E", long: "extended-regexp", type: "boolean" },
  fixed: { short: "F", long: "fixed-strings", type: "boolean" },
  basic: { short: "G", long: "basic-regexp", type: "boolean" },
  regexp: { short: "e", long: "regexp", type: "list" },
  file: { short: "f", long: "file", type: "list" },
  ignoreCase: { short: "i", long: "ignore-case", type: "boolean" },
  noIgnoreCase: {
    long: "no-ignore-case",
    type: "boolean",
    dest: "ignoreCase",
    value: false,
  },
  wordRegexp: { short: "w", long: "word-regexp", type: "boolean" },
  lineRegexp: { short: "x", long: "line-regexp", type: "boolean" },
  nullData: { short: "z", long: "null-data", type: "boolean" },
  invertMatch: { short: "v", long: "invert-match", type: "boolean" },
  noMessages: { short: "s", long: "no-messages", type: "boolean" },
  lineNumber: { short: "n", long: "line-number", type: "boolean" },
  withFilename: { short: "H", long: "with-filename", type: "boolean" },
  resultSep: { long: "result-sep", type: "string" },
  nameNumSep: { long: "name-num-sep", type: "string" },
  color: { long: ["color", "colour"], type: "string", bareValue: "auto" },
} satisfies Record<string, ArgDef>;

const DIALECT_FLAGS: ReadonlyArray<readonly [string, Dialect]> = [
  ["extended", "extended"],
  ["fixed", "fixed"],
  ["basic", "basic"],
];

const COLOR_MODES: readonly ColorMode[] = ["always", "never", "auto"];

function toColorMode(value: string): ColorMode | undefined {
  return COLOR_MODES.find((mode) => mode === value);
}

/**
 * Split a PATTERNS argument on newlines (LF or CRLF)
 */
export function splitPatterns(patterns: string): string[] {
  return patterns.split(/\r?\n/);
}

function writeResult(io: CliIO, result: ExecResult): number {
  if (result.stdout) io.stdout.write(result.stdout);
  if (result.stderr) io.stderr.write(result.stderr);
  return result.exitCode;
}

/**
 * Run linesift with `args` (without the program name).
 * @returns the process exit status
 */
export async function runCli(
  args: readonly string[],
  io: CliIO,
): Promise<number> {
  if (hasHelpFlag(args)) {
    return writeResult(io, showHelp(linesiftHelp));
  }

  const parsed = parseArgs(PROGRAM_NAME, args, linesiftOptions);
  if (!parsed.ok) {
    return writeResult(io, parsed.error);
  }
  const flags = parsed.result;

  const dialects = DIALECT_FLAGS.filter(([flag]) => flags.bool(flag));
  if (dialects.length > 1) {
    return writeResult(
      io,
      usageError(PROGRAM_NAME, "conflicting matchers specified"),
    );
  }

  let colorMode: ColorMode = "auto";
  const colorArg = flags.string("color");
  if (colorArg !== undefined) {
    const mode = toColorMode(colorArg);
    if (mode === undefined) {
      return writeResult(
        io,
        usageError(PROGRAM_NAME, `invalid argument '${colorArg}' for '--color'`),
      );
    }
    colorMode = mode;
  }

  // Patterns come from -e and -f; without either, from the first operand
  const operands = [...flags.positional];
  const patterns: string[] = [];
  const patternArgs = flags.list("regexp");
  const patternFiles = flags.list("file");
  for (const arg of patternArgs) {
    patterns.push(...splitPatterns(arg));
  }
  const read =
    io.readPatternFile ?? ((path: string) => readFile(path, "utf8"));
  for (const path of patternFiles) {
    let content: string;
    try {
      content = await read(path);
    } catch (error) {
      io.stderr.write(
        `${PROGRAM_NAME}: ${toSourceOpenError(path, error).message}\n`,
      );
      return 2;
    }
    // The final newline ends the last pattern rather than adding an empty one
    if (content !== "") {
      patterns.push(...splitPatterns(content.replace(/\r?\n$/, "")));
    }
  }
  if (patternArgs.length === 0 && patternFiles.length === 0) {
    const first = operands.shift();
    if (first === undefined) {
      return writeResult(io, usageError(PROGRAM_NAME, "no pattern supplied"));
    }
    patterns.push(...splitPatterns(first));
  }

  const config: SearchConfig = {
    dialect: dialects[0]?.[1] ?? "basic",
    ignoreCase: flags.bool("ignoreCase"),
    wordRegexp: flags.bool("wordRegexp"),
    lineRegexp: flags.bool("lineRegexp"),
    invertMatch: flags.bool("invertMatch"),
    noMessages: flags.bool("noMessages"),
    lineNumber: flags.bool("lineNumber"),
    withFilename: flags.bool("withFilename"),
    delimiter: flags.bool("nullData") ? "\0" : "\n",
    // grep's own separator; ": " would change every line of piped output
    resultSeparator: flags.string("resultSep") ?? ":",
    nameNumberSeparator: flags.string("nameNumSep") ?? ":",
    colorMode,
  };

  const sources: ByteSource[] = operands.map((operand) =>
    operand === "-" ? stdinSource(io.stdin) : fileSource(operand),
  );
  if (sources.length === 0) {
    sources.push(stdinSource(io.stdin));
  }

  const result = await runSearch({
    patterns,
    sources,
    sink: streamSink(io.stdout),
    config,
    palette: parseGrepColors(io.env.GREP_COLORS),
    stderr: io.stderr,
  });
  return result.exitCode;
}
