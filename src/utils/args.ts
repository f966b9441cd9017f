/**
 * Lightweight argument parser for the command line front end.
 *
 * Handles common patterns:
 * - Boolean flags: -n, --line-number
 * - Combined short flags: -in (same as -i -n)
 * - Negating flags that write to another flag: --no-ignore-case
 * - Value options: -e VALUE, -eVALUE, --regexp=VALUE, --regexp VALUE
 * - Repeatable value options collected into a list
 * - Long options whose value may be omitted: --color, --color=always
 * - Positional arguments and "--"
 * - Unknown option detection
 */

import { unknownOption } from "../cli/help.js";
import type { ExecResult } from "../types.js";

export type ArgType = "boolean" | "string" | "list";

export interface ArgDef {
  /** Short form without dash, e.g., "n" for -n */
  short?: string;
  /** Long form(s) without dashes, e.g., ["color", "colour"] */
  long?: string | string[];
  type: ArgType;
  /** Flag that receives the value (default: this definition's own name) */
  dest?: string;
  /** Value stored by a boolean flag (default: true) */
  value?: boolean;
  /** Value used when a long string option is given without "=VALUE" */
  bareValue?: string;
}

type ArgValue = boolean | string | string[];

/**
 * Parsed flag values with typed accessors
 */
export class ParsedArgs {
  constructor(
    private readonly values: ReadonlyMap<string, ArgValue>,
    /** Positional arguments (non-flag arguments) */
    readonly positional: string[],
  ) {}

  /** Whether the flag was given at all */
  has(name: string): boolean {
    return this.values.has(name);
  }

  bool(name: string): boolean {
    return this.values.get(name) === true;
  }

  string(name: string): string | undefined {
    const value = this.values.get(name);
    return typeof value === "string" ? value : undefined;
  }

  list(name: string): string[] {
    const value = this.values.get(name);
    return Array.isArray(value) ? [...value] : [];
  }
}

export type ParseResult =
  | { ok: true; result: ParsedArgs }
  | { ok: false; error: ExecResult };

interface OptionInfo {
  dest: string;
  def: ArgDef;
}

function missingArgument(cmdName: string, option: string): ExecResult {
  const msg = option.startsWith("--")
    ? `${cmdName}: option '${option}' requires an argument\n`
    : `${cmdName}: option requires an argument -- '${option.slice(1)}'\n`;
  return { stdout: "", stderr: msg, exitCode: 1 };
}

/**
 * Parse command arguments according to the provided definitions.
 *
 * @param cmdName - Command name for error messages
 *
 * @example
 * const defs = {
 *   regexp: { short: "e", long: "regexp", type: "list" },
 *   lineNumber: { short: "n", long: "line-number", type: "boolean" },
 * } satisfies Record<string, ArgDef>;
 * const parsed = parseArgs("linesift", args, defs);
 * if (!parsed.ok) return parsed.error;
 * const patterns = parsed.result.list("regexp");
 */
export function parseArgs(
  cmdName: string,
  args: readonly string[],
  defs: Record<string, ArgDef>,
): ParseResult {
  const shortToInfo = new Map<string, OptionInfo>();
  const longToInfo = new Map<string, OptionInfo>();

  for (const [name, def] of Object.entries(defs)) {
    const info = { dest: def.dest ?? name, def };
    if (def.short) shortToInfo.set(def.short, info);
    const longs = typeof def.long === "string" ? [def.long] : (def.long ?? []);
    for (const long of longs) longToInfo.set(long, info);
  }

  const values = new Map<string, ArgValue>();
  const store = ({ dest, def }: OptionInfo, value: string | undefined) => {
    if (def.type === "boolean") {
      values.set(dest, def.value ?? true);
    } else if (def.type === "list") {
      const current = values.get(dest);
      const list = Array.isArray(current) ? current : [];
      list.push(value ?? "");
      values.set(dest, list);
    } else {
      values.set(dest, value ?? "");
    }
  };

  const positional: string[] = [];
  let stopParsing = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const eqIndex = arg.indexOf("=");
      const optName = eqIndex === -1 ? arg.slice(2) : arg.slice(2, eqIndex);
      let optValue = eqIndex === -1 ? undefined : arg.slice(eqIndex + 1);

      const info = longToInfo.get(optName);
      if (!info) {
        return { ok: false, error: unknownOption(cmdName, arg) };
      }
      if (info.def.type !== "boolean" && optValue === undefined) {
        if (info.def.bareValue !== undefined) {
          optValue = info.def.bareValue;
        } else if (i + 1 < args.length) {
          optValue = args[++i];
        } else {
          return { ok: false, error: missingArgument(cmdName, `--${optName}`) };
        }
      }
      store(info, optValue);
      continue;
    }

    // Short option(s)
    const chars = arg.slice(1);
    for (let j = 0; j < chars.length; j++) {
      const c = chars[j];
      const info = shortToInfo.get(c);
      if (!info) {
        return { ok: false, error: unknownOption(cmdName, `-${c}`) };
      }
      if (info.def.type === "boolean") {
        store(info, undefined);
        continue;
      }
      // Value option - rest of string or next arg
      let optValue: string;
      if (j + 1 < chars.length) {
        optValue = chars.slice(j + 1);
      } else if (i + 1 < args.length) {
        optValue = args[++i];
      } else {
        return { ok: false, error: missingArgument(cmdName, `-${c}`) };
      }
      store(info, optValue);
      break;
    }
  }

  return { ok: true, result: new ParsedArgs(values, positional) };
}
