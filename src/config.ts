/**
 * Search configuration record, validated with zod.
 *
 * Every field is optional on input; defaults are filled in by parseConfig().
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_LIMITS } from "./limits.js";

const delimiterSchema = z.union([
  z.string().min(1, "delimiter must not be empty"),
  z
    .instanceof(Uint8Array)
    .refine((bytes) => bytes.length > 0, "delimiter must not be empty"),
]);

export const searchConfigSchema = z
  .object({
    dialect: z
      .enum(["fixed", "basic", "extended"])
      .default("basic")
      .describe("Pattern syntax"),
    ignoreCase: z.boolean().default(false),
    wordRegexp: z.boolean().default(false).describe("Match whole words only"),
    lineRegexp: z.boolean().default(false).describe("Match whole lines only"),
    invertMatch: z
      .boolean()
      .default(false)
      .describe("Select lines that match no pattern"),
    delimiter: delimiterSchema.default("\n").describe("Input line delimiter"),
    lineNumber: z.boolean().default(false),
    withFilename: z.boolean().default(false),
    noMessages: z
      .boolean()
      .default(false)
      .describe("Suppress messages about unreadable sources"),
    // ":" as grep prints it, so output stays parseable by tools that expect grep
    resultSeparator: z.string().default(":"),
    nameNumberSeparator: z.string().default(":"),
    colorMode: z.enum(["auto", "always", "never"]).default("auto"),
    maxLineBytes: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_LIMITS.maxLineBytes),
    queueCapacity: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_LIMITS.queueCapacity),
  })
  .strict();

/** Configuration as supplied by callers */
export type SearchConfig = z.input<typeof searchConfigSchema>;

/** Configuration with every default applied */
export type ResolvedConfig = z.output<typeof searchConfigSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate a configuration record and apply defaults.
 * @throws ConfigError listing every problem found
 */
export function parseConfig(input: unknown = {}): ResolvedConfig {
  const result = searchConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigError(`invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
