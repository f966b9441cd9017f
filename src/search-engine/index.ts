/**
 * Search engine: pattern compilation and per-line matching
 *
 * Provides:
 * - Dialect translation (fixed strings, basic and extended regex)
 * - Word, line and case modifiers
 * - Line evaluation with optional span collection for highlighting
 */

export {
  BASIC_REGEX_METACHARS,
  type CompiledPattern,
  type CompileOptions,
  compilePattern,
  compilePatterns,
  foldAsciiCase,
  foldCase,
  invertEscapes,
  isDialect,
  type LiteralPattern,
  type Pattern,
  toByteString,
} from "./compiler.js";
export { type EvaluateOptions, evaluate } from "./matcher.js";
