export {
  parseConfig,
  type ResolvedConfig,
  type SearchConfig,
  searchConfigSchema,
} from "./config.js";
export {
  ConfigError,
  PatternError,
  SinkBrokenError,
  SourceOpenError,
  StyleStateError,
} from "./errors.js";
// Highlighting
export {
  AnsiString,
  createPalette,
  DEFAULT_PALETTE,
  highlightSpans,
  type Palette,
  parseGrepColors,
  SGR_CLEAR,
  type Style,
  sgr,
  styled,
} from "./highlight/index.js";
export {
  type BytesSourceOptions,
  bytesSource,
  fileSource,
  STDIN_NAME,
  stdinSource,
} from "./io/byte-sources.js";
export {
  decodeLine,
  LineSource,
  type LineSourceOptions,
} from "./io/line-source.js";
export { OutputQueue } from "./io/output-queue.js";
export {
  MemorySink,
  type MemorySinkOptions,
  streamSink,
} from "./io/sinks.js";
export { DEFAULT_LIMITS, type StreamLimits } from "./limits.js";
export { createUserRegex, escapeRegex, UserRegex } from "./regex/index.js";
export {
  LineReporter,
  type ReporterOptions,
  type SourceStats,
} from "./reporter/line-reporter.js";
export {
  type CompiledPattern,
  type CompileOptions,
  compilePattern,
  compilePatterns,
  type EvaluateOptions,
  evaluate,
  foldAsciiCase,
  foldCase,
  invertEscapes,
  type LiteralPattern,
  type Pattern,
  toByteString,
} from "./search-engine/index.js";
export {
  type ExitCode,
  LineSearcher,
  type LineSearcherOptions,
  PROGRAM_NAME,
  runSearch,
  type SearchRequest,
  type SearchRunResult,
} from "./searcher.js";
export type {
  ByteSource,
  ColorMode,
  Dialect,
  Line,
  MatchResult,
  MatchSpan,
  OutputSink,
  SearchLogger,
} from "./types.js";
