export {
  AnsiString,
  highlightSpans,
  SGR_CLEAR,
  type Style,
  sgr,
  styled,
} from "./ansi-string.js";
export {
  createPalette,
  DEFAULT_PALETTE,
  type Palette,
  parseGrepColors,
} from "./palette.js";
