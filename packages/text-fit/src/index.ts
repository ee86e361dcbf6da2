export {
  MAX_LINES,
  LINE_SPACING_FACTOR,
  DEFAULT_FONT_SIZE_STEP,
  MAX_FONT_SIZE,
  EMOJI_SCALE,
  BUDGET_OFFSETS,
  EMPTY_TEXT_PLACEHOLDER,
  type GlyphClass,
  type FitRequest,
  type FitResult,
  type Box,
} from './types.js';

export { isEmoji, isEmojiChar, containsEmoji, classifyGlyphs } from './emoji-classifier.js';

export { wrapLines, collapseWhitespace, codePointLength } from './line-wrapper.js';

export {
  PlainMetrics,
  CompositeMetrics,
  selectMetrics,
  splitGlyphRuns,
  type FontFace,
  type FontSet,
  type GlyphMetrics,
  type GlyphBox,
  type GlyphRun,
} from './glyph-metrics.js';

export { FontCache, DEFAULT_FALLBACK_FONT, type FontCacheOptions } from './font-cache.js';

export {
  fitText,
  fitRequestSchema,
  parseFitRequest,
  normalizeFitText,
  budgetCandidates,
  fontSizeLadder,
  searchFontSize,
  searchLineCount,
  fallbackLayout,
  foldLines,
  maxLineWidth,
  textHeight,
  type ParsedFitRequest,
  type SearchContext,
  type FitCandidate,
} from './fit-search.js';

export { placeLines, lineAdvance, type LinePlacement, type Point } from './layout.js';

export { FontUnavailableError, InvalidFitRequestError, type FitRequestIssue } from './errors.js';
