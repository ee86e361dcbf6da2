// ─── Constants ────────────────────────────────────────────────────────
export const MAX_LINES = 3;
export const LINE_SPACING_FACTOR = 1.5;
export const DEFAULT_FONT_SIZE_STEP = 5;
/** Upper bound on requested font sizes; keeps the size ladder at most this long. */
export const MAX_FONT_SIZE = 1000;
/** Advance height multiplier for lines that carry emoji glyphs. */
export const EMOJI_SCALE = 1.3;
/** Budget offsets applied to the starting chars-per-line, in preference order. */
export const BUDGET_OFFSETS = [0, -1, 1, -2, 2] as const;
export const EMPTY_TEXT_PLACEHOLDER = 'Nothing to report';

// ─── Types ────────────────────────────────────────────────────────────
export type GlyphClass = 'plain' | 'emoji-aware';

export interface FitRequest {
  text: string;
  boxWidth: number;
  boxHeight: number;
  initialFontSize: number;
  minFontSize: number;
  fontSizeStep?: number;
}

export interface FitResult {
  fontSize: number;
  /** Budget handed to the wrapper for the accepted layout. */
  charsPerLine: number;
  lines: string[];
  /** False only for the degraded fallback, which may overflow the box. */
  fitGuaranteed: boolean;
  glyphClass: GlyphClass;
}

export interface Box {
  width: number;
  height: number;
}
