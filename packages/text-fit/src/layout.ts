import type { GlyphMetrics } from './glyph-metrics.js';
import { LINE_SPACING_FACTOR, type Box, type FitResult } from './types.js';

export interface Point {
  x: number;
  y: number;
}

export interface LinePlacement {
  text: string;
  /** Left edge of the line's glyphs. */
  x: number;
  /** Top of the line's slot. */
  y: number;
  width: number;
  /** False for empty or whitespace-only lines; their slot is still reserved. */
  draw: boolean;
}

export function lineAdvance(fontSize: number): number {
  return fontSize * LINE_SPACING_FACTOR;
}

/**
 * Center each line horizontally and the block vertically inside `box`,
 * offset by `origin` when the box does not start at (0, 0).
 */
export function placeLines(
  result: Pick<FitResult, 'fontSize' | 'lines'>,
  box: Box,
  metrics: GlyphMetrics,
  origin: Point = { x: 0, y: 0 },
): LinePlacement[] {
  const advance = lineAdvance(result.fontSize);
  let y = origin.y + (box.height - result.lines.length * advance) / 2;

  return result.lines.map((text) => {
    const draw = text.trim().length > 0;
    const width = draw ? metrics.measure(text, result.fontSize) : 0;
    const placement: LinePlacement = {
      text,
      x: origin.x + (box.width - width) / 2,
      y,
      width,
      draw,
    };
    y += advance;
    return placement;
  });
}
