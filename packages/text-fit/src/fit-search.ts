import { z } from 'zod';
import { createLogger } from '@headline/config';
import { classifyGlyphs } from './emoji-classifier.js';
import { InvalidFitRequestError } from './errors.js';
import { selectMetrics, type FontSet, type GlyphMetrics } from './glyph-metrics.js';
import { codePointLength, collapseWhitespace, wrapLines } from './line-wrapper.js';
import {
  BUDGET_OFFSETS,
  DEFAULT_FONT_SIZE_STEP,
  EMPTY_TEXT_PLACEHOLDER,
  LINE_SPACING_FACTOR,
  MAX_FONT_SIZE,
  MAX_LINES,
  type FitRequest,
  type FitResult,
} from './types.js';

const log = createLogger('fit-search');

// ─── Request Validation ───────────────────────────────────────────────
export const fitRequestSchema = z
  .object({
    text: z.string(),
    boxWidth: z.number().finite().positive(),
    boxHeight: z.number().finite().positive(),
    initialFontSize: z.number().int().positive().max(MAX_FONT_SIZE),
    minFontSize: z.number().int().positive().max(MAX_FONT_SIZE),
    fontSizeStep: z.number().int().positive().default(DEFAULT_FONT_SIZE_STEP),
  })
  .refine((r) => r.initialFontSize >= r.minFontSize, {
    message: 'must be greater than or equal to minFontSize',
    path: ['initialFontSize'],
  });

export type ParsedFitRequest = z.infer<typeof fitRequestSchema>;

/** Collapsed text, or the placeholder when nothing printable is left. */
export function normalizeFitText(text: string): string {
  return collapseWhitespace(text) || EMPTY_TEXT_PLACEHOLDER;
}

export function parseFitRequest(request: FitRequest): ParsedFitRequest {
  const parsed = fitRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new InvalidFitRequestError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return { ...parsed.data, text: normalizeFitText(parsed.data.text) };
}

// ─── Search Space ─────────────────────────────────────────────────────

export interface SearchContext {
  text: string;
  boxWidth: number;
  boxHeight: number;
  metrics: GlyphMetrics;
}

export interface FitCandidate {
  fontSize: number;
  charsPerLine: number;
  lines: string[];
}

export function textHeight(lineCount: number, fontSize: number): number {
  return lineCount * fontSize * LINE_SPACING_FACTOR;
}

/** Budgets for one font-size tier, in preference order, clamped and de-duplicated. */
export function budgetCandidates(chars0: number): number[] {
  const budgets: number[] = [];
  for (const offset of BUDGET_OFFSETS) {
    const budget = Math.max(1, chars0 + offset);
    if (!budgets.includes(budget)) budgets.push(budget);
  }
  return budgets;
}

export function fontSizeLadder(initialFontSize: number, minFontSize: number, step: number): number[] {
  const sizes: number[] = [];
  for (let size = initialFontSize; size >= minFontSize; size -= step) {
    sizes.push(size);
  }
  return sizes;
}

export function maxLineWidth(lines: string[], fontSize: number, metrics: GlyphMetrics): number {
  let widest = 0;
  for (const line of lines) {
    widest = Math.max(widest, metrics.measure(line, fontSize));
  }
  return widest;
}

// ─── Tiers ────────────────────────────────────────────────────────────

/** Offset tier: first budget whose wrap has exactly `lineCount` lines and fits. */
export function searchFontSize(ctx: SearchContext, lineCount: number, fontSize: number): FitCandidate | undefined {
  if (textHeight(lineCount, fontSize) > ctx.boxHeight) return undefined;

  const chars0 = Math.ceil(codePointLength(ctx.text) / lineCount);
  for (const charsPerLine of budgetCandidates(chars0)) {
    const lines = wrapLines(ctx.text, charsPerLine);
    if (lines.length !== lineCount) continue;
    if (maxLineWidth(lines, fontSize, ctx.metrics) <= ctx.boxWidth) {
      return { fontSize, charsPerLine, lines };
    }
  }
  return undefined;
}

/** Font-size tier: always restarts from the initial size for each line count. */
export function searchLineCount(
  ctx: SearchContext,
  lineCount: number,
  fontSizes: readonly number[],
): FitCandidate | undefined {
  for (const fontSize of fontSizes) {
    const candidate = searchFontSize(ctx, lineCount, fontSize);
    if (candidate) return candidate;
  }
  return undefined;
}

/** Fold any lines past `maxLines` into the last kept line. */
export function foldLines(lines: string[], maxLines: number): string[] {
  if (lines.length <= maxLines) return lines;
  return [...lines.slice(0, maxLines - 1), lines.slice(maxLines - 1).join(' ')];
}

export function fallbackLayout(text: string, minFontSize: number): FitCandidate {
  const charsPerLine = Math.max(1, Math.ceil(codePointLength(text) / MAX_LINES));
  return {
    fontSize: minFontSize,
    charsPerLine,
    lines: foldLines(wrapLines(text, charsPerLine), MAX_LINES),
  };
}

// ─── Entry Point ──────────────────────────────────────────────────────

/**
 * Find a font size and wrap for `request.text` inside the box.
 *
 * Fewer lines win over larger fonts: line count 1 is searched from the
 * initial font size down before line count 2 is tried. When nothing fits the
 * result is the minimum font size with `fitGuaranteed: false`.
 *
 * @throws InvalidFitRequestError when the request fails validation
 */
export function fitText(request: FitRequest, fonts: FontSet): FitResult {
  const parsed = parseFitRequest(request);
  const glyphClass = classifyGlyphs(parsed.text);
  const ctx: SearchContext = {
    text: parsed.text,
    boxWidth: parsed.boxWidth,
    boxHeight: parsed.boxHeight,
    metrics: selectMetrics(glyphClass, fonts),
  };
  const fontSizes = fontSizeLadder(parsed.initialFontSize, parsed.minFontSize, parsed.fontSizeStep);

  for (let lineCount = 1; lineCount <= MAX_LINES; lineCount++) {
    const candidate = searchLineCount(ctx, lineCount, fontSizes);
    if (candidate) {
      log.debug(
        { lineCount, fontSize: candidate.fontSize, charsPerLine: candidate.charsPerLine, glyphClass },
        'Text fitted',
      );
      return { ...candidate, fitGuaranteed: true, glyphClass };
    }
  }

  const fallback = fallbackLayout(ctx.text, parsed.minFontSize);
  log.debug(
    { fontSize: fallback.fontSize, charsPerLine: fallback.charsPerLine, glyphClass },
    'No fit found, using minimum font size',
  );
  return { ...fallback, fitGuaranteed: false, glyphClass };
}
