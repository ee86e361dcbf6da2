import { isEmojiChar } from './emoji-classifier.js';
import { EMOJI_SCALE, type GlyphClass } from './types.js';

// ─── Font Faces ───────────────────────────────────────────────────────

/** A loaded font that can report the advance width of a string. */
export interface FontFace {
  readonly name: string;
  advanceWidth(text: string, fontSize: number): number;
}

export interface FontSet {
  readonly primary: FontFace;
  /** Color/emoji font; absent when it could not be loaded. */
  readonly emoji?: FontFace;
}

// ─── Metrics Providers ────────────────────────────────────────────────

export interface GlyphMetrics {
  readonly glyphClass: GlyphClass;
  measure(text: string, fontSize: number): number;
}

export interface GlyphBox {
  width: number;
  height: number;
}

export class PlainMetrics implements GlyphMetrics {
  readonly glyphClass = 'plain';

  constructor(private readonly face: FontFace) {}

  measure(text: string, fontSize: number): number {
    return this.face.advanceWidth(text, fontSize);
  }
}

export interface GlyphRun {
  text: string;
  emoji: boolean;
}

/** Split a string into maximal runs of plain and emoji characters. */
export function splitGlyphRuns(text: string): GlyphRun[] {
  const runs: GlyphRun[] = [];
  for (const char of text) {
    const emoji = isEmojiChar(char);
    const last = runs[runs.length - 1];
    if (last && last.emoji === emoji) {
      last.text += char;
    } else {
      runs.push({ text: char, emoji });
    }
  }
  return runs;
}

/**
 * Lays plain glyphs out with the primary font and emoji glyphs with the emoji
 * font. Without an emoji font every run goes through the primary font, which
 * may undercount emoji widths.
 */
export class CompositeMetrics implements GlyphMetrics {
  readonly glyphClass = 'emoji-aware';

  constructor(
    private readonly primary: FontFace,
    private readonly emoji?: FontFace,
  ) {}

  get degraded(): boolean {
    return this.emoji === undefined;
  }

  measure(text: string, fontSize: number): number {
    const emojiFace = this.emoji;
    if (!emojiFace) return this.primary.advanceWidth(text, fontSize);

    let width = 0;
    for (const run of splitGlyphRuns(text)) {
      const face = run.emoji ? emojiFace : this.primary;
      width += face.advanceWidth(run.text, fontSize);
    }
    return width;
  }

  /** Width plus advance height; emoji lines are drawn magnified. */
  measureBox(text: string, fontSize: number): GlyphBox {
    const hasEmoji = splitGlyphRuns(text).some((run) => run.emoji);
    return {
      width: this.measure(text, fontSize),
      height: hasEmoji ? fontSize * EMOJI_SCALE : fontSize,
    };
  }
}

export function selectMetrics(glyphClass: GlyphClass, fonts: FontSet): GlyphMetrics {
  if (glyphClass === 'emoji-aware') {
    return new CompositeMetrics(fonts.primary, fonts.emoji);
  }
  return new PlainMetrics(fonts.primary);
}
