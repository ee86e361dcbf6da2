import type { FontFace, FontSet } from '../glyph-metrics.js';

/** Monospace face: every code point advances `ratio × fontSize`. */
export class MonoFace implements FontFace {
  readonly calls: Array<{ text: string; fontSize: number }> = [];

  constructor(
    readonly name: string,
    private readonly ratio: number,
  ) {}

  advanceWidth(text: string, fontSize: number): number {
    this.calls.push({ text, fontSize });
    return Array.from(text).length * fontSize * this.ratio;
  }
}

export interface FakeFonts extends FontSet {
  primary: MonoFace;
  emoji?: MonoFace;
  usingFallback: boolean;
}

/** Primary face at half an em per character, emoji face at a full em. */
export function createFakeFonts(options: { withEmoji?: boolean; usingFallback?: boolean } = {}): FakeFonts {
  const primary = new MonoFace('primary', 0.5);
  const usingFallback = options.usingFallback ?? false;
  if (options.withEmoji === false) return { primary, usingFallback };
  return { primary, emoji: new MonoFace('emoji', 1), usingFallback };
}
