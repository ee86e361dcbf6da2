import type { GlyphClass } from './types.js';

const SYMBOL_OTHER = /^\p{So}$/u;
const EMOJI_BLOCK_START = 0x1f000;
const EMOJI_BLOCK_END = 0x1f9ff;

/** True for "Symbol, Other" code points and anything in U+1F000–U+1F9FF. */
export function isEmoji(codePoint: number): boolean {
  if (codePoint >= EMOJI_BLOCK_START && codePoint <= EMOJI_BLOCK_END) return true;
  return SYMBOL_OTHER.test(String.fromCodePoint(codePoint));
}

export function isEmojiChar(char: string): boolean {
  const codePoint = char.codePointAt(0);
  return codePoint !== undefined && isEmoji(codePoint);
}

export function containsEmoji(text: string): boolean {
  for (const char of text) {
    if (isEmojiChar(char)) return true;
  }
  return false;
}

/**
 * Glyph class for a whole string. One emoji anywhere switches every line of
 * the fit to emoji-aware measurement.
 */
export function classifyGlyphs(text: string): GlyphClass {
  return containsEmoji(text) ? 'emoji-aware' : 'plain';
}
