import { beforeEach, describe, expect, it, vi } from 'vitest';

const logMock = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('@headline/config', () => ({
  createLogger: () => logMock,
}));

import { FontCache, isWinAnsi } from '../font-cache.js';
import { FontUnavailableError } from '../errors.js';
import { fitText } from '../fit-search.js';

const MISSING_FONT = '/nonexistent/headline/font.ttf';

describe('FontCache', () => {
  beforeEach(() => {
    logMock.warn.mockClear();
  });

  it('falls back to the built-in font when the primary file is missing', () => {
    const fonts = FontCache.open({ primaryFontPath: MISSING_FONT });

    expect(fonts.usingFallback).toBe(true);
    expect(fonts.primary.name).toBe('fallback');
    // Helvetica "A" advances 667/1000 em
    expect(fonts.primary.advanceWidth('A', 10)).toBeCloseTo(6.67, 5);
    expect(logMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ path: MISSING_FONT, fallbackFont: 'Helvetica' }),
      'Primary font unavailable, using built-in font',
    );
  });

  it('uses the configured built-in fallback font', () => {
    const fonts = FontCache.open({ fallbackFont: 'Courier' });
    expect(fonts.primary.advanceWidth('A', 10)).toBeCloseTo(6, 5);
  });

  it('leaves the emoji face empty when its file cannot be loaded', () => {
    const fonts = FontCache.open({ emojiFontPath: '/nonexistent/headline/emoji.ttf' });

    expect(fonts.emoji).toBeUndefined();
    expect(logMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ path: '/nonexistent/headline/emoji.ttf' }),
      'Emoji font unavailable, emoji widths will be approximated',
    );
  });

  it('raises FontUnavailableError when no font at all can be loaded', () => {
    expect(() =>
      FontCache.open({ primaryFontPath: MISSING_FONT, fallbackFont: '/nonexistent/headline/fallback.ttf' }),
    ).toThrow(FontUnavailableError);
  });

  it('measures empty strings as zero width', () => {
    expect(FontCache.open().primary.advanceWidth('', 40)).toBe(0);
  });

  it('measures characters the built-in font cannot encode as one em each', () => {
    const fonts = FontCache.open();

    expect(fonts.primary.advanceWidth('喜报', 40)).toBe(80);
    expect(fonts.primary.advanceWidth('A喜', 10)).toBeCloseTo(16.67, 5);
  });

  it('does not fit long CJK text into a small box with the built-in font', () => {
    const result = fitText(
      { text: '喜'.repeat(200), boxWidth: 100, boxHeight: 100, initialFontSize: 60, minFontSize: 20 },
      FontCache.open(),
    );

    expect(result.fitGuaranteed).toBe(false);
    expect(result.fontSize).toBe(20);
    expect(result.lines.map((line) => Array.from(line).length)).toEqual([67, 67, 66]);
  });

  it('is frozen once opened', () => {
    expect(Object.isFrozen(FontCache.open())).toBe(true);
  });

  it('drives a fit with real glyph metrics', () => {
    const fonts = FontCache.open({ primaryFontPath: MISSING_FONT });
    // 10 × 0.667 em: 266.8 at 40, 233.45 at 35, 200.1 at 30, 166.75 at 25
    const result = fitText(
      { text: 'AAAAAAAAAA', boxWidth: 200, boxHeight: 100, initialFontSize: 40, minFontSize: 10 },
      fonts,
    );

    expect(result.fontSize).toBe(25);
    expect(result.lines).toEqual(['AAAAAAAAAA']);
    expect(result.fitGuaranteed).toBe(true);
  });
});

describe('isWinAnsi', () => {
  it('accepts ASCII, Latin-1 and the Windows-1252 extras', () => {
    expect(isWinAnsi(0x41)).toBe(true);
    expect(isWinAnsi(0xe9)).toBe(true);
    expect(isWinAnsi(0x20ac)).toBe(true);
  });

  it('rejects CJK and control characters', () => {
    expect(isWinAnsi(0x559c)).toBe(false);
    expect(isWinAnsi(0x0a)).toBe(false);
  });
});
