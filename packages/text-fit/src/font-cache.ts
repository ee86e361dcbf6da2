import PDFDocument from 'pdfkit';
import { createLogger } from '@headline/config';
import { FontUnavailableError } from './errors.js';
import type { FontFace, FontSet } from './glyph-metrics.js';

const log = createLogger('font-cache');

export const DEFAULT_FALLBACK_FONT = 'Helvetica';

export interface FontCacheOptions {
  /** TrueType/OpenType file for ordinary glyphs. */
  primaryFontPath?: string;
  /** Color/emoji font used for symbol runs. */
  emojiFontPath?: string;
  /** pdfkit standard font used when the primary file cannot be loaded. */
  fallbackFont?: string;
}

// ─── pdfkit-backed Faces ──────────────────────────────────────────────

/** Latin faces pdfkit ships as AFM metrics; they encode WinAnsi only. */
const STANDARD_FONTS = new Set([
  'Courier',
  'Courier-Bold',
  'Courier-Oblique',
  'Courier-BoldOblique',
  'Helvetica',
  'Helvetica-Bold',
  'Helvetica-Oblique',
  'Helvetica-BoldOblique',
  'Times-Roman',
  'Times-Bold',
  'Times-Italic',
  'Times-BoldItalic',
]);

// WinAnsi code points outside Latin-1 (0x80–0x9F block)
const WIN_ANSI_EXTRAS = new Set(Array.from('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ', (c) => c.codePointAt(0) ?? 0));

export function isWinAnsi(codePoint: number): boolean {
  return (
    (codePoint >= 0x20 && codePoint <= 0x7e) ||
    (codePoint >= 0xa0 && codePoint <= 0xff) ||
    WIN_ANSI_EXTRAS.has(codePoint)
  );
}

/** Stand-in advance, in em, for characters a standard font has no glyph for. */
export const MISSING_GLYPH_EM = 1;

class PdfKitFontFace implements FontFace {
  constructor(
    protected readonly doc: PDFKit.PDFDocument,
    readonly name: string,
  ) {}

  advanceWidth(text: string, fontSize: number): number {
    if (!text) return 0;
    return this.doc.font(this.name).fontSize(fontSize).widthOfString(text);
  }
}

/** pdfkit measures characters a standard font cannot encode as zero; those count one em each. */
class StandardFontFace extends PdfKitFontFace {
  advanceWidth(text: string, fontSize: number): number {
    let encodable = '';
    let missing = 0;
    for (const char of text) {
      if (isWinAnsi(char.codePointAt(0) ?? 0)) encodable += char;
      else missing++;
    }
    return super.advanceWidth(encodable, fontSize) + missing * fontSize * MISSING_GLYPH_EM;
  }
}

function loadFace(doc: PDFKit.PDFDocument, name: string, source: string): FontFace {
  doc.registerFont(name, source);
  // Selecting the font parses it now, so failures surface at startup
  doc.font(name);
  return STANDARD_FONTS.has(source) ? new StandardFontFace(doc, name) : new PdfKitFontFace(doc, name);
}

// ─── Font Cache ───────────────────────────────────────────────────────

/**
 * Loaded fonts for measurement. Opened once by the owner at startup and
 * passed to whatever needs metrics; never mutated afterwards.
 */
export class FontCache implements FontSet {
  private constructor(
    readonly primary: FontFace,
    readonly emoji: FontFace | undefined,
    readonly usingFallback: boolean,
  ) {
    Object.freeze(this);
  }

  static open(options: FontCacheOptions = {}): FontCache {
    const fallbackFont = options.fallbackFont ?? DEFAULT_FALLBACK_FONT;

    let doc: PDFKit.PDFDocument;
    try {
      doc = new PDFDocument({ autoFirstPage: false });
    } catch (err) {
      throw new FontUnavailableError('Unable to initialise font measurement', fallbackFont, { cause: err });
    }

    let primary: FontFace | undefined;
    if (options.primaryFontPath) {
      try {
        primary = loadFace(doc, 'primary', options.primaryFontPath);
      } catch (err) {
        log.warn({ path: options.primaryFontPath, fallbackFont, err }, 'Primary font unavailable, using built-in font');
      }
    }

    const usingFallback = primary === undefined;
    if (!primary) {
      try {
        primary = loadFace(doc, 'fallback', fallbackFont);
      } catch (err) {
        throw new FontUnavailableError(`No usable font: ${fallbackFont} could not be loaded`, fallbackFont, { cause: err });
      }
    }

    let emoji: FontFace | undefined;
    if (options.emojiFontPath) {
      try {
        emoji = loadFace(doc, 'emoji', options.emojiFontPath);
      } catch (err) {
        log.warn({ path: options.emojiFontPath, err }, 'Emoji font unavailable, emoji widths will be approximated');
      }
    } else {
      log.warn('No emoji font configured, emoji widths will be approximated');
    }

    log.info(
      { primary: primary.name, usingFallback, emoji: emoji !== undefined },
      'Fonts loaded',
    );
    return new FontCache(primary, emoji, usingFallback);
  }
}
