// ============================================================================
// PDF GENERATION - Font Utilities
// ============================================================================
// Maps scene font families and styles onto the 14 standard PDF fonts and
// keeps one embedded PDFFont per face for a document.
// ============================================================================

import { StandardFonts, type PDFDocument, type PDFFont } from 'pdf-lib';
import type { FontStyle } from '@/lib/card/types';
import { createLogger } from '@/lib/logger';

const log = createLogger('Fonts');

type StandardFamily = 'helvetica' | 'times' | 'courier';

/**
 * Family names that map onto a standard family
 */
const FONT_FALLBACKS: Partial<Record<string, StandardFamily>> = {
  helvetica: 'helvetica',
  arial: 'helvetica',
  'sans-serif': 'helvetica',
  verdana: 'helvetica',
  tahoma: 'helvetica',
  times: 'times',
  'times-roman': 'times',
  'times new roman': 'times',
  georgia: 'times',
  serif: 'times',
  courier: 'courier',
  'courier new': 'courier',
  monospace: 'courier',
};

const STANDARD_FACES: Record<StandardFamily, Record<FontStyle, StandardFonts>> = {
  helvetica: {
    normal: StandardFonts.Helvetica,
    bold: StandardFonts.HelveticaBold,
    italic: StandardFonts.HelveticaOblique,
    bold_italic: StandardFonts.HelveticaBoldOblique,
  },
  times: {
    normal: StandardFonts.TimesRoman,
    bold: StandardFonts.TimesRomanBold,
    italic: StandardFonts.TimesRomanItalic,
    bold_italic: StandardFonts.TimesRomanBoldItalic,
  },
  courier: {
    normal: StandardFonts.Courier,
    bold: StandardFonts.CourierBold,
    italic: StandardFonts.CourierOblique,
    bold_italic: StandardFonts.CourierBoldOblique,
  },
};

/**
 * Reduce a CSS-like family list to a standard family. Unknown families fall
 * back to Helvetica.
 */
export function normalizeFontFamily(fontFamily: string | undefined): StandardFamily {
  if (!fontFamily) return 'helvetica';
  const cleaned = fontFamily.split(',')[0].trim().replace(/["']/g, '').toLowerCase();
  const family = FONT_FALLBACKS[cleaned];
  if (!family) {
    log.debug(`No standard face for '${fontFamily}', using Helvetica`);
    return 'helvetica';
  }
  return family;
}

export function resolveStandardFont(fontFamily: string, style: FontStyle): StandardFonts {
  return STANDARD_FACES[normalizeFontFamily(fontFamily)][style];
}

/**
 * Embedded standard fonts for one PDF document
 */
export class FontCollection {
  private readonly fonts = new Map<StandardFonts, PDFFont>();

  constructor(private readonly pdfDoc: PDFDocument) {}

  get(fontFamily: string, style: FontStyle): PDFFont {
    const face = resolveStandardFont(fontFamily, style);
    const cached = this.fonts.get(face);
    if (cached) return cached;

    const font = this.pdfDoc.embedStandardFont(face);
    this.fonts.set(face, font);
    return font;
  }

  get size(): number {
    return this.fonts.size;
  }
}
