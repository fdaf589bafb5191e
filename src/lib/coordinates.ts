/**
 * SINGLE SOURCE OF TRUTH for all unit conversions
 * Used by: Shape Renderer, Clipping Renderer, Card Renderer, render config
 *
 * All scene positions are stored in INCHES, relative to their panel
 * The output surface works in POINTS (72 per inch), origin bottom-left
 */

// Physical constants
const POINTS_PER_INCH = 72;

// Page (US Letter)
export const PAGE_WIDTH_IN = 8.5;
export const PAGE_HEIGHT_IN = 11;
export const SAFE_MARGIN_IN = 0.25;

// Print lines
export const FOLD_LINE_WIDTH_PT = 0.5;

// Image resolution thresholds
export const MIN_DPI = 150;
export const RECOMMENDED_DPI = 300;

export const PT_PER_IN = POINTS_PER_INCH;

/**
 * Size of the folded card in inches
 */
export const FOLD_DIMENSIONS = {
  half_fold: { width: PAGE_HEIGHT_IN / 2, height: PAGE_WIDTH_IN },
  quarter_fold: { width: PAGE_WIDTH_IN / 2, height: PAGE_HEIGHT_IN / 2 },
  tri_fold: { width: PAGE_WIDTH_IN / 3, height: PAGE_HEIGHT_IN },
} as const;

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Unit conversion utilities
 */
export const Coordinates = {
  PT_PER_IN,

  // ==========================================
  // LENGTH CONVERSIONS (in ↔ pt)
  // ==========================================

  /**
   * Convert inches to points
   * @param pointsPerInch - Override for non-standard surfaces
   */
  inToPt: (inches: number, pointsPerInch: number = PT_PER_IN): number => {
    return inches * pointsPerInch;
  },

  /**
   * Convert points to inches
   */
  ptToIn: (pt: number, pointsPerInch: number = PT_PER_IN): number => {
    return pt / pointsPerInch;
  },

  // ==========================================
  // PANEL → PAGE
  // ==========================================

  /**
   * Panel-relative inches to absolute page points
   * @param offset - Panel origin on the page, in points
   */
  panelToPage: (
    point: { x: number; y: number },
    offset: { x: number; y: number },
    pointsPerInch: number = PT_PER_IN
  ): { x: number; y: number } => {
    return {
      x: offset.x + point.x * pointsPerInch,
      y: offset.y + point.y * pointsPerInch,
    };
  },

  // ==========================================
  // BOUNDS CHECKS
  // ==========================================

  /**
   * True when the rect lies inside the page's safe area
   */
  validateWithinPage: (rect: Rect, margin: number = SAFE_MARGIN_IN): boolean => {
    return (
      rect.x >= margin &&
      rect.y >= margin &&
      rect.x + rect.width <= PAGE_WIDTH_IN - margin &&
      rect.y + rect.height <= PAGE_HEIGHT_IN - margin
    );
  },

  /**
   * True when the rect (panel-relative) fits inside a panel of the given size
   */
  validateWithinPanel: (rect: Rect, panel: { width: number; height: number }): boolean => {
    return (
      rect.x >= 0 &&
      rect.y >= 0 &&
      rect.x + rect.width <= panel.width &&
      rect.y + rect.height <= panel.height
    );
  },

  /**
   * Effective print resolution of an image drawn at the given size
   */
  effectiveDpi: (pixelWidth: number, drawnWidthIn: number): number => {
    return drawnWidthIn > 0 ? pixelWidth / drawnWidthIn : 0;
  },
};

export default Coordinates;
