// Text measurement for fitting. Widths come from the drawing surface's font
// metrics through a WidthMeasurer bound to one font.

/**
 * Width in points of `text` at `fontSize`
 */
export type WidthMeasurer = (text: string, fontSize: number) => number;

export interface TextMeasurement {
  width: number;
  height: number;
  lineCount: number;
  fitsWithinBounds: boolean;
}

export const DEFAULT_LINE_HEIGHT_FACTOR = 1.2;

export function calculateLineHeight(fontSize: number, factor: number = DEFAULT_LINE_HEIGHT_FACTOR): number {
  return fontSize * factor;
}

/**
 * Measure a single line or a block of pre-wrapped lines.
 * Fits when the widest line is within `maxWidth` and, if given, the block
 * height is within `maxHeight`.
 */
export function measureText(
  measure: WidthMeasurer,
  text: string | readonly string[],
  fontSize: number,
  maxWidth: number,
  maxHeight?: number,
  lineHeightFactor: number = DEFAULT_LINE_HEIGHT_FACTOR
): TextMeasurement {
  const lines = typeof text === 'string' ? [text] : text;
  const width = lines.reduce((widest, line) => Math.max(widest, measure(line, fontSize)), 0);
  const height = lines.length * calculateLineHeight(fontSize, lineHeightFactor);
  const fitsWidth = width <= maxWidth;
  const fitsHeight = maxHeight === undefined || height <= maxHeight;

  return {
    width,
    height,
    lineCount: lines.length,
    fitsWithinBounds: fitsWidth && fitsHeight,
  };
}

/**
 * Largest integer size in [minSize, initialSize] at which `text` fits on one
 * line (binary search). Returns minSize when nothing fits.
 */
export function shrinkToFit(
  measure: WidthMeasurer,
  text: string,
  initialSize: number,
  maxWidth: number,
  minSize: number = 8
): number {
  let low = Math.min(minSize, initialSize);
  let high = initialSize;
  let bestFit = low;

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    const measurement = measureText(measure, text, mid, maxWidth);

    if (measurement.fitsWithinBounds) {
      bestFit = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return bestFit;
}
