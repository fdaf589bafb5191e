// ============================================================================
// PRINT FEATURES
// ============================================================================
// Fold guides, standard fold layouts and panel borders.
// ============================================================================

import { FOLD_LINE_WIDTH_PT, PAGE_HEIGHT_IN, PAGE_WIDTH_IN } from '@/lib/coordinates';
import { DEFAULT_RENDER_CONFIG, type RenderConfig } from '@/lib/config';
import { colorFromHex, grayColor } from '@/lib/card/color';
import type { Border, FoldType, Panel } from '@/lib/card/types';
import { PathBuilder } from './pathBuilder';
import type { Box, DrawingSurface } from './types';

/**
 * Fold guide styling
 */
export const FOLD_LINE_STYLE = {
  gray: 0.7,
  width: FOLD_LINE_WIDTH_PT,
  dash: [3, 3],
} as const;

/**
 * Dash pattern per border style (empty = solid)
 */
export const BORDER_DASH_PATTERNS: Record<Border['style'], readonly number[]> = {
  solid: [],
  dashed: [6, 3],
  dotted: [1, 2],
  decorative: [8, 2, 2, 2],
};

export type PanelFrame = Pick<Panel, 'position' | 'x' | 'y' | 'width' | 'height' | 'rotation'>;

/**
 * Panel frames (inches) for a fold type on the flat page.
 *
 * half_fold     outside on the bottom half, inside on the top half
 * quarter_fold  outside on the top half turned 180°, inside below
 * tri_fold      three vertical panels
 */
export function foldPanelFrames(
  foldType: FoldType,
  page: { width: number; height: number } = { width: PAGE_WIDTH_IN, height: PAGE_HEIGHT_IN }
): PanelFrame[] {
  const halfW = page.width / 2;
  const halfH = page.height / 2;

  switch (foldType) {
    case 'half_fold':
      return [
        { position: 'front', x: halfW, y: 0, width: halfW, height: halfH, rotation: 0 },
        { position: 'back', x: 0, y: 0, width: halfW, height: halfH, rotation: 0 },
        { position: 'inside_left', x: 0, y: halfH, width: halfW, height: halfH, rotation: 0 },
        { position: 'inside_right', x: halfW, y: halfH, width: halfW, height: halfH, rotation: 0 },
      ];
    case 'quarter_fold':
      return [
        { position: 'front', x: 0, y: halfH, width: halfW, height: halfH, rotation: 180 },
        { position: 'back', x: halfW, y: halfH, width: halfW, height: halfH, rotation: 180 },
        { position: 'inside_left', x: 0, y: 0, width: halfW, height: halfH, rotation: 0 },
        { position: 'inside_right', x: halfW, y: 0, width: halfW, height: halfH, rotation: 0 },
      ];
    case 'tri_fold': {
      const third = page.width / 3;
      return [
        { position: 'left', x: 0, y: 0, width: third, height: page.height, rotation: 0 },
        { position: 'center', x: third, y: 0, width: third, height: page.height, rotation: 0 },
        { position: 'right', x: 2 * third, y: 0, width: third, height: page.height, rotation: 0 },
      ];
    }
    default: {
      const unknown: never = foldType;
      throw new Error(`Unknown fold type: ${String(unknown)}`);
    }
  }
}

/**
 * Fold line segments in points: one horizontal middle line for half folds,
 * both middles for quarter folds, two verticals at the thirds for tri folds
 */
export function foldLineSegments(
  foldType: FoldType,
  pageWidth: number,
  pageHeight: number
): Array<{ x1: number; y1: number; x2: number; y2: number }> {
  const midX = pageWidth / 2;
  const midY = pageHeight / 2;
  const thirdX = pageWidth / 3;

  switch (foldType) {
    case 'half_fold':
      return [{ x1: 0, y1: midY, x2: pageWidth, y2: midY }];
    case 'quarter_fold':
      return [
        { x1: 0, y1: midY, x2: pageWidth, y2: midY },
        { x1: midX, y1: 0, x2: midX, y2: pageHeight },
      ];
    case 'tri_fold':
      return [
        { x1: thirdX, y1: 0, x2: thirdX, y2: pageHeight },
        { x1: 2 * thirdX, y1: 0, x2: 2 * thirdX, y2: pageHeight },
      ];
    default: {
      const unknown: never = foldType;
      throw new Error(`Unknown fold type: ${String(unknown)}`);
    }
  }
}

/**
 * Draw light gray dashed fold guides across the page
 */
export function drawFoldLines(
  surface: DrawingSurface,
  foldType: FoldType,
  config: Pick<RenderConfig, 'pointsPerInch' | 'pageWidthIn' | 'pageHeightIn'> = DEFAULT_RENDER_CONFIG
): void {
  const pageWidth = config.pageWidthIn * config.pointsPerInch;
  const pageHeight = config.pageHeightIn * config.pointsPerInch;
  const builder = new PathBuilder();
  for (const line of foldLineSegments(foldType, pageWidth, pageHeight)) {
    builder.moveTo(line.x1, line.y1).lineTo(line.x2, line.y2);
  }

  surface.pushState();
  try {
    surface.setStrokeColor(grayColor(FOLD_LINE_STYLE.gray));
    surface.setLineWidth(FOLD_LINE_STYLE.width);
    surface.setDash(FOLD_LINE_STYLE.dash);
    surface.drawPath(builder.build(), { fill: false, stroke: true });
  } finally {
    surface.popState();
  }
}

/**
 * Stroke a border around a box (points), rounded when cornerRadius > 0
 */
export function drawBorder(surface: DrawingSurface, box: Box, border: Border): void {
  const builder = new PathBuilder();
  if (border.cornerRadius > 0) {
    builder.roundedRect(box.x, box.y, box.width, box.height, border.cornerRadius);
  } else {
    builder.rect(box.x, box.y, box.width, box.height);
  }

  surface.pushState();
  try {
    surface.setStrokeColor(colorFromHex(border.color));
    surface.setLineWidth(border.width);
    const dash = BORDER_DASH_PATTERNS[border.style];
    if (dash.length > 0) surface.setDash(dash);
    surface.drawPath(builder.build(), { fill: false, stroke: true });
  } finally {
    surface.popState();
  }
}
