// =============================================================================
// PATTERN RENDERER
// =============================================================================
// Fills a box with a repeating tile. The tile is built once as a list of
// marks in tile-local points, then stamped across the box:
//
//   stripes       N equal vertical bands, one per color
//   dots          optional background (2nd color), centered dot (1st color)
//   grid          bottom and left tile edges stroked in the 1st color
//   checkerboard  1st color top-left/bottom-right, 2nd (or white) elsewhere
// =============================================================================

import { DEFAULT_RENDER_CONFIG, type RenderConfig } from '@/lib/config';
import { colorFromHex, WHITE, type Color } from '@/lib/card/color';
import type { PatternFill, PatternType } from '@/lib/card/types';
import { RENDERED, type RenderOutcome } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { boxCenter, boxDiagonal } from './gradientUtils';
import { PathBuilder, rectPath } from './pathBuilder';
import type { Box, DrawingSurface, SurfacePath } from './types';

const log = createLogger('PatternRenderer');

export interface TileMark {
  path: SurfacePath;
  color: Color;
  /** Stroke width when the mark is stroked instead of filled */
  strokeWidth?: number;
}

export interface PatternTile {
  size: number;
  marks: TileMark[];
}

/**
 * Tile edge in points: spacing (inches) × points per inch × scale, never
 * below the configured minimum
 */
export function tileSize(fill: Pick<PatternFill, 'spacing' | 'scale'>, config: RenderConfig = DEFAULT_RENDER_CONFIG): number {
  return Math.max(fill.spacing * config.pointsPerInch * fill.scale, config.minTileSizePt);
}

export function buildPatternTile(patternType: PatternType, colors: readonly Color[], size: number): PatternTile {
  const primary = colors[0];
  if (!primary) {
    throw new Error('Pattern needs at least one color');
  }
  const marks: TileMark[] = [];

  switch (patternType) {
    case 'stripes': {
      const bandWidth = size / colors.length;
      colors.forEach((color, i) => {
        marks.push({ path: new PathBuilder().rect(i * bandWidth, 0, bandWidth, size).build(), color });
      });
      break;
    }
    case 'dots': {
      const background = colors[1];
      if (background) {
        marks.push({ path: new PathBuilder().rect(0, 0, size, size).build(), color: background });
      }
      marks.push({ path: new PathBuilder().circle(size / 2, size / 2, size * 0.3).build(), color: primary });
      break;
    }
    case 'grid': {
      const path = new PathBuilder().moveTo(0, 0).lineTo(size, 0).moveTo(0, 0).lineTo(0, size).build();
      marks.push({ path, color: primary, strokeWidth: Math.max(1, size * 0.05) });
      break;
    }
    case 'checkerboard': {
      const secondary = colors[1] ?? WHITE;
      const half = size / 2;
      marks.push({ path: new PathBuilder().rect(0, half, half, half).rect(half, 0, half, half).build(), color: primary });
      marks.push({ path: new PathBuilder().rect(half, half, half, half).rect(0, 0, half, half).build(), color: secondary });
      break;
    }
    default: {
      const unknown: never = patternType;
      throw new Error(`Unknown pattern type: ${String(unknown)}`);
    }
  }

  return { size, marks };
}

export class PatternRenderer {
  constructor(private readonly config: RenderConfig = DEFAULT_RENDER_CONFIG) {}

  fill(surface: DrawingSurface, fill: PatternFill, box: Box): RenderOutcome {
    try {
      const colors = fill.colors.map(colorFromHex);
      const tile = buildPatternTile(fill.patternType, colors, tileSize(fill, this.config));
      surface.pushState();
      try {
        surface.clipTo(rectPath(box));
        if (fill.rotation !== 0) {
          const center = boxCenter(box);
          surface.rotateAbout(center.x, center.y, fill.rotation);
        }
        this.stamp(surface, tile, box, fill.rotation !== 0);
      } finally {
        surface.popState();
      }
      return RENDERED;
    } catch (error) {
      log.warn('Pattern failed, using solid fill:', error);
      surface.pushState();
      try {
        surface.setFillColor(colorFromHex(fill.colors[0]));
        surface.drawPath(rectPath(box), { fill: true, stroke: false });
      } finally {
        surface.popState();
      }
      return RENDERED;
    }
  }

  /**
   * Repeat the tile from the box origin. A rotated grid also covers the
   * corners the rotation swings into the box.
   */
  private stamp(surface: DrawingSurface, tile: PatternTile, box: Box, rotated: boolean): void {
    const size = tile.size;
    const cols = Math.ceil(box.width / size) + 1;
    const rows = Math.ceil(box.height / size) + 1;
    const diagonal = boxDiagonal(box);
    const padX = rotated ? Math.ceil((diagonal - box.width) / 2 / size) : 0;
    const padY = rotated ? Math.ceil((diagonal - box.height) / 2 / size) : 0;

    for (let row = -padY; row < rows + padY; row++) {
      for (let col = -padX; col < cols + padX; col++) {
        surface.pushState();
        try {
          surface.translate(box.x + col * size, box.y + row * size);
          for (const mark of tile.marks) {
            if (mark.strokeWidth !== undefined) {
              surface.setStrokeColor(mark.color);
              surface.setLineWidth(mark.strokeWidth);
              surface.drawPath(mark.path, { fill: false, stroke: true });
            } else {
              surface.setFillColor(mark.color);
              surface.drawPath(mark.path, { fill: true, stroke: false });
            }
          }
        } finally {
          surface.popState();
        }
      }
    }
  }
}
