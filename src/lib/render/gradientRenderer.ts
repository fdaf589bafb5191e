// =============================================================================
// GRADIENT RENDERER
// =============================================================================
// Paints a linear or radial gradient over a box. Uses the surface's native
// gradient when it has one; otherwise approximates it with solid bands
// (linear) or concentric discs (radial). Callers that fill a shape clip to
// the shape outline first.
// =============================================================================

import { DEFAULT_RENDER_CONFIG, type RenderConfig } from '@/lib/config';
import { colorFromHex } from '@/lib/card/color';
import type { LinearGradientFill, RadialGradientFill } from '@/lib/card/types';
import { RENDERED, type RenderOutcome } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { PathBuilder, rectPath } from './pathBuilder';
import {
  boxCenter,
  boxDiagonal,
  colorAtPosition,
  linearGradientGeometry,
  radialGradientGeometry,
  toGradientStops,
} from './gradientUtils';
import type { Box, DrawingSurface, GradientStop } from './types';

const log = createLogger('GradientRenderer');

/** Overlap between synthesized bands, points */
const BAND_OVERLAP = 0.5;

export class GradientRenderer {
  constructor(private readonly config: RenderConfig = DEFAULT_RENDER_CONFIG) {}

  fillLinear(surface: DrawingSurface, fill: LinearGradientFill, box: Box): RenderOutcome {
    try {
      const stops = toGradientStops(fill.stops);
      surface.pushState();
      try {
        surface.clipTo(rectPath(box));
        if (surface.linearGradient) {
          const { start, end } = linearGradientGeometry(fill, box);
          surface.linearGradient(start, end, stops);
        } else {
          this.synthesizeLinear(surface, fill.angle, stops, box);
        }
      } finally {
        surface.popState();
      }
      return RENDERED;
    } catch (error) {
      this.fallback(surface, fill.stops[0].color, box, error);
      return RENDERED;
    }
  }

  fillRadial(surface: DrawingSurface, fill: RadialGradientFill, box: Box): RenderOutcome {
    try {
      const stops = toGradientStops(fill.stops);
      const { center, radius } = radialGradientGeometry(fill, box);
      surface.pushState();
      try {
        surface.clipTo(rectPath(box));
        if (surface.radialGradient) {
          surface.radialGradient(center, radius, stops);
        } else {
          this.synthesizeRadial(surface, center, radius, stops, box);
        }
      } finally {
        surface.popState();
      }
      return RENDERED;
    } catch (error) {
      this.fallback(surface, fill.stops[0].color, box, error);
      return RENDERED;
    }
  }

  /**
   * Bands perpendicular to the gradient axis, drawn in a frame rotated so
   * the axis runs along +x
   */
  private synthesizeLinear(surface: DrawingSurface, angle: number, stops: GradientStop[], box: Box): void {
    const steps = this.config.gradientSteps;
    const center = boxCenter(box);
    const diagonal = boxDiagonal(box);
    const bandWidth = diagonal / steps;
    const startX = center.x - diagonal / 2;
    const bottom = center.y - diagonal / 2;

    surface.rotateAbout(center.x, center.y, angle);
    for (let i = 0; i < steps; i++) {
      const t = (i + 0.5) / steps;
      surface.setFillColor(colorAtPosition(stops, t));
      const overlap = i < steps - 1 ? BAND_OVERLAP : 0;
      const band = new PathBuilder().rect(startX + i * bandWidth, bottom, bandWidth + overlap, diagonal).build();
      surface.drawPath(band, { fill: true, stroke: false });
    }
  }

  /**
   * Last-stop backdrop, then discs from the outermost ring inward
   */
  private synthesizeRadial(
    surface: DrawingSurface,
    center: { x: number; y: number },
    radius: number,
    stops: GradientStop[],
    box: Box
  ): void {
    const steps = this.config.gradientSteps;
    surface.setFillColor(stops[stops.length - 1].color);
    surface.drawPath(rectPath(box), { fill: true, stroke: false });

    for (let i = steps; i >= 1; i--) {
      const t = (i - 0.5) / steps;
      surface.setFillColor(colorAtPosition(stops, t));
      const disc = new PathBuilder().circle(center.x, center.y, (radius * i) / steps).build();
      surface.drawPath(disc, { fill: true, stroke: false });
    }
  }

  private fallback(surface: DrawingSurface, hex: string, box: Box, error: unknown): void {
    log.warn('Gradient failed, using solid fill:', error);
    surface.pushState();
    try {
      surface.setFillColor(colorFromHex(hex));
      surface.drawPath(rectPath(box), { fill: true, stroke: false });
    } finally {
      surface.popState();
    }
  }
}
