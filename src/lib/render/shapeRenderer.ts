// =============================================================================
// SHAPE RENDERER
// =============================================================================
// Draws one primitive shape onto a surface:
//   1. inches → points, plus the panel's absolute offset
//   2. save state, apply opacity and rotation about the shape's pivot
//   3. fill (solid, gradient or pattern), then stroke
//   4. restore state
// Pivots: box center for rectangle/circle/star/svg_path, vertex centroid for
// triangles, midpoint for lines.
// =============================================================================

import { DEFAULT_RENDER_CONFIG, type RenderConfig } from '@/lib/config';
import { Coordinates } from '@/lib/coordinates';
import { BLACK, colorFromHex } from '@/lib/card/color';
import type { FillStyle, Point, PrimitiveShape, Shape } from '@/lib/card/types';
import { failed, RENDERED, RenderError, toRenderError, type RenderOutcome } from '@/lib/errors';
import { pathDataToSegments } from '@/lib/path/pathGeometry';
import { GradientRenderer } from './gradientRenderer';
import { boxCenter } from './gradientUtils';
import { mapSegments, PathBuilder, segmentBounds, starVertices } from './pathBuilder';
import { PatternRenderer } from './patternRenderer';
import type { Box, DrawingSurface, SurfacePath } from './types';

export interface ShapeOutline {
  path: SurfacePath;
  pivot: Point;
  box: Box;
}

/**
 * The fill a shape paints with: `fill` first, then the legacy `fillColor`
 */
export function resolveFill(shape: Pick<PrimitiveShape, 'fill' | 'fillColor'>): FillStyle | undefined {
  if (shape.fill) return shape.fill;
  if (shape.fillColor) return { type: 'solid', color: shape.fillColor };
  return undefined;
}

export class ShapeRenderer {
  private readonly gradients: GradientRenderer;
  private readonly patterns: PatternRenderer;

  constructor(private readonly config: RenderConfig = DEFAULT_RENDER_CONFIG) {
    this.gradients = new GradientRenderer(config);
    this.patterns = new PatternRenderer(config);
  }

  /**
   * Draw `shape`, offset by the panel origin (points)
   */
  renderShape(surface: DrawingSurface, shape: Shape, panelOffset: Point): RenderOutcome {
    if (shape.type === 'decorative_element') {
      return failed(
        new RenderError(
          'unsupported_shape',
          `Decorative element '${shape.name}' must be expanded before rendering`,
          shape.id
        )
      );
    }

    try {
      const outline = this.outline(shape, panelOffset);
      surface.pushState();
      try {
        if (shape.opacity < 1) surface.setOpacity(shape.opacity);
        if (shape.rotation !== 0) surface.rotateAbout(outline.pivot.x, outline.pivot.y, shape.rotation);
        return this.paint(surface, shape, outline);
      } finally {
        surface.popState();
      }
    } catch (error) {
      return failed(toRenderError(error, 'surface', shape.id));
    }
  }

  /**
   * Absolute outline, pivot and bounding box of a shape, in points
   */
  outline(shape: PrimitiveShape, offset: Point): ShapeOutline {
    const ppi = this.config.pointsPerInch;
    const at = (x: number, y: number): Point => Coordinates.panelToPage({ x, y }, offset, ppi);

    switch (shape.type) {
      case 'rectangle': {
        const corner = at(shape.x, shape.y);
        const box = { x: corner.x, y: corner.y, width: shape.width * ppi, height: shape.height * ppi };
        return {
          path: new PathBuilder().rect(box.x, box.y, box.width, box.height).build(),
          pivot: boxCenter(box),
          box,
        };
      }
      case 'circle': {
        const c = at(shape.centerX, shape.centerY);
        const r = shape.radius * ppi;
        return {
          path: new PathBuilder().circle(c.x, c.y, r).build(),
          pivot: c,
          box: { x: c.x - r, y: c.y - r, width: 2 * r, height: 2 * r },
        };
      }
      case 'triangle': {
        const vertices = [at(shape.x1, shape.y1), at(shape.x2, shape.y2), at(shape.x3, shape.y3)];
        const path = new PathBuilder().polygon(vertices).build();
        return {
          path,
          pivot: {
            x: (vertices[0].x + vertices[1].x + vertices[2].x) / 3,
            y: (vertices[0].y + vertices[1].y + vertices[2].y) / 3,
          },
          box: this.requireBounds(path, shape.id),
        };
      }
      case 'star': {
        const c = at(shape.centerX, shape.centerY);
        const r = shape.outerRadius * ppi;
        const vertices = starVertices(c.x, c.y, r, shape.innerRadius * ppi, shape.points);
        return {
          path: new PathBuilder().polygon(vertices).build(),
          pivot: c,
          box: { x: c.x - r, y: c.y - r, width: 2 * r, height: 2 * r },
        };
      }
      case 'line': {
        const start = at(shape.startX, shape.startY);
        const end = at(shape.endX, shape.endY);
        const path = new PathBuilder().moveTo(start.x, start.y).lineTo(end.x, end.y).build();
        return {
          path,
          pivot: { x: (start.x + end.x) / 2, y: (start.y + end.y) / 2 },
          box: this.requireBounds(path, shape.id),
        };
      }
      case 'svg_path': {
        const segments = mapSegments(pathDataToSegments(shape.pathData), (x, y) =>
          at(x * shape.scale, y * shape.scale)
        );
        const path = new PathBuilder().append(segments).build();
        const box = this.requireBounds(path, shape.id);
        return { path, pivot: boxCenter(box), box };
      }
      default: {
        const unknown: never = shape;
        throw new RenderError('unsupported_shape', `Unsupported shape: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private paint(surface: DrawingSurface, shape: PrimitiveShape, outline: ShapeOutline): RenderOutcome {
    if (shape.type === 'line') {
      surface.setStrokeColor(shape.strokeColor ? colorFromHex(shape.strokeColor) : BLACK);
      surface.setLineWidth(shape.strokeWidth > 0 ? shape.strokeWidth : 1);
      surface.drawPath(outline.path, { fill: false, stroke: true });
      return RENDERED;
    }

    const fill = resolveFill(shape);
    const stroke = shape.strokeColor !== undefined && shape.strokeWidth > 0;
    if (stroke && shape.strokeColor) {
      surface.setStrokeColor(colorFromHex(shape.strokeColor));
      surface.setLineWidth(shape.strokeWidth);
    }

    if (fill?.type === 'solid') {
      surface.setFillColor(colorFromHex(fill.color));
      surface.drawPath(outline.path, { fill: true, stroke });
      return RENDERED;
    }

    let outcome = RENDERED;
    if (fill) {
      surface.pushState();
      try {
        surface.clipTo(outline.path);
        outcome = this.paintFill(surface, fill, outline.box);
      } finally {
        surface.popState();
      }
    }

    if (stroke) {
      surface.drawPath(outline.path, { fill: false, stroke: true });
    }
    return outcome;
  }

  private paintFill(surface: DrawingSurface, fill: Exclude<FillStyle, { type: 'solid' }>, box: Box): RenderOutcome {
    switch (fill.type) {
      case 'linear_gradient':
        return this.gradients.fillLinear(surface, fill, box);
      case 'radial_gradient':
        return this.gradients.fillRadial(surface, fill, box);
      case 'pattern':
        return this.patterns.fill(surface, fill, box);
      default: {
        const unknown: never = fill;
        throw new RenderError('unsupported_shape', `Unsupported fill: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private requireBounds(path: SurfacePath, elementId: string): Box {
    const box = segmentBounds(path.segments);
    if (!box) {
      throw new RenderError('unsupported_shape', 'Shape has no drawable points', elementId);
    }
    return box;
  }
}
