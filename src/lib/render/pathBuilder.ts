import type { Point } from '@/lib/card/types';
import type { Box, PathSegment, SurfacePath } from './types';

/** Control-point distance for a quarter circle drawn as one cubic Bezier */
export const KAPPA = 0.5522847498;

/**
 * Fluent builder for SurfacePath values.
 *
 * @example
 * const path = new PathBuilder().moveTo(0, 0).lineTo(10, 0).lineTo(5, 8).close().build();
 */
export class PathBuilder {
  private readonly segments: PathSegment[] = [];

  moveTo(x: number, y: number): this {
    this.segments.push({ op: 'move', x, y });
    return this;
  }

  lineTo(x: number, y: number): this {
    this.segments.push({ op: 'line', x, y });
    return this;
  }

  curveTo(x1: number, y1: number, x2: number, y2: number, x: number, y: number): this {
    this.segments.push({ op: 'curve', x1, y1, x2, y2, x, y });
    return this;
  }

  close(): this {
    this.segments.push({ op: 'close' });
    return this;
  }

  rect(x: number, y: number, width: number, height: number): this {
    return this.moveTo(x, y)
      .lineTo(x + width, y)
      .lineTo(x + width, y + height)
      .lineTo(x, y + height)
      .close();
  }

  /**
   * Ellipse from four Bezier quarter arcs, counter-clockwise from the right
   */
  ellipse(cx: number, cy: number, rx: number, ry: number): this {
    const ox = rx * KAPPA;
    const oy = ry * KAPPA;
    return this.moveTo(cx + rx, cy)
      .curveTo(cx + rx, cy + oy, cx + ox, cy + ry, cx, cy + ry)
      .curveTo(cx - ox, cy + ry, cx - rx, cy + oy, cx - rx, cy)
      .curveTo(cx - rx, cy - oy, cx - ox, cy - ry, cx, cy - ry)
      .curveTo(cx + ox, cy - ry, cx + rx, cy - oy, cx + rx, cy)
      .close();
  }

  circle(cx: number, cy: number, r: number): this {
    return this.ellipse(cx, cy, r, r);
  }

  roundedRect(x: number, y: number, width: number, height: number, radius: number): this {
    const r = Math.min(radius, width / 2, height / 2);
    if (r <= 0) return this.rect(x, y, width, height);
    const o = r * KAPPA;
    const right = x + width;
    const top = y + height;
    return this.moveTo(x + r, y)
      .lineTo(right - r, y)
      .curveTo(right - r + o, y, right, y + r - o, right, y + r)
      .lineTo(right, top - r)
      .curveTo(right, top - r + o, right - r + o, top, right - r, top)
      .lineTo(x + r, top)
      .curveTo(x + r - o, top, x, top - r + o, x, top - r)
      .lineTo(x, y + r)
      .curveTo(x, y + r - o, x + r - o, y, x + r, y)
      .close();
  }

  /**
   * Closed polygon through the given vertices
   */
  polygon(points: readonly Point[]): this {
    points.forEach((point, i) => {
      if (i === 0) this.moveTo(point.x, point.y);
      else this.lineTo(point.x, point.y);
    });
    return points.length > 0 ? this.close() : this;
  }

  append(segments: readonly PathSegment[]): this {
    this.segments.push(...segments);
    return this;
  }

  build(): SurfacePath {
    return { segments: [...this.segments] };
  }
}

export function rectPath(box: Box): SurfacePath {
  return new PathBuilder().rect(box.x, box.y, box.width, box.height).build();
}

/**
 * Bounding box over every on-curve and control point
 */
export function segmentBounds(segments: readonly PathSegment[]): Box | undefined {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  const include = (x: number, y: number) => {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  };

  for (const segment of segments) {
    switch (segment.op) {
      case 'move':
      case 'line':
        include(segment.x, segment.y);
        break;
      case 'curve':
        include(segment.x1, segment.y1);
        include(segment.x2, segment.y2);
        include(segment.x, segment.y);
        break;
      case 'close':
        break;
    }
  }

  if (minX === Infinity) return undefined;
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/**
 * Map every point of the segments through `fn`
 */
export function mapSegments(
  segments: readonly PathSegment[],
  fn: (x: number, y: number) => Point
): PathSegment[] {
  return segments.map((segment): PathSegment => {
    switch (segment.op) {
      case 'move':
      case 'line': {
        const p = fn(segment.x, segment.y);
        return { op: segment.op, x: p.x, y: p.y };
      }
      case 'curve': {
        const c1 = fn(segment.x1, segment.y1);
        const c2 = fn(segment.x2, segment.y2);
        const p = fn(segment.x, segment.y);
        return { op: 'curve', x1: c1.x, y1: c1.y, x2: c2.x, y2: c2.y, x: p.x, y: p.y };
      }
      case 'close':
        return segment;
    }
  });
}

/**
 * Star vertices: 2n points alternating outer/inner radius, the first outer
 * point at -90°
 */
export function starVertices(
  cx: number,
  cy: number,
  outerRadius: number,
  innerRadius: number,
  points: number
): Point[] {
  const count = points * 2;
  const step = (2 * Math.PI) / count;
  const vertices: Point[] = [];
  for (let i = 0; i < count; i++) {
    const angle = i * step - Math.PI / 2;
    const r = i % 2 === 0 ? outerRadius : innerRadius;
    vertices.push({ x: cx + r * Math.cos(angle), y: cy + r * Math.sin(angle) });
  }
  return vertices;
}
