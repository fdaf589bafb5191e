import { colorFromHex, type Color } from '@/lib/card/color';
import type { ColorStop, LinearGradientFill, Point, RadialGradientFill } from '@/lib/card/types';
import type { Box, GradientStop } from './types';

/**
 * Linear blend between two colors, t in [0, 1]
 */
export function interpolateColor(from: Color, to: Color, t: number): Color {
  const k = Math.min(1, Math.max(0, t));
  return {
    r: from.r + (to.r - from.r) * k,
    g: from.g + (to.g - from.g) * k,
    b: from.b + (to.b - from.b) * k,
  };
}

/**
 * Color of a gradient at `position`. Positions outside the stops take the
 * nearest stop's color.
 */
export function colorAtPosition(stops: readonly GradientStop[], position: number): Color {
  if (stops.length === 0) {
    throw new Error('Gradient has no color stops');
  }
  const first = stops[0];
  const last = stops[stops.length - 1];
  if (position <= first.position) return first.color;
  if (position >= last.position) return last.color;

  for (let i = 1; i < stops.length; i++) {
    const right = stops[i];
    if (position <= right.position) {
      const left = stops[i - 1];
      const span = right.position - left.position;
      if (span <= 0) return right.color;
      return interpolateColor(left.color, right.color, (position - left.position) / span);
    }
  }
  return last.color;
}

export function toGradientStops(stops: readonly ColorStop[]): GradientStop[] {
  return stops.map((stop) => ({ position: stop.position, color: colorFromHex(stop.color) }));
}

export function boxCenter(box: Box): Point {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

export function boxDiagonal(box: Box): number {
  return Math.hypot(box.width, box.height);
}

/**
 * Start and end of a linear gradient axis: through the box center along
 * `angle`, spanning the box diagonal
 */
export function gradientEndpoints(angle: number, box: Box): { start: Point; end: Point } {
  const radians = (angle * Math.PI) / 180;
  const center = boxCenter(box);
  const half = boxDiagonal(box) / 2;
  const dx = Math.cos(radians) * half;
  const dy = Math.sin(radians) * half;
  return {
    start: { x: center.x - dx, y: center.y - dy },
    end: { x: center.x + dx, y: center.y + dy },
  };
}

export function linearGradientGeometry(fill: LinearGradientFill, box: Box): { start: Point; end: Point } {
  return gradientEndpoints(fill.angle, box);
}

/**
 * Center from box fractions; radius as a fraction of the box diagonal
 */
export function radialGradientGeometry(fill: RadialGradientFill, box: Box): { center: Point; radius: number } {
  return {
    center: { x: box.x + fill.centerX * box.width, y: box.y + fill.centerY * box.height },
    radius: fill.radius * boxDiagonal(box),
  };
}
