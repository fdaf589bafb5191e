// =============================================================================
// DRAWING SURFACE
// =============================================================================
// The page-oriented output abstraction every renderer draws on. Units are
// points, origin bottom-left. Concrete surfaces: PdfSurface (pdf-lib) and
// RecordingSurface (in-memory operation log).
// =============================================================================

import type { Color } from '@/lib/card/color';
import type { FontStyle, Point } from '@/lib/card/types';

export type PathSegment =
  | { op: 'move'; x: number; y: number }
  | { op: 'line'; x: number; y: number }
  | { op: 'curve'; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { op: 'close' };

/**
 * An immutable path, built with PathBuilder
 */
export interface SurfacePath {
  readonly segments: readonly PathSegment[];
}

export interface PaintMode {
  fill: boolean;
  stroke: boolean;
}

export interface FontSpec {
  family: string;
  style: FontStyle;
}

export interface GradientStop {
  position: number;
  color: Color;
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface DrawingSurface {
  beginPage(width: number, height: number): void;

  // Graphics state
  setFillColor(color: Color): void;
  setStrokeColor(color: Color): void;
  setLineWidth(width: number): void;
  /** Applies to both fill and stroke */
  setOpacity(alpha: number): void;
  /** Empty pattern = solid */
  setDash(pattern: readonly number[]): void;
  pushState(): void;
  popState(): void;

  // Transforms
  rotateAbout(cx: number, cy: number, degrees: number): void;
  translate(dx: number, dy: number): void;

  // Paths
  drawPath(path: SurfacePath, mode: PaintMode): void;
  /** Intersects the clip region with the path (nonzero winding) */
  clipTo(path: SurfacePath): void;

  // Images
  drawImage(source: string, x: number, y: number, width: number, height: number, preserveAspect: boolean): void;
  /** Natural size in points, or undefined when the source cannot be loaded */
  measureImage(source: string): ImageSize | undefined;

  // Text
  drawText(text: string, x: number, y: number, font: FontSpec, size: number): void;
  measureTextWidth(text: string, font: FontSpec, size: number): number;

  // Native gradients (optional); both paint the current clip region
  linearGradient?(start: Point, end: Point, stops: readonly GradientStop[]): void;
  radialGradient?(center: Point, radius: number, stops: readonly GradientStop[]): void;
}
