// Card scene types, inferred from ./schemas

import type { z } from 'zod';
import type {
  borderSchema,
  cardSchema,
  circleMaskSchema,
  circleShapeSchema,
  clipMaskSchema,
  colorStopSchema,
  decorativeElementSchema,
  ellipseMaskSchema,
  fillStyleSchema,
  foldTypeSchema,
  fontStyleSchema,
  imageElementSchema,
  lineShapeSchema,
  linearGradientSchema,
  overflowPolicySchema,
  panelSchema,
  pathMaskSchema,
  pathShapeSchema,
  patternFillSchema,
  patternTypeSchema,
  primitiveShapeSchema,
  radialGradientSchema,
  rectangleMaskSchema,
  rectangleShapeSchema,
  shapeSchema,
  solidFillSchema,
  starMaskSchema,
  starShapeSchema,
  textAlignmentSchema,
  textElementSchema,
  triangleShapeSchema,
} from './schemas';

// =============================================================================
// FILLS
// =============================================================================

export type ColorStop = z.infer<typeof colorStopSchema>;
export type SolidFill = z.infer<typeof solidFillSchema>;
export type LinearGradientFill = z.infer<typeof linearGradientSchema>;
export type RadialGradientFill = z.infer<typeof radialGradientSchema>;
export type PatternFill = z.infer<typeof patternFillSchema>;
export type PatternType = z.infer<typeof patternTypeSchema>;
export type FillStyle = z.infer<typeof fillStyleSchema>;
export type FillStyleInput = z.input<typeof fillStyleSchema>;

// =============================================================================
// CLIP MASKS
// =============================================================================

export type CircleMask = z.infer<typeof circleMaskSchema>;
export type RectangleMask = z.infer<typeof rectangleMaskSchema>;
export type EllipseMask = z.infer<typeof ellipseMaskSchema>;
export type StarMask = z.infer<typeof starMaskSchema>;
export type PathMask = z.infer<typeof pathMaskSchema>;
export type ClipMask = z.infer<typeof clipMaskSchema>;
export type ClipMaskInput = z.input<typeof clipMaskSchema>;

// =============================================================================
// SHAPES
// =============================================================================

export type RectangleShape = z.infer<typeof rectangleShapeSchema>;
export type CircleShape = z.infer<typeof circleShapeSchema>;
export type TriangleShape = z.infer<typeof triangleShapeSchema>;
export type StarShape = z.infer<typeof starShapeSchema>;
export type LineShape = z.infer<typeof lineShapeSchema>;
export type PathShape = z.infer<typeof pathShapeSchema>;
export type DecorativeElement = z.infer<typeof decorativeElementSchema>;

/** Any shape a scene may declare, decorative composites included */
export type Shape = z.infer<typeof shapeSchema>;
export type ShapeInput = z.input<typeof shapeSchema>;

/** Shapes the Shape Renderer draws directly */
export type PrimitiveShape = z.infer<typeof primitiveShapeSchema>;
export type PrimitiveShapeInput = z.input<typeof primitiveShapeSchema>;

export type ShapeType = Shape['type'];

// =============================================================================
// TEXT & IMAGES
// =============================================================================

export type FontStyle = z.infer<typeof fontStyleSchema>;
export type TextAlignment = z.infer<typeof textAlignmentSchema>;
export type OverflowPolicy = z.infer<typeof overflowPolicySchema>;
export type TextElement = z.infer<typeof textElementSchema>;
export type TextElementInput = z.input<typeof textElementSchema>;
export type ImageElement = z.infer<typeof imageElementSchema>;
export type ImageElementInput = z.input<typeof imageElementSchema>;

/** Policies a fit can end up applying; `auto` always resolves to one of these */
export type AppliedPolicy = Exclude<OverflowPolicy, 'auto'>;

/**
 * How a text element was adjusted to fit. Produced per fit, never stored on
 * the element.
 */
export interface AdjustmentResult {
  wasAdjusted: boolean;
  policyApplied: AppliedPolicy;
  originalFontSize: number;
  finalFontSize: number;
  linesUsed: number;
  contentTruncated: boolean;
}

// =============================================================================
// PANELS & CARDS
// =============================================================================

export type Border = z.infer<typeof borderSchema>;
export type Panel = z.infer<typeof panelSchema>;
export type PanelInput = z.input<typeof panelSchema>;
export type FoldType = z.infer<typeof foldTypeSchema>;
export type Card = z.infer<typeof cardSchema>;
export type CardInput = z.input<typeof cardSchema>;

// =============================================================================
// PATHS
// =============================================================================

export type PathCommandLetter =
  | 'M' | 'm' | 'L' | 'l' | 'H' | 'h' | 'V' | 'v'
  | 'C' | 'c' | 'S' | 's' | 'Q' | 'q' | 'T' | 't'
  | 'A' | 'a' | 'Z' | 'z';

export interface PathCommand {
  command: PathCommandLetter;
  params: number[];
}

export interface Point {
  x: number;
  y: number;
}
