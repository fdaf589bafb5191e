// =============================================================================
// CARD SCENE SCHEMAS
// =============================================================================
// Zod schemas for the declarative card description. Every tagged union uses
// `type` as discriminator with the scene's string values. Types are inferred
// from the schemas (see ./types).
//
// Units: element coordinates are inches relative to their panel; stroke and
// border widths are points.
// =============================================================================

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { isHexColor, normalizeHex } from './color';

const PATH_COMMAND_PATTERN = /[MmLlHhVvCcSsQqTtAaZz]/;

// =============================================================================
// PRIMITIVES
// =============================================================================

export const hexColorSchema = z
  .string()
  .refine(isHexColor, { message: 'Expected a #RRGGBB color' })
  .transform(normalizeHex);

const idSchema = z.string().min(1).default(() => randomUUID());
const coordinateSchema = z.number().min(0);
const extentSchema = z.number().positive();
const angleSchema = z.number().min(0).lt(360).default(0);
const opacitySchema = z.number().min(0).max(1).default(1);
const starPointsSchema = z.number().int().min(3).max(20).default(5);
const pathScaleSchema = z.number().positive().max(10).default(1);

/**
 * Shared check for star shapes and star clip masks
 */
function refineStarRadii(
  value: { type: string; innerRadius?: number; outerRadius?: number },
  ctx: z.RefinementCtx
): void {
  if (value.type !== 'star' || value.innerRadius === undefined || value.outerRadius === undefined) {
    return;
  }
  if (value.innerRadius >= value.outerRadius) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['innerRadius'],
      message: 'Inner radius must be less than outer radius',
    });
  }
}

// =============================================================================
// FILL STYLES
// =============================================================================

export const colorStopSchema = z.object({
  /** Offset along the gradient, 0 to 1 */
  position: z.number().min(0).max(1),
  color: hexColorSchema,
});

const colorStopsSchema = z
  .array(colorStopSchema)
  .min(2, 'A gradient needs at least 2 color stops')
  .max(20, 'A gradient takes at most 20 color stops')
  .refine(
    (stops) => stops.every((stop, i) => i === 0 || stops[i - 1].position <= stop.position),
    { message: 'Color stops must be in ascending order of position' }
  );

export const solidFillSchema = z.object({
  type: z.literal('solid'),
  color: hexColorSchema,
});

export const linearGradientSchema = z.object({
  type: z.literal('linear_gradient'),
  /** Degrees, 0 = left to right, counter-clockwise */
  angle: angleSchema,
  stops: colorStopsSchema,
});

export const radialGradientSchema = z.object({
  type: z.literal('radial_gradient'),
  /** Fractions of the shape's bounding box */
  centerX: z.number().min(0).max(1).default(0.5),
  centerY: z.number().min(0).max(1).default(0.5),
  /** Fraction of the bounding-box diagonal */
  radius: z.number().positive().max(1).default(0.5),
  stops: colorStopsSchema,
});

export const patternTypeSchema = z.enum(['stripes', 'dots', 'grid', 'checkerboard']);

export const patternFillSchema = z.object({
  type: z.literal('pattern'),
  patternType: patternTypeSchema,
  colors: z.array(hexColorSchema).min(1).max(4),
  /** Tile size in inches */
  spacing: z.number().positive().max(2).default(0.25),
  scale: z.number().positive().max(5).default(1),
  rotation: angleSchema,
});

export const fillStyleSchema = z.discriminatedUnion('type', [
  solidFillSchema,
  linearGradientSchema,
  radialGradientSchema,
  patternFillSchema,
]);

// =============================================================================
// CLIP MASKS (inches, relative to the image origin)
// =============================================================================

export const circleMaskSchema = z.object({
  type: z.literal('circle'),
  centerX: coordinateSchema,
  centerY: coordinateSchema,
  radius: extentSchema,
});

export const rectangleMaskSchema = z.object({
  type: z.literal('rectangle'),
  x: coordinateSchema,
  y: coordinateSchema,
  width: extentSchema,
  height: extentSchema,
});

export const ellipseMaskSchema = z.object({
  type: z.literal('ellipse'),
  centerX: coordinateSchema,
  centerY: coordinateSchema,
  radiusX: extentSchema,
  radiusY: extentSchema,
});

export const starMaskSchema = z.object({
  type: z.literal('star'),
  centerX: coordinateSchema,
  centerY: coordinateSchema,
  points: starPointsSchema,
  outerRadius: extentSchema,
  innerRadius: extentSchema,
});

export const pathMaskSchema = z.object({
  type: z.literal('svg_path'),
  pathData: z.string().refine((data) => /[Zz]$/.test(data.trim()), {
    message: 'Clip path must be closed (end with Z or z)',
  }),
  scale: pathScaleSchema,
});

export const clipMaskSchema = z
  .discriminatedUnion('type', [
    circleMaskSchema,
    rectangleMaskSchema,
    ellipseMaskSchema,
    starMaskSchema,
    pathMaskSchema,
  ])
  .superRefine(refineStarRadii);

// =============================================================================
// SHAPES
// =============================================================================

export const baseShapeSchema = z.object({
  id: idSchema,
  zIndex: z.number().int().default(0),
  opacity: opacitySchema,
  /** Degrees about the shape's pivot */
  rotation: angleSchema,
  strokeColor: hexColorSchema.optional(),
  /** Points */
  strokeWidth: z.number().min(0).default(0),
  fill: fillStyleSchema.optional(),
  /** Legacy solid fill; `fill` wins when both are set */
  fillColor: hexColorSchema.optional(),
});

export const rectangleShapeSchema = baseShapeSchema.extend({
  type: z.literal('rectangle'),
  x: coordinateSchema,
  y: coordinateSchema,
  width: extentSchema,
  height: extentSchema,
});

export const circleShapeSchema = baseShapeSchema.extend({
  type: z.literal('circle'),
  centerX: coordinateSchema,
  centerY: coordinateSchema,
  radius: extentSchema,
});

export const triangleShapeSchema = baseShapeSchema.extend({
  type: z.literal('triangle'),
  x1: coordinateSchema,
  y1: coordinateSchema,
  x2: coordinateSchema,
  y2: coordinateSchema,
  x3: coordinateSchema,
  y3: coordinateSchema,
});

export const starShapeSchema = baseShapeSchema.extend({
  type: z.literal('star'),
  centerX: coordinateSchema,
  centerY: coordinateSchema,
  outerRadius: extentSchema,
  innerRadius: extentSchema,
  points: starPointsSchema,
});

export const lineShapeSchema = baseShapeSchema.extend({
  type: z.literal('line'),
  startX: coordinateSchema,
  startY: coordinateSchema,
  endX: coordinateSchema,
  endY: coordinateSchema,
});

export const pathShapeSchema = baseShapeSchema.extend({
  type: z.literal('svg_path'),
  pathData: z
    .string()
    .refine((data) => data.trim().length > 0, { message: 'Path data cannot be empty' })
    .refine((data) => PATH_COMMAND_PATTERN.test(data), {
      message: 'Path data must contain at least one path command',
    }),
  scale: pathScaleSchema,
});

export const decorativeElementSchema = z.object({
  type: z.literal('decorative_element'),
  id: idSchema,
  /** Name of a composition in the decorative library */
  name: z.string().min(1),
  x: coordinateSchema,
  y: coordinateSchema,
  scale: z.number().positive().default(1),
  rotation: angleSchema,
  /** Role → color overrides for the composition's palette */
  colorPalette: z.record(hexColorSchema).optional(),
  zIndex: z.number().int().default(0),
});

const primitiveShapeOptions = [
  rectangleShapeSchema,
  circleShapeSchema,
  triangleShapeSchema,
  starShapeSchema,
  lineShapeSchema,
  pathShapeSchema,
] as const;

export const primitiveShapeSchema = z
  .discriminatedUnion('type', [...primitiveShapeOptions])
  .superRefine(refineStarRadii);

export const shapeSchema = z
  .discriminatedUnion('type', [...primitiveShapeOptions, decorativeElementSchema])
  .superRefine(refineStarRadii);

// =============================================================================
// TEXT & IMAGES
// =============================================================================

export const fontStyleSchema = z.enum(['normal', 'bold', 'italic', 'bold_italic']);
export const textAlignmentSchema = z.enum(['left', 'center', 'right']);
export const overflowPolicySchema = z.enum(['auto', 'shrink', 'wrap', 'truncate']);

export const textElementSchema = z.object({
  id: idSchema,
  content: z.string().min(1).max(1000),
  /** Baseline of the first line */
  x: coordinateSchema,
  y: coordinateSchema,
  /** Max line width in inches; no width means no fitting */
  width: extentSchema.optional(),
  fontFamily: z.string().min(1).default('Helvetica'),
  fontSize: z.number().int().min(6).max(144).default(12),
  fontStyle: fontStyleSchema.default('normal'),
  color: hexColorSchema.optional(),
  alignment: textAlignmentSchema.default('left'),
  rotation: angleSchema,
  zIndex: z.number().int().default(100),
  overflow: overflowPolicySchema.default('auto'),
  maxLines: z.number().int().min(1).optional(),
  minFontSize: z.number().int().min(6).max(72).default(8),
});

export const imageElementSchema = z.object({
  id: idSchema,
  /** Path of the image file */
  source: z.string().min(1),
  x: coordinateSchema,
  y: coordinateSchema,
  width: z.number().min(0).optional(),
  height: z.number().min(0).optional(),
  preserveAspect: z.boolean().default(true),
  rotation: angleSchema,
  opacity: opacitySchema,
  zIndex: z.number().int().default(100),
  clipMask: clipMaskSchema.optional(),
});

// =============================================================================
// PANELS & CARDS
// =============================================================================

export const borderSchema = z.object({
  style: z.enum(['solid', 'dashed', 'dotted', 'decorative']).default('solid'),
  /** Points */
  width: z.number().min(0).max(10).default(1),
  color: hexColorSchema.default('#000000'),
  cornerRadius: z.number().min(0).default(0),
});

export const panelPositionSchema = z.enum([
  'front',
  'back',
  'inside_left',
  'inside_right',
  'left',
  'center',
  'right',
]);

export const panelSchema = z.object({
  id: idSchema,
  position: panelPositionSchema,
  /** Panel origin on the page, inches */
  x: coordinateSchema,
  y: coordinateSchema,
  width: extentSchema,
  height: extentSchema,
  rotation: angleSchema,
  backgroundColor: hexColorSchema.optional(),
  border: borderSchema.optional(),
  shapes: z.array(shapeSchema).default([]),
  texts: z.array(textElementSchema).default([]),
  images: z.array(imageElementSchema).default([]),
});

export const foldTypeSchema = z.enum(['half_fold', 'quarter_fold', 'tri_fold']);

export const cardSchema = z.object({
  id: idSchema,
  name: z.string().min(1).max(100),
  foldType: foldTypeSchema,
  panels: z.array(panelSchema).min(1),
});
