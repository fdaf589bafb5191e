// Decorative composition definitions

import { z } from 'zod';
import { hexColorSchema } from '@/lib/card/schemas';

/**
 * One child shape of a composition, in the composition's own inches.
 * `fillColor` / `strokeColor` may hold a `{role}` placeholder. Checked in
 * full only after expansion, against the primitive shape schema.
 */
export const shapeTemplateSchema = z
  .object({
    type: z.enum(['rectangle', 'circle', 'triangle', 'star', 'line', 'svg_path']),
    fillColor: z.string().optional(),
    strokeColor: z.string().optional(),
    rotation: z.number().optional(),
    zIndex: z.number().int().optional(),
  })
  .passthrough();

export const decorativeDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  /** Natural size in inches at scale 1 */
  defaultWidth: z.number().positive(),
  defaultHeight: z.number().positive(),
  /** Default palette, role → color */
  colorRoles: z.record(hexColorSchema),
  shapes: z.array(shapeTemplateSchema).min(1),
});

export type ShapeTemplate = z.infer<typeof shapeTemplateSchema>;
export type DecorativeDefinition = z.infer<typeof decorativeDefinitionSchema>;
