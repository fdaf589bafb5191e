// =============================================================================
// RENDER CONFIGURATION
// =============================================================================

import { z } from 'zod';
import { ValidationError } from './errors';
import {
  PAGE_HEIGHT_IN,
  PAGE_WIDTH_IN,
  PT_PER_IN,
  SAFE_MARGIN_IN,
} from './coordinates';

export const renderConfigSchema = z.object({
  /** Output units per scene inch */
  pointsPerInch: z.number().positive(),
  pageWidthIn: z.number().positive(),
  pageHeightIn: z.number().positive(),
  safeMarginIn: z.number().min(0),
  /** Line height as a multiple of font size */
  lineHeightFactor: z.number().positive(),
  /** Below this length the auto overflow policy shrinks instead of wrapping */
  autoShrinkMaxChars: z.number().int().min(0),
  ellipsis: z.string(),
  minTileSizePt: z.number().positive(),
  /** Bands used when a surface has no native gradients */
  gradientSteps: z.number().int().min(2).max(512),
  drawFoldLines: z.boolean(),
  clampImagesToSafeArea: z.boolean(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export type RenderConfig = z.infer<typeof renderConfigSchema>;

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  pointsPerInch: PT_PER_IN,
  pageWidthIn: PAGE_WIDTH_IN,
  pageHeightIn: PAGE_HEIGHT_IN,
  safeMarginIn: SAFE_MARGIN_IN,
  lineHeightFactor: 1.2,
  autoShrinkMaxChars: 30,
  ellipsis: '...',
  minTileSizePt: 2,
  gradientSteps: 64,
  drawFoldLines: true,
  clampImagesToSafeArea: true,
  logLevel: 'info',
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveRenderConfig(overrides: Partial<RenderConfig> = {}): RenderConfig {
  const result = renderConfigSchema.safeParse({ ...DEFAULT_RENDER_CONFIG, ...overrides });
  if (!result.success) {
    throw ValidationError.fromZod('render config', result.error);
  }
  return result.data;
}
