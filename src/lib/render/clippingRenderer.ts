// =============================================================================
// CLIPPING RENDERER
// =============================================================================
// Builds clip paths from ClipMask values and draws images through them. Mask
// coordinates are inches relative to the image's lower-left corner.
// =============================================================================

import { DEFAULT_RENDER_CONFIG, type RenderConfig } from '@/lib/config';
import { Coordinates } from '@/lib/coordinates';
import type { ClipMask, Point } from '@/lib/card/types';
import { failed, RENDERED, RenderError, toRenderError, type RenderOutcome } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { pathDataToSegments } from '@/lib/path/pathGeometry';
import { mapSegments, PathBuilder, starVertices } from './pathBuilder';
import type { Box, DrawingSurface, SurfacePath } from './types';

const log = createLogger('ClippingRenderer');

export interface ImagePlacement extends Box {
  source: string;
  preserveAspect: boolean;
}

export class ClippingRenderer {
  constructor(private readonly config: RenderConfig = DEFAULT_RENDER_CONFIG) {}

  /**
   * Closed clip path for `mask`, anchored at `origin` (points)
   * @throws PathParseError for malformed svg_path masks
   */
  buildClipPath(mask: ClipMask, origin: Point): SurfacePath {
    const ppi = this.config.pointsPerInch;
    const at = (x: number, y: number): Point => Coordinates.panelToPage({ x, y }, origin, ppi);

    switch (mask.type) {
      case 'circle': {
        const c = at(mask.centerX, mask.centerY);
        return new PathBuilder().circle(c.x, c.y, mask.radius * ppi).build();
      }
      case 'rectangle': {
        const corner = at(mask.x, mask.y);
        return new PathBuilder().rect(corner.x, corner.y, mask.width * ppi, mask.height * ppi).build();
      }
      case 'ellipse': {
        const c = at(mask.centerX, mask.centerY);
        return new PathBuilder().ellipse(c.x, c.y, mask.radiusX * ppi, mask.radiusY * ppi).build();
      }
      case 'star': {
        const c = at(mask.centerX, mask.centerY);
        const vertices = starVertices(c.x, c.y, mask.outerRadius * ppi, mask.innerRadius * ppi, mask.points);
        return new PathBuilder().polygon(vertices).build();
      }
      case 'svg_path': {
        const segments = pathDataToSegments(mask.pathData);
        const mapped = mapSegments(segments, (x, y) => at(x * mask.scale, y * mask.scale));
        log.debug(`Built path clip: scale=${mask.scale}, segments=${segments.length}`);
        return new PathBuilder().append(mapped).build();
      }
      default: {
        const unknown: never = mask;
        throw new RenderError('clip_mask', `Unsupported clip mask: ${JSON.stringify(unknown)}`);
      }
    }
  }

  /**
   * Draw an image, clipped to `mask` when given. A mask that cannot be built
   * is logged and the image is drawn unclipped.
   */
  renderClippedImage(
    surface: DrawingSurface,
    placement: ImagePlacement,
    mask: ClipMask | undefined,
    elementId?: string
  ): RenderOutcome {
    let clip: SurfacePath | undefined;
    if (mask) {
      try {
        clip = this.buildClipPath(mask, { x: placement.x, y: placement.y });
      } catch (error) {
        log.warn(`Clip mask for ${elementId ?? 'image'} failed, drawing unclipped:`, error);
      }
    }

    try {
      surface.pushState();
      try {
        if (clip) surface.clipTo(clip);
        surface.drawImage(
          placement.source,
          placement.x,
          placement.y,
          placement.width,
          placement.height,
          placement.preserveAspect
        );
      } finally {
        surface.popState();
      }
      return RENDERED;
    } catch (error) {
      return failed(toRenderError(error, 'missing_image', elementId));
    }
  }
}
