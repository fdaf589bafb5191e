import type { RenderConfig } from '@/lib/config';
import type { ImageSize } from './types';

/**
 * Final drawn size of an image, in inches.
 *
 * - width and height: fit inside them when preserving aspect, else stretch
 * - one of them: derive the other from the aspect ratio (or keep natural)
 * - neither: natural size, scaled down to fit the panel
 *
 * A requested size of 0 counts as unset.
 */
export function computeImageSize(
  natural: ImageSize,
  target: { width?: number; height?: number },
  preserveAspect: boolean,
  max: ImageSize
): ImageSize {
  const aspect = natural.height > 0 ? natural.width / natural.height : 1;
  const width = target.width !== undefined && target.width > 0 ? target.width : undefined;
  const height = target.height !== undefined && target.height > 0 ? target.height : undefined;

  if (width !== undefined && height !== undefined) {
    if (!preserveAspect) return { width, height };
    return width / height > aspect
      ? { width: height * aspect, height }
      : { width, height: width / aspect };
  }

  if (width !== undefined) {
    return { width, height: preserveAspect ? width / aspect : natural.height };
  }

  if (height !== undefined) {
    return { width: preserveAspect ? height * aspect : natural.width, height };
  }

  const fitWidth = Math.min(natural.width, max.width);
  const fitHeight = Math.min(natural.height, max.height);
  if (!preserveAspect || natural.width <= 0 || natural.height <= 0) {
    return { width: fitWidth, height: fitHeight };
  }
  const scale = Math.min(fitWidth / natural.width, fitHeight / natural.height);
  return { width: natural.width * scale, height: natural.height * scale };
}

/**
 * Keep an image's lower-left corner (points) such that the image stays inside
 * the page's safe margin
 */
export function clampToSafeArea(
  position: { x: number; y: number },
  size: ImageSize,
  config: Pick<RenderConfig, 'pointsPerInch' | 'pageWidthIn' | 'pageHeightIn' | 'safeMarginIn'>
): { x: number; y: number } {
  const margin = config.safeMarginIn * config.pointsPerInch;
  const pageWidth = config.pageWidthIn * config.pointsPerInch;
  const pageHeight = config.pageHeightIn * config.pointsPerInch;
  return {
    x: Math.max(margin, Math.min(position.x, pageWidth - margin - size.width)),
    y: Math.max(margin, Math.min(position.y, pageHeight - margin - size.height)),
  };
}
