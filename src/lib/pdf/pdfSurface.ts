// ============================================================================
// PDF GENERATION - Drawing Surface
// ============================================================================
// DrawingSurface over a pdf-lib document. Paths, clips and transforms are
// written as raw content-stream operators; text and images go through
// pdf-lib's page API on the same content stream, so they inherit the current
// transform and clip.
//
// Images are embedded ahead of the (synchronous) render pass with
// loadImages(); fonts are the standard 14, embedded on first use.
// ============================================================================

import { readFile } from 'node:fs/promises';
import {
  appendBezierCurve,
  clip,
  closePath,
  endPath,
  fill,
  fillAndStroke,
  lineTo,
  moveTo,
  PDFDocument,
  popGraphicsState,
  pushGraphicsState,
  rgb,
  rotateDegrees,
  setDashPattern,
  setFillingRgbColor,
  setGraphicsState,
  setLineWidth,
  setStrokingRgbColor,
  stroke,
  translate,
  type PDFImage,
  type PDFOperator,
  type PDFPage,
} from 'pdf-lib';
import { BLACK, type Color } from '@/lib/card/color';
import { RenderError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import type { DrawingSurface, FontSpec, ImageSize, PaintMode, SurfacePath } from '@/lib/render/types';
import { FontCollection } from './fontUtils';

const log = createLogger('PdfSurface');

interface GraphicsState {
  fillColor: Color;
}

function sniffImageType(bytes: Uint8Array): 'png' | 'jpg' | undefined {
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) return 'png';
  if (bytes[0] === 0xff && bytes[1] === 0xd8) return 'jpg';
  return undefined;
}

export function pathOperators(path: SurfacePath): PDFOperator[] {
  return path.segments.map((segment) => {
    switch (segment.op) {
      case 'move':
        return moveTo(segment.x, segment.y);
      case 'line':
        return lineTo(segment.x, segment.y);
      case 'curve':
        return appendBezierCurve(segment.x1, segment.y1, segment.x2, segment.y2, segment.x, segment.y);
      case 'close':
        return closePath();
    }
  });
}

export class PdfSurface implements DrawingSurface {
  private page: PDFPage | undefined;
  private readonly fonts: FontCollection;
  private readonly images = new Map<string, PDFImage>();
  private state: GraphicsState = { fillColor: BLACK };
  private readonly stack: GraphicsState[] = [];

  private constructor(readonly pdfDoc: PDFDocument) {
    this.fonts = new FontCollection(pdfDoc);
  }

  static async create(): Promise<PdfSurface> {
    return new PdfSurface(await PDFDocument.create());
  }

  // ==========================================
  // PREPARATION (async)
  // ==========================================

  /**
   * Embed PNG or JPEG bytes under `source`
   */
  async embedImage(source: string, bytes: Uint8Array): Promise<void> {
    const type = sniffImageType(bytes);
    if (!type) {
      throw new RenderError('missing_image', `Unsupported image format: ${source}`);
    }
    const image = type === 'png' ? await this.pdfDoc.embedPng(bytes) : await this.pdfDoc.embedJpg(bytes);
    this.images.set(source, image);
  }

  /**
   * Read and embed image files. Files that cannot be read or embedded are
   * skipped; drawing them later fails with a missing_image error.
   */
  async loadImages(sources: readonly string[]): Promise<number> {
    let loaded = 0;
    for (const source of new Set(sources)) {
      if (this.images.has(source)) continue;
      try {
        await this.embedImage(source, await readFile(source));
        loaded++;
      } catch (error) {
        log.warn(`Could not load image ${source}:`, error);
      }
    }
    log.info(`Embedded ${loaded} image(s)`);
    return loaded;
  }

  async save(): Promise<Uint8Array> {
    return this.pdfDoc.save();
  }

  // ==========================================
  // DRAWING SURFACE
  // ==========================================

  beginPage(width: number, height: number): void {
    this.page = this.pdfDoc.addPage([width, height]);
    this.state = { fillColor: BLACK };
    this.stack.length = 0;
  }

  setFillColor(color: Color): void {
    this.state.fillColor = color;
    this.emit(setFillingRgbColor(color.r, color.g, color.b));
  }

  setStrokeColor(color: Color): void {
    this.emit(setStrokingRgbColor(color.r, color.g, color.b));
  }

  setLineWidth(width: number): void {
    this.emit(setLineWidth(width));
  }

  setOpacity(alpha: number): void {
    const page = this.requirePage();
    const dict = this.pdfDoc.context.obj({ Type: 'ExtGState', ca: alpha, CA: alpha });
    const name = page.node.newExtGState('GS', dict);
    this.emit(setGraphicsState(name));
  }

  setDash(pattern: readonly number[]): void {
    this.emit(setDashPattern([...pattern], 0));
  }

  pushState(): void {
    this.stack.push({ ...this.state });
    this.emit(pushGraphicsState());
  }

  popState(): void {
    const previous = this.stack.pop();
    if (!previous) {
      throw new RenderError('surface', 'popState without matching pushState');
    }
    this.state = previous;
    this.emit(popGraphicsState());
  }

  rotateAbout(cx: number, cy: number, degrees: number): void {
    this.emit(translate(cx, cy), rotateDegrees(degrees), translate(-cx, -cy));
  }

  translate(dx: number, dy: number): void {
    this.emit(translate(dx, dy));
  }

  drawPath(path: SurfacePath, mode: PaintMode): void {
    let paint: PDFOperator;
    if (mode.fill && mode.stroke) paint = fillAndStroke();
    else if (mode.fill) paint = fill();
    else if (mode.stroke) paint = stroke();
    else paint = endPath();
    this.emit(...pathOperators(path), paint);
  }

  clipTo(path: SurfacePath): void {
    this.emit(...pathOperators(path), clip(), endPath());
  }

  drawImage(source: string, x: number, y: number, width: number, height: number, preserveAspect: boolean): void {
    const image = this.images.get(source);
    if (!image) {
      throw new RenderError('missing_image', `Image file not found: ${source}`);
    }
    let drawWidth = width;
    let drawHeight = height;
    let drawX = x;
    let drawY = y;
    if (preserveAspect && image.width > 0 && image.height > 0) {
      const scale = Math.min(width / image.width, height / image.height);
      drawWidth = image.width * scale;
      drawHeight = image.height * scale;
      drawX = x + (width - drawWidth) / 2;
      drawY = y + (height - drawHeight) / 2;
    }
    this.requirePage().drawImage(image, { x: drawX, y: drawY, width: drawWidth, height: drawHeight });
  }

  measureImage(source: string): ImageSize | undefined {
    const image = this.images.get(source);
    return image ? { width: image.width, height: image.height } : undefined;
  }

  drawText(text: string, x: number, y: number, font: FontSpec, size: number): void {
    const { r, g, b } = this.state.fillColor;
    this.requirePage().drawText(text, {
      x,
      y,
      size,
      font: this.fonts.get(font.family, font.style),
      color: rgb(r, g, b),
    });
  }

  measureTextWidth(text: string, font: FontSpec, size: number): number {
    return this.fonts.get(font.family, font.style).widthOfTextAtSize(text, size);
  }

  private requirePage(): PDFPage {
    if (!this.page) {
      throw new RenderError('surface', 'No page started; call beginPage first');
    }
    return this.page;
  }

  private emit(...operators: PDFOperator[]): void {
    this.requirePage().pushOperators(...operators);
  }
}
