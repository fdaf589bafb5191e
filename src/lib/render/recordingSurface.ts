// =============================================================================
// RECORDING SURFACE
// =============================================================================
// In-memory DrawingSurface that logs every call. Used for tests and for
// inspecting what a scene draws without producing a document. Text width is
// a fixed fraction of the font size per character.
// =============================================================================

import type { Color } from '@/lib/card/color';
import type { Point } from '@/lib/card/types';
import { RenderError } from '@/lib/errors';
import type { DrawingSurface, FontSpec, GradientStop, ImageSize, PaintMode, SurfacePath } from './types';

export type SurfaceOperation =
  | { op: 'beginPage'; width: number; height: number }
  | { op: 'setFillColor'; color: Color }
  | { op: 'setStrokeColor'; color: Color }
  | { op: 'setLineWidth'; width: number }
  | { op: 'setOpacity'; alpha: number }
  | { op: 'setDash'; pattern: number[] }
  | { op: 'pushState' }
  | { op: 'popState' }
  | { op: 'rotateAbout'; cx: number; cy: number; degrees: number }
  | { op: 'translate'; dx: number; dy: number }
  | { op: 'drawPath'; path: SurfacePath; mode: PaintMode }
  | { op: 'clipTo'; path: SurfacePath }
  | { op: 'drawImage'; source: string; x: number; y: number; width: number; height: number; preserveAspect: boolean }
  | { op: 'drawText'; text: string; x: number; y: number; font: FontSpec; size: number }
  | { op: 'linearGradient'; start: Point; end: Point; stops: GradientStop[] }
  | { op: 'radialGradient'; center: Point; radius: number; stops: GradientStop[] };

export type SurfaceOperationName = SurfaceOperation['op'];

export interface RecordingSurfaceOptions {
  /** Known images and their natural size in points */
  images?: Record<string, ImageSize>;
  /** Width of one character as a fraction of the font size */
  charWidth?: number;
}

export class RecordingSurface implements DrawingSurface {
  readonly operations: SurfaceOperation[] = [];
  private depth = 0;
  private maxDepth = 0;
  private readonly images: Partial<Record<string, ImageSize>>;
  private readonly charWidth: number;

  constructor(options: RecordingSurfaceOptions = {}) {
    this.images = options.images ?? {};
    this.charWidth = options.charWidth ?? 0.5;
  }

  /** Current nesting of pushState calls */
  get stateDepth(): number {
    return this.depth;
  }

  get maxStateDepth(): number {
    return this.maxDepth;
  }

  /**
   * Operations of one kind, in call order
   */
  ofType<K extends SurfaceOperationName>(op: K): Array<Extract<SurfaceOperation, { op: K }>> {
    const matches: Array<Extract<SurfaceOperation, { op: K }>> = [];
    for (const operation of this.operations) {
      if (isOperation(operation, op)) matches.push(operation);
    }
    return matches;
  }

  clear(): void {
    this.operations.length = 0;
    this.depth = 0;
    this.maxDepth = 0;
  }

  beginPage(width: number, height: number): void {
    this.operations.push({ op: 'beginPage', width, height });
  }

  setFillColor(color: Color): void {
    this.operations.push({ op: 'setFillColor', color });
  }

  setStrokeColor(color: Color): void {
    this.operations.push({ op: 'setStrokeColor', color });
  }

  setLineWidth(width: number): void {
    this.operations.push({ op: 'setLineWidth', width });
  }

  setOpacity(alpha: number): void {
    this.operations.push({ op: 'setOpacity', alpha });
  }

  setDash(pattern: readonly number[]): void {
    this.operations.push({ op: 'setDash', pattern: [...pattern] });
  }

  pushState(): void {
    this.depth++;
    this.maxDepth = Math.max(this.maxDepth, this.depth);
    this.operations.push({ op: 'pushState' });
  }

  popState(): void {
    if (this.depth === 0) {
      throw new RenderError('surface', 'popState without matching pushState');
    }
    this.depth--;
    this.operations.push({ op: 'popState' });
  }

  rotateAbout(cx: number, cy: number, degrees: number): void {
    this.operations.push({ op: 'rotateAbout', cx, cy, degrees });
  }

  translate(dx: number, dy: number): void {
    this.operations.push({ op: 'translate', dx, dy });
  }

  drawPath(path: SurfacePath, mode: PaintMode): void {
    this.operations.push({ op: 'drawPath', path, mode: { ...mode } });
  }

  clipTo(path: SurfacePath): void {
    this.operations.push({ op: 'clipTo', path });
  }

  drawImage(source: string, x: number, y: number, width: number, height: number, preserveAspect: boolean): void {
    if (!this.images[source]) {
      throw new RenderError('missing_image', `Image file not found: ${source}`);
    }
    this.operations.push({ op: 'drawImage', source, x, y, width, height, preserveAspect });
  }

  measureImage(source: string): ImageSize | undefined {
    return this.images[source];
  }

  drawText(text: string, x: number, y: number, font: FontSpec, size: number): void {
    this.operations.push({ op: 'drawText', text, x, y, font: { ...font }, size });
  }

  measureTextWidth(text: string, _font: FontSpec, size: number): number {
    return text.length * size * this.charWidth;
  }
}

/**
 * RecordingSurface that also takes native gradients
 */
export class GradientRecordingSurface extends RecordingSurface {
  linearGradient(start: Point, end: Point, stops: readonly GradientStop[]): void {
    this.operations.push({ op: 'linearGradient', start, end, stops: [...stops] });
  }

  radialGradient(center: Point, radius: number, stops: readonly GradientStop[]): void {
    this.operations.push({ op: 'radialGradient', center, radius, stops: [...stops] });
  }
}

function isOperation<K extends SurfaceOperationName>(
  operation: SurfaceOperation,
  op: K
): operation is Extract<SurfaceOperation, { op: K }> {
  return operation.op === op;
}
