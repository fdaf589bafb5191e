// =============================================================================
// CARD RENDERER
// =============================================================================
// One synchronous pass over a card: page, panels in order, elements sorted by
// (zIndex, declaration order), fold guides last. A failing element is logged
// and recorded in the report; the pass always continues.
// =============================================================================

import { resolveRenderConfig, type RenderConfig } from '@/lib/config';
import { Coordinates, MIN_DPI, RECOMMENDED_DPI } from '@/lib/coordinates';
import { BLACK, colorFromHex } from '@/lib/card/color';
import type {
  AdjustmentResult,
  Card,
  ImageElement,
  Panel,
  Point,
  PrimitiveShape,
  Shape,
  TextElement,
} from '@/lib/card/types';
import { DecorativeLibrary } from '@/lib/decorative/decorativeLibrary';
import { failed, RENDERED, RenderError, toRenderError, type RenderOutcome } from '@/lib/errors';
import { createLogger, setLogLevel } from '@/lib/logger';
import { calculateLineHeight } from '@/lib/text-measurement-utils';
import { fitText } from '@/lib/text/textFitting';
import { ClippingRenderer } from './clippingRenderer';
import { clampToSafeArea, computeImageSize } from './imageSizing';
import { rectPath } from './pathBuilder';
import { drawBorder, drawFoldLines } from './printFeatures';
import { ShapeRenderer } from './shapeRenderer';
import type { Box, DrawingSurface, FontSpec } from './types';

const log = createLogger('CardRenderer');

// =============================================================================
// TYPES
// =============================================================================

export interface TextAdjustmentRecord {
  elementId: string;
  adjustment: AdjustmentResult;
}

export interface CardRenderReport {
  panelsRendered: number;
  elementsRendered: number;
  failures: RenderError[];
  textAdjustments: TextAdjustmentRecord[];
}

export interface CardRendererOptions {
  config?: Partial<RenderConfig>;
  /** Compositions for decorative_element shapes; defaults to the bundled set */
  decorativeLibrary?: DecorativeLibrary;
}

type PanelEntry =
  | { kind: 'shape'; zIndex: number; order: number; element: Shape }
  | { kind: 'image'; zIndex: number; order: number; element: ImageElement }
  | { kind: 'text'; zIndex: number; order: number; element: TextElement };

/**
 * Pixel width over drawn width; warns under MIN_DPI
 */
function warnOnLowResolution(image: ImageElement, pixelWidth: number, drawnWidthIn: number): void {
  const dpi = Coordinates.effectiveDpi(pixelWidth, drawnWidthIn);
  if (dpi > 0 && dpi < MIN_DPI) {
    log.warn(`Image ${image.id} prints at ${Math.round(dpi)} DPI (minimum ${MIN_DPI})`);
  } else if (dpi > 0 && dpi < RECOMMENDED_DPI) {
    log.debug(`Image ${image.id} prints at ${Math.round(dpi)} DPI (recommended ${RECOMMENDED_DPI})`);
  }
}

export function createEmptyReport(): CardRenderReport {
  return { panelsRendered: 0, elementsRendered: 0, failures: [], textAdjustments: [] };
}

/**
 * Shapes, then images, then text, stably sorted by zIndex
 */
export function orderPanelElements(panel: Panel): PanelEntry[] {
  const entries: PanelEntry[] = [];
  panel.shapes.forEach((element) =>
    entries.push({ kind: 'shape', zIndex: element.zIndex, order: entries.length, element })
  );
  panel.images.forEach((element) =>
    entries.push({ kind: 'image', zIndex: element.zIndex, order: entries.length, element })
  );
  panel.texts.forEach((element) =>
    entries.push({ kind: 'text', zIndex: element.zIndex, order: entries.length, element })
  );
  return entries.sort((a, b) => a.zIndex - b.zIndex || a.order - b.order);
}

// =============================================================================
// RENDERER
// =============================================================================

export class CardRenderer {
  readonly config: RenderConfig;
  private readonly library: DecorativeLibrary;
  private readonly shapes: ShapeRenderer;
  private readonly clipping: ClippingRenderer;

  constructor(options: CardRendererOptions = {}) {
    this.config = resolveRenderConfig(options.config);
    this.library = options.decorativeLibrary ?? DecorativeLibrary.withBuiltins();
    this.shapes = new ShapeRenderer(this.config);
    this.clipping = new ClippingRenderer(this.config);
  }

  renderCard(surface: DrawingSurface, card: Card): CardRenderReport {
    setLogLevel(this.config.logLevel);
    const ppi = this.config.pointsPerInch;
    const report = createEmptyReport();

    log.info(`Rendering '${card.name}' (${card.foldType}, ${card.panels.length} panels)`);
    surface.beginPage(this.config.pageWidthIn * ppi, this.config.pageHeightIn * ppi);

    for (const panel of card.panels) {
      this.renderPanel(surface, panel, report);
    }

    if (this.config.drawFoldLines) {
      drawFoldLines(surface, card.foldType, this.config);
    }

    if (report.failures.length > 0) {
      log.warn(`Completed with ${report.failures.length} failed element(s)`);
    } else {
      log.info(`Completed: ${report.elementsRendered} elements on ${report.panelsRendered} panels`);
    }
    return report;
  }

  renderPanel(surface: DrawingSurface, panel: Panel, report: CardRenderReport = createEmptyReport()): CardRenderReport {
    const ppi = this.config.pointsPerInch;
    const box: Box = { x: panel.x * ppi, y: panel.y * ppi, width: panel.width * ppi, height: panel.height * ppi };
    const offset: Point = { x: box.x, y: box.y };

    surface.pushState();
    try {
      if (panel.rotation !== 0) {
        surface.rotateAbout(box.x + box.width / 2, box.y + box.height / 2, panel.rotation);
      }
      this.drawPanelFrame(surface, panel, box, report);

      for (const entry of orderPanelElements(panel)) {
        const outcome = this.renderEntry(surface, entry, panel, offset, report);
        if (outcome.ok) {
          report.elementsRendered++;
        } else {
          log.warn(`Element ${outcome.error.elementId ?? entry.element.id} failed: ${outcome.error.message}`);
          report.failures.push(outcome.error);
        }
      }
    } finally {
      surface.popState();
    }

    report.panelsRendered++;
    return report;
  }

  /**
   * Fit and draw a text element. Lines stack downward from the first
   * baseline; alignment anchors at x.
   */
  renderText(
    surface: DrawingSurface,
    text: TextElement,
    panel: Pick<Panel, 'height'>,
    offset: Point
  ): { outcome: RenderOutcome; adjustment?: AdjustmentResult } {
    const ppi = this.config.pointsPerInch;
    const font: FontSpec = { family: text.fontFamily, style: text.fontStyle };

    try {
      const fitted = fitText(text, {
        measure: (content, size) => surface.measureTextWidth(content, font, size),
        availableHeight: panel.height * ppi,
        config: this.config,
      });
      const anchor = Coordinates.panelToPage(text, offset, ppi);
      const lineHeight = calculateLineHeight(fitted.fontSize, this.config.lineHeightFactor);

      surface.pushState();
      try {
        surface.setFillColor(text.color ? colorFromHex(text.color) : BLACK);
        if (text.rotation !== 0) surface.rotateAbout(anchor.x, anchor.y, text.rotation);

        fitted.lines.forEach((line, i) => {
          const width = surface.measureTextWidth(line, font, fitted.fontSize);
          let x = anchor.x;
          if (text.alignment === 'center') x -= width / 2;
          else if (text.alignment === 'right') x -= width;
          surface.drawText(line, x, anchor.y - i * lineHeight, font, fitted.fontSize);
        });
      } finally {
        surface.popState();
      }

      return {
        outcome: RENDERED,
        adjustment: text.width !== undefined ? fitted.adjustment : undefined,
      };
    } catch (error) {
      return { outcome: failed(toRenderError(error, 'text', text.id)) };
    }
  }

  renderImage(surface: DrawingSurface, image: ImageElement, panel: Pick<Panel, 'width' | 'height'>, offset: Point): RenderOutcome {
    const ppi = this.config.pointsPerInch;
    const natural = surface.measureImage(image.source);
    if (!natural) {
      return failed(new RenderError('missing_image', `Image file not found: ${image.source}`, image.id));
    }

    const sizeIn = computeImageSize(
      { width: natural.width / ppi, height: natural.height / ppi },
      { width: image.width, height: image.height },
      image.preserveAspect,
      { width: panel.width, height: panel.height }
    );
    warnOnLowResolution(image, natural.width, sizeIn.width);

    const size = { width: sizeIn.width * ppi, height: sizeIn.height * ppi };
    let position = Coordinates.panelToPage(image, offset, ppi);
    if (this.config.clampImagesToSafeArea) {
      position = clampToSafeArea(position, size, this.config);
    }

    try {
      surface.pushState();
      try {
        if (image.opacity < 1) surface.setOpacity(image.opacity);
        if (image.rotation !== 0) {
          surface.rotateAbout(position.x + size.width / 2, position.y + size.height / 2, image.rotation);
        }
        return this.clipping.renderClippedImage(
          surface,
          { source: image.source, preserveAspect: image.preserveAspect, ...position, ...size },
          image.clipMask,
          image.id
        );
      } finally {
        surface.popState();
      }
    } catch (error) {
      return failed(toRenderError(error, 'surface', image.id));
    }
  }

  private renderEntry(
    surface: DrawingSurface,
    entry: PanelEntry,
    panel: Panel,
    offset: Point,
    report: CardRenderReport
  ): RenderOutcome {
    switch (entry.kind) {
      case 'shape':
        return this.renderShapeEntry(surface, entry.element, offset);
      case 'image':
        return this.renderImage(surface, entry.element, panel, offset);
      case 'text': {
        const { outcome, adjustment } = this.renderText(surface, entry.element, panel, offset);
        if (adjustment) {
          report.textAdjustments.push({ elementId: entry.element.id, adjustment });
        }
        return outcome;
      }
    }
  }

  private renderShapeEntry(surface: DrawingSurface, shape: Shape, offset: Point): RenderOutcome {
    if (shape.type !== 'decorative_element') {
      return this.shapes.renderShape(surface, shape, offset);
    }

    let components: PrimitiveShape[];
    try {
      components = this.library.expand(shape);
    } catch (error) {
      return failed(toRenderError(error, 'decorative', shape.id));
    }

    // Every child is drawn; the first failure is reported for the element
    let firstFailure: RenderOutcome | undefined;
    for (const component of components) {
      const outcome = this.shapes.renderShape(surface, component, offset);
      if (outcome.ok) continue;
      if (firstFailure) {
        log.warn(`Decorative child ${component.id} failed: ${outcome.error.message}`);
      } else {
        firstFailure = outcome;
      }
    }
    return firstFailure ?? RENDERED;
  }

  private drawPanelFrame(surface: DrawingSurface, panel: Panel, box: Box, report: CardRenderReport): void {
    try {
      if (panel.backgroundColor) {
        surface.pushState();
        try {
          surface.setFillColor(colorFromHex(panel.backgroundColor));
          surface.drawPath(rectPath(box), { fill: true, stroke: false });
        } finally {
          surface.popState();
        }
      }
      if (panel.border) {
        drawBorder(surface, box, panel.border);
      }
    } catch (error) {
      const renderError = toRenderError(error, 'surface', panel.id);
      log.warn(`Panel ${panel.id} frame failed: ${renderError.message}`);
      report.failures.push(renderError);
    }
  }
}
