// =============================================================================
// PDF RENDERING
// =============================================================================
// Scene description in, PDF bytes out: validate the card, embed the images it
// references, run the render pass on a pdf-lib surface, serialize.
// =============================================================================

import { parseCard } from '@/lib/card/parse';
import type { Card } from '@/lib/card/types';
import { CardRenderer, type CardRenderReport, type CardRendererOptions } from '@/lib/render/cardRenderer';
import { PdfSurface } from './pdfSurface';

export interface RenderCardPdfResult {
  bytes: Uint8Array;
  report: CardRenderReport;
}

/**
 * Image sources referenced anywhere in the card
 */
export function collectImageSources(card: Card): string[] {
  return [...new Set(card.panels.flatMap((panel) => panel.images.map((image) => image.source)))];
}

/**
 * Render a card (raw or already parsed) to a one-page PDF
 * @throws ValidationError when the card description is invalid
 */
export async function renderCardPdf(input: unknown, options: CardRendererOptions = {}): Promise<RenderCardPdfResult> {
  const card = parseCard(input);
  const renderer = new CardRenderer(options);
  const surface = await PdfSurface.create();

  const sources = collectImageSources(card);
  if (sources.length > 0) {
    await surface.loadImages(sources);
  }
  const report = renderer.renderCard(surface, card);

  return { bytes: await surface.save(), report };
}
