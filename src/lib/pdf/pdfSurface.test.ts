import { describe, it, expect, vi, afterEach } from 'vitest';
import { StandardFonts } from 'pdf-lib';
import { RenderError } from '@/lib/errors';
import { PathBuilder } from '@/lib/render/pathBuilder';
import { pathOperators, PdfSurface } from './pdfSurface';

// 1×1 RGBA PNG
const PIXEL_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==',
  'base64'
);

const HEADER = '%PDF';

function header(bytes: Uint8Array): string {
  return Buffer.from(bytes.slice(0, 4)).toString('latin1');
}

describe('PdfSurface', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes paths, text and state changes into a valid document', async () => {
    const surface = await PdfSurface.create();
    surface.beginPage(612, 792);
    surface.pushState();
    surface.setOpacity(0.5);
    surface.setFillColor({ r: 1, g: 0, b: 0 });
    surface.rotateAbout(100, 100, 45);
    surface.drawPath(new PathBuilder().rect(10, 10, 100, 50).build(), { fill: true, stroke: false });
    surface.setDash([3, 3]);
    surface.clipTo(new PathBuilder().circle(50, 50, 20).build());
    surface.drawText('Hello', 20, 20, { family: 'Helvetica', style: 'bold' }, 12);
    surface.popState();

    const bytes = await surface.save();
    expect(header(bytes)).toBe(HEADER);
    expect(surface.pdfDoc.getPageCount()).toBe(1);
    expect(surface.pdfDoc.getPage(0).getSize()).toEqual({ width: 612, height: 792 });
  });

  it('measures text with the standard font metrics', async () => {
    const surface = await PdfSurface.create();
    const helvetica = surface.pdfDoc.embedStandardFont(StandardFonts.Helvetica);
    expect(surface.measureTextWidth('Hello', { family: 'Arial', style: 'normal' }, 12)).toBe(
      helvetica.widthOfTextAtSize('Hello', 12)
    );
  });

  it('embeds PNG images and reports their natural size', async () => {
    const surface = await PdfSurface.create();
    await surface.embedImage('pixel.png', PIXEL_PNG);
    surface.beginPage(612, 792);

    expect(surface.measureImage('pixel.png')).toEqual({ width: 1, height: 1 });
    surface.drawImage('pixel.png', 10, 10, 100, 50, true);
    expect(header(await surface.save())).toBe(HEADER);
  });

  it('rejects bytes that are not PNG or JPEG', async () => {
    const surface = await PdfSurface.create();
    await expect(surface.embedImage('notes.txt', new Uint8Array([1, 2, 3, 4]))).rejects.toThrow(
      'Unsupported image format: notes.txt'
    );
  });

  it('skips image files that cannot be read', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const surface = await PdfSurface.create();

    expect(await surface.loadImages(['/nonexistent/card-photo.png'])).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(surface.measureImage('/nonexistent/card-photo.png')).toBeUndefined();
  });

  it('fails to draw images that were never embedded', async () => {
    const surface = await PdfSurface.create();
    surface.beginPage(612, 792);
    expect(() => surface.drawImage('missing.png', 0, 0, 10, 10, true)).toThrow(RenderError);
  });

  it('requires a page before drawing', async () => {
    const surface = await PdfSurface.create();
    expect(() => surface.setLineWidth(1)).toThrow('No page started; call beginPage first');
  });

  it('rejects unbalanced popState', async () => {
    const surface = await PdfSurface.create();
    surface.beginPage(100, 100);
    expect(() => surface.popState()).toThrow('popState without matching pushState');
  });
});

describe('pathOperators', () => {
  it('emits one operator per segment', () => {
    const operators = pathOperators(new PathBuilder().moveTo(0, 0).lineTo(1, 1).curveTo(1, 2, 3, 4, 5, 6).close().build());
    expect(operators.map((operator) => operator.toString())).toEqual(['0 0 m', '1 1 l', '1 2 3 4 5 6 c', 'h']);
  });
});
