import { describe, it, expect } from 'vitest';
import { resolveRenderConfig } from '@/lib/config';
import { parseShape } from '@/lib/card/parse';
import { PathBuilder } from './pathBuilder';
import { RecordingSurface } from './recordingSurface';
import { resolveFill, ShapeRenderer } from './shapeRenderer';

const origin = { x: 0, y: 0 };

describe('ShapeRenderer', () => {
  const renderer = new ShapeRenderer();

  it('draws a solid rectangle in points', () => {
    const surface = new RecordingSurface();
    const shape = parseShape({ type: 'rectangle', id: 'r', x: 0.5, y: 0.5, width: 4, height: 3, fillColor: '#FF0000' });

    expect(renderer.renderShape(surface, shape, origin)).toEqual({ ok: true });
    expect(surface.operations).toEqual([
      { op: 'pushState' },
      { op: 'setFillColor', color: { r: 1, g: 0, b: 0 } },
      {
        op: 'drawPath',
        path: {
          segments: [
            { op: 'move', x: 36, y: 36 },
            { op: 'line', x: 324, y: 36 },
            { op: 'line', x: 324, y: 252 },
            { op: 'line', x: 36, y: 252 },
            { op: 'close' },
          ],
        },
        mode: { fill: true, stroke: false },
      },
      { op: 'popState' },
    ]);
  });

  it('applies opacity, rotation about the center and stroke', () => {
    const surface = new RecordingSurface();
    const shape = parseShape({
      type: 'circle',
      id: 'c',
      centerX: 1,
      centerY: 1,
      radius: 0.5,
      opacity: 0.5,
      rotation: 45,
      strokeColor: '#0000ff',
      strokeWidth: 2,
      fillColor: '#00ff00',
    });

    renderer.renderShape(surface, shape, { x: 100, y: 0 });
    expect(surface.operations).toEqual([
      { op: 'pushState' },
      { op: 'setOpacity', alpha: 0.5 },
      { op: 'rotateAbout', cx: 172, cy: 72, degrees: 45 },
      { op: 'setStrokeColor', color: { r: 0, g: 0, b: 1 } },
      { op: 'setLineWidth', width: 2 },
      { op: 'setFillColor', color: { r: 0, g: 1, b: 0 } },
      { op: 'drawPath', path: new PathBuilder().circle(172, 72, 36).build(), mode: { fill: true, stroke: true } },
      { op: 'popState' },
    ]);
  });

  it('strokes lines in black at one point by default', () => {
    const surface = new RecordingSurface();
    const shape = parseShape({ type: 'line', id: 'l', startX: 0, startY: 0, endX: 1, endY: 1 });

    renderer.renderShape(surface, shape, origin);
    expect(surface.ofType('setStrokeColor')[0].color).toEqual({ r: 0, g: 0, b: 0 });
    expect(surface.ofType('setLineWidth')[0].width).toBe(1);
    expect(surface.ofType('drawPath')[0]).toEqual({
      op: 'drawPath',
      path: new PathBuilder().moveTo(0, 0).lineTo(72, 72).build(),
      mode: { fill: false, stroke: true },
    });
  });

  it('rotates triangles about their centroid', () => {
    const surface = new RecordingSurface();
    const shape = parseShape({
      type: 'triangle',
      id: 't',
      x1: 0,
      y1: 0,
      x2: 3,
      y2: 0,
      x3: 0,
      y3: 3,
      rotation: 90,
      fillColor: '#000000',
    });

    renderer.renderShape(surface, shape, origin);
    expect(surface.ofType('rotateAbout')).toEqual([{ op: 'rotateAbout', cx: 72, cy: 72, degrees: 90 }]);
    expect(surface.ofType('drawPath')[0].path).toEqual(
      new PathBuilder().polygon([{ x: 0, y: 0 }, { x: 216, y: 0 }, { x: 0, y: 216 }]).build()
    );
  });

  it('draws svg paths scaled from inches and pivots on their bounds', () => {
    const surface = new RecordingSurface();
    const shape = parseShape({
      type: 'svg_path',
      id: 'p',
      pathData: 'M 0 0 L 1 0 L 1 1 Z',
      rotation: 90,
      fillColor: '#000000',
    });

    renderer.renderShape(surface, shape, { x: 10, y: 20 });
    expect(surface.ofType('rotateAbout')).toEqual([{ op: 'rotateAbout', cx: 46, cy: 56, degrees: 90 }]);
    expect(surface.ofType('drawPath')[0].path.segments).toEqual([
      { op: 'move', x: 10, y: 20 },
      { op: 'line', x: 82, y: 20 },
      { op: 'line', x: 82, y: 92 },
      { op: 'close' },
    ]);
  });

  it('clips gradient fills to the outline and strokes afterwards', () => {
    const surface = new RecordingSurface();
    const gradientRenderer = new ShapeRenderer(resolveRenderConfig({ gradientSteps: 2 }));
    const shape = parseShape({
      type: 'rectangle',
      id: 'g',
      x: 0,
      y: 0,
      width: 1,
      height: 1,
      strokeColor: '#000000',
      strokeWidth: 1,
      fill: {
        type: 'linear_gradient',
        stops: [
          { position: 0, color: '#000000' },
          { position: 1, color: '#ffffff' },
        ],
      },
    });

    expect(gradientRenderer.renderShape(surface, shape, origin)).toEqual({ ok: true });
    const outline = new PathBuilder().rect(0, 0, 72, 72).build();
    expect(surface.ofType('clipTo')[0].path).toEqual(outline);
    const paths = surface.ofType('drawPath');
    expect(paths).toHaveLength(3);
    expect(paths[2]).toEqual({ op: 'drawPath', path: outline, mode: { fill: false, stroke: true } });
    expect(surface.stateDepth).toBe(0);
    expect(surface.maxStateDepth).toBe(3);
  });

  it('refuses unexpanded decorative elements', () => {
    const surface = new RecordingSurface();
    const shape = parseShape({ type: 'decorative_element', id: 'd', name: 'pine_tree', x: 0, y: 0 });
    const outcome = renderer.renderShape(surface, shape, origin);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('unsupported_shape');
      expect(outcome.error.elementId).toBe('d');
    }
    expect(surface.operations).toEqual([]);
  });

  it('reports malformed path data as a path_parse failure', () => {
    const surface = new RecordingSurface();
    const shape = parseShape({ type: 'svg_path', id: 'bad', pathData: 'M 1', fillColor: '#000000' });
    const outcome = renderer.renderShape(surface, shape, origin);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('path_parse');
      expect(outcome.error.elementId).toBe('bad');
      expect(outcome.error.message).toBe("Command 'M' expects a multiple of 2 parameters, got 1");
    }
    expect(surface.stateDepth).toBe(0);
  });
});

describe('resolveFill', () => {
  it('prefers the fill style over the legacy fill color', () => {
    expect(resolveFill({ fillColor: '#ff0000' })).toEqual({ type: 'solid', color: '#ff0000' });
    expect(
      resolveFill({ fillColor: '#ff0000', fill: { type: 'solid', color: '#00ff00' } })
    ).toEqual({ type: 'solid', color: '#00ff00' });
    expect(resolveFill({})).toBeUndefined();
  });
});
