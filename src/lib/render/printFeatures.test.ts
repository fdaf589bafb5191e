import { describe, it, expect } from 'vitest';
import { BORDER_DASH_PATTERNS, drawBorder, drawFoldLines, foldLineSegments, foldPanelFrames } from './printFeatures';
import { PathBuilder } from './pathBuilder';
import { RecordingSurface } from './recordingSurface';

describe('foldPanelFrames', () => {
  it('lays out half-fold panels on a letter page', () => {
    expect(foldPanelFrames('half_fold')).toEqual([
      { position: 'front', x: 4.25, y: 0, width: 4.25, height: 5.5, rotation: 0 },
      { position: 'back', x: 0, y: 0, width: 4.25, height: 5.5, rotation: 0 },
      { position: 'inside_left', x: 0, y: 5.5, width: 4.25, height: 5.5, rotation: 0 },
      { position: 'inside_right', x: 4.25, y: 5.5, width: 4.25, height: 5.5, rotation: 0 },
    ]);
  });

  it('turns the outside of a quarter fold upside down', () => {
    const frames = foldPanelFrames('quarter_fold');
    expect(frames.filter((frame) => frame.rotation === 180).map((frame) => frame.position)).toEqual(['front', 'back']);
  });

  it('splits tri folds into thirds', () => {
    const frames = foldPanelFrames('tri_fold', { width: 9, height: 12 });
    expect(frames.map((frame) => [frame.position, frame.x, frame.width])).toEqual([
      ['left', 0, 3],
      ['center', 3, 3],
      ['right', 6, 3],
    ]);
  });
});

describe('foldLineSegments', () => {
  it('places fold lines per fold type', () => {
    expect(foldLineSegments('half_fold', 612, 792)).toEqual([{ x1: 0, y1: 396, x2: 612, y2: 396 }]);
    expect(foldLineSegments('tri_fold', 612, 792)).toEqual([
      { x1: 204, y1: 0, x2: 204, y2: 792 },
      { x1: 408, y1: 0, x2: 408, y2: 792 },
    ]);
  });
});

describe('drawFoldLines', () => {
  it('strokes light gray dashed guides in one path', () => {
    const surface = new RecordingSurface();
    drawFoldLines(surface, 'quarter_fold');

    expect(surface.operations).toEqual([
      { op: 'pushState' },
      { op: 'setStrokeColor', color: { r: 0.7, g: 0.7, b: 0.7 } },
      { op: 'setLineWidth', width: 0.5 },
      { op: 'setDash', pattern: [3, 3] },
      {
        op: 'drawPath',
        path: new PathBuilder().moveTo(0, 396).lineTo(612, 396).moveTo(306, 0).lineTo(306, 792).build(),
        mode: { fill: false, stroke: true },
      },
      { op: 'popState' },
    ]);
  });
});

describe('drawBorder', () => {
  const box = { x: 10, y: 20, width: 100, height: 50 };

  it('uses the dash pattern of the border style', () => {
    const surface = new RecordingSurface();
    drawBorder(surface, box, { style: 'dashed', width: 2, color: '#ff0000', cornerRadius: 0 });

    expect(surface.ofType('setDash')).toEqual([{ op: 'setDash', pattern: [6, 3] }]);
    expect(surface.ofType('setLineWidth')[0].width).toBe(2);
    expect(surface.ofType('drawPath')[0].path).toEqual(new PathBuilder().rect(10, 20, 100, 50).build());
  });

  it('draws solid borders without a dash and rounds corners', () => {
    const surface = new RecordingSurface();
    drawBorder(surface, box, { style: 'solid', width: 1, color: '#000000', cornerRadius: 8 });

    expect(surface.ofType('setDash')).toEqual([]);
    expect(surface.ofType('drawPath')[0].path).toEqual(new PathBuilder().roundedRect(10, 20, 100, 50, 8).build());
    expect(surface.stateDepth).toBe(0);
  });

  it('defines a pattern for every style', () => {
    expect(Object.keys(BORDER_DASH_PATTERNS)).toEqual(['solid', 'dashed', 'dotted', 'decorative']);
  });
});
