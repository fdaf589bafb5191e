import { describe, it, expect } from 'vitest';
import type { PathSegment } from '@/lib/render/types';
import { interpretPath, pathDataToSegments, quadraticToCubic } from './pathGeometry';

const round = (value: number) => Math.round(value * 1e6) / 1e6 + 0;

function rounded(segments: PathSegment[]): PathSegment[] {
  return segments.map((segment): PathSegment =>
    segment.op === 'curve'
      ? {
          op: 'curve',
          x1: round(segment.x1),
          y1: round(segment.y1),
          x2: round(segment.x2),
          y2: round(segment.y2),
          x: round(segment.x),
          y: round(segment.y),
        }
      : segment
  );
}

describe('interpretPath', () => {
  it('resolves absolute lines and closes', () => {
    expect(pathDataToSegments('M 0 0 L 10 0 L 10 10 Z')).toEqual([
      { op: 'move', x: 0, y: 0 },
      { op: 'line', x: 10, y: 0 },
      { op: 'line', x: 10, y: 10 },
      { op: 'close' },
    ]);
  });

  it('offsets relative commands from the current point', () => {
    expect(pathDataToSegments('M 5 5 l 10 0 v 10 h -10 z')).toEqual([
      { op: 'move', x: 5, y: 5 },
      { op: 'line', x: 15, y: 5 },
      { op: 'line', x: 15, y: 15 },
      { op: 'line', x: 5, y: 15 },
      { op: 'close' },
    ]);
  });

  it('returns to the subpath start after Z', () => {
    expect(pathDataToSegments('M 1 1 L 2 1 Z l 1 0')).toEqual([
      { op: 'move', x: 1, y: 1 },
      { op: 'line', x: 2, y: 1 },
      { op: 'close' },
      { op: 'line', x: 2, y: 1 },
    ]);
  });

  it('starts with an implicit move at the origin when the path begins with a draw', () => {
    expect(interpretPath([{ command: 'L', params: [3, 4] }])).toEqual([
      { op: 'move', x: 0, y: 0 },
      { op: 'line', x: 3, y: 4 },
    ]);
  });

  it('reflects the previous cubic control point for S', () => {
    expect(pathDataToSegments('M 0 0 C 0 10 10 10 10 0 S 20 -10 20 0')).toEqual([
      { op: 'move', x: 0, y: 0 },
      { op: 'curve', x1: 0, y1: 10, x2: 10, y2: 10, x: 10, y: 0 },
      { op: 'curve', x1: 10, y1: -10, x2: 20, y2: -10, x: 20, y: 0 },
    ]);
  });

  it('uses the current point as S control after a non-cubic command', () => {
    expect(pathDataToSegments('M 0 0 L 10 0 S 20 10 30 0')).toEqual([
      { op: 'move', x: 0, y: 0 },
      { op: 'line', x: 10, y: 0 },
      { op: 'curve', x1: 10, y1: 0, x2: 20, y2: 10, x: 30, y: 0 },
    ]);
  });

  it('elevates quadratics to cubics', () => {
    expect(rounded(pathDataToSegments('M 0 0 Q 3 6 6 0'))).toEqual([
      { op: 'move', x: 0, y: 0 },
      { op: 'curve', x1: 2, y1: 4, x2: 4, y2: 4, x: 6, y: 0 },
    ]);
  });

  it('reflects the previous quadratic control for T', () => {
    expect(rounded(pathDataToSegments('M 0 0 Q 3 6 6 0 T 12 0'))).toEqual([
      { op: 'move', x: 0, y: 0 },
      { op: 'curve', x1: 2, y1: 4, x2: 4, y2: 4, x: 6, y: 0 },
      { op: 'curve', x1: 8, y1: -4, x2: 10, y2: -4, x: 12, y: 0 },
    ]);
  });

  it('approximates arcs with a line to the endpoint', () => {
    expect(pathDataToSegments('M 0 0 a 5 5 0 0 1 10 0')).toEqual([
      { op: 'move', x: 0, y: 0 },
      { op: 'line', x: 10, y: 0 },
    ]);
  });

  it('drops a Z that has nothing to close', () => {
    expect(interpretPath([{ command: 'Z', params: [] }])).toEqual([]);
  });
});

describe('quadraticToCubic', () => {
  it('places controls two thirds toward the quadratic control', () => {
    const { c1, c2 } = quadraticToCubic({ x: 0, y: 0 }, { x: 3, y: 3 }, { x: 6, y: 0 });
    expect(c1.x).toBeCloseTo(2);
    expect(c1.y).toBeCloseTo(2);
    expect(c2.x).toBeCloseTo(4);
    expect(c2.y).toBeCloseTo(2);
  });
});
