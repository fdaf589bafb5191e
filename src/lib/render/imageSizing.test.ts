import { describe, it, expect } from 'vitest';
import { DEFAULT_RENDER_CONFIG } from '@/lib/config';
import { clampToSafeArea, computeImageSize } from './imageSizing';

const natural = { width: 4, height: 2 };
const panel = { width: 4.25, height: 5.5 };

describe('computeImageSize', () => {
  it('fits inside both requested dimensions when preserving aspect', () => {
    expect(computeImageSize(natural, { width: 3, height: 3 }, true, panel)).toEqual({ width: 3, height: 1.5 });
    expect(computeImageSize(natural, { width: 4, height: 1 }, true, panel)).toEqual({ width: 2, height: 1 });
  });

  it('stretches to both dimensions otherwise', () => {
    expect(computeImageSize(natural, { width: 3, height: 3 }, false, panel)).toEqual({ width: 3, height: 3 });
  });

  it('derives the missing dimension from the aspect ratio', () => {
    expect(computeImageSize(natural, { width: 3 }, true, panel)).toEqual({ width: 3, height: 1.5 });
    expect(computeImageSize(natural, { height: 1 }, true, panel)).toEqual({ width: 2, height: 1 });
  });

  it('keeps the natural other dimension without aspect preservation', () => {
    expect(computeImageSize(natural, { width: 3 }, false, panel)).toEqual({ width: 3, height: 2 });
  });

  it('treats a zero dimension as unset', () => {
    expect(computeImageSize(natural, { width: 0, height: 1 }, true, panel)).toEqual({ width: 2, height: 1 });
  });

  it('scales the natural size down to the panel', () => {
    const size = computeImageSize({ width: 10, height: 5 }, {}, true, panel);
    expect(size.width).toBeCloseTo(4.25);
    expect(size.height).toBeCloseTo(2.125);
    expect(computeImageSize(natural, {}, true, panel)).toEqual(natural);
  });
});

describe('clampToSafeArea', () => {
  const size = { width: 100, height: 100 };

  it('pushes images inside the quarter-inch margin', () => {
    expect(clampToSafeArea({ x: 0, y: 0 }, size, DEFAULT_RENDER_CONFIG)).toEqual({ x: 18, y: 18 });
    expect(clampToSafeArea({ x: 600, y: 780 }, size, DEFAULT_RENDER_CONFIG)).toEqual({ x: 494, y: 674 });
  });

  it('leaves images already inside alone', () => {
    expect(clampToSafeArea({ x: 200, y: 300 }, size, DEFAULT_RENDER_CONFIG)).toEqual({ x: 200, y: 300 });
  });
});
