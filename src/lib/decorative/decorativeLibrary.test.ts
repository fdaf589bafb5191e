import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseShape } from '@/lib/card/parse';
import type { DecorativeElement } from '@/lib/card/types';
import { RenderError, ValidationError } from '@/lib/errors';
import { DecorativeLibrary } from './decorativeLibrary';

function instance(overrides: Record<string, unknown>): DecorativeElement {
  const shape = parseShape({ type: 'decorative_element', id: 'deco', x: 0, y: 0, ...overrides });
  if (shape.type !== 'decorative_element') throw new Error('expected a decorative element');
  return shape;
}

const badge = {
  name: 'badge',
  defaultWidth: 1,
  defaultHeight: 1,
  colorRoles: { main: '#ff0000' },
  shapes: [
    { type: 'circle', centerX: 0.5, centerY: 0.5, radius: 0.5, fillColor: '{main}', rotation: 20, zIndex: 7 },
    { type: 'line', startX: 0, startY: 0, endX: 1, endY: 0, strokeColor: '#000000' },
  ],
};

describe('DecorativeLibrary', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('ships the bundled compositions', () => {
    expect(DecorativeLibrary.withBuiltins().names()).toEqual(['pine_tree', 'ornament', 'gift_box', 'snowflake']);
  });

  it('scales and anchors children, resolving palette roles', () => {
    const library = DecorativeLibrary.withBuiltins();
    const shapes = library.expand(instance({ id: 'gift', name: 'gift_box', x: 1, y: 2, scale: 2, zIndex: 3 }));

    expect(shapes).toHaveLength(3);
    expect(shapes[0]).toEqual({
      type: 'rectangle',
      id: 'gift-0',
      x: 1,
      y: 2,
      width: 1.6,
      height: 1.6,
      fillColor: '#1565c0',
      rotation: 0,
      zIndex: 3,
      opacity: 1,
      strokeWidth: 0,
    });
    expect(shapes.map((shape) => shape.id)).toEqual(['gift-0', 'gift-1', 'gift-2']);
    const ribbon = shapes[1];
    expect(ribbon.type === 'rectangle' && ribbon.x).toBeCloseTo(1.7);
    expect(ribbon.fillColor).toBe('#ffd54f');
  });

  it('lets the instance palette override roles', () => {
    const library = DecorativeLibrary.withBuiltins();
    const shapes = library.expand(instance({ name: 'gift_box', colorPalette: { wrap: '222222' } }));
    expect(shapes.map((shape) => shape.fillColor)).toEqual(['#222222', '#ffd54f', '#ffd54f']);
  });

  it('keeps a child zIndex and adds rotations modulo 360', () => {
    const library = new DecorativeLibrary([badge]);
    const [circle, line] = library.expand(instance({ name: 'badge', rotation: 350, zIndex: 2 }));

    expect(circle.rotation).toBe(10);
    expect(circle.zIndex).toBe(7);
    expect(line.rotation).toBe(350);
    expect(line.zIndex).toBe(2);
  });

  it('scales radii without moving them', () => {
    const library = new DecorativeLibrary([badge]);
    const [circle] = library.expand(instance({ name: 'badge', x: 1, y: 1, scale: 3 }));
    expect(circle).toMatchObject({ type: 'circle', centerX: 2.5, centerY: 2.5, radius: 1.5 });
  });

  it('raises a decorative error for unknown names', () => {
    const library = DecorativeLibrary.withBuiltins();
    expect(() => library.expand(instance({ name: 'reindeer' }))).toThrow(
      "Decorative element 'reindeer' not found in library. Available: pine_tree, ornament, gift_box, snowflake"
    );
    expect(() => new DecorativeLibrary().getDefinition('x')).toThrow('Available: none');
  });

  it('fails expansion when a role stays unresolved', () => {
    const library = new DecorativeLibrary([
      { ...badge, name: 'broken', shapes: [{ type: 'circle', centerX: 0, centerY: 0, radius: 1, fillColor: '{glow}' }] },
    ]);

    let caught: unknown;
    try {
      library.expand(instance({ id: 'b1', name: 'broken' }));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RenderError);
    if (caught instanceof RenderError) {
      expect(caught.kind).toBe('decorative');
      expect(caught.elementId).toBe('b1');
      expect(caught.cause).toBeInstanceOf(ValidationError);
    }
  });

  it('validates registered definitions', () => {
    const library = new DecorativeLibrary();
    expect(() => library.register({ name: 'empty', defaultWidth: 1, defaultHeight: 1, colorRoles: {}, shapes: [] })).toThrow(
      ValidationError
    );
    expect(library.has('empty')).toBe(false);
  });

  it('warns when a definition is replaced', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const library = new DecorativeLibrary([badge]);
    library.register({ ...badge, description: 'second' });

    expect(warn).toHaveBeenCalledWith("[DecorativeLibrary] Replacing decorative definition 'badge'");
    expect(library.getDefinition('badge').description).toBe('second');
  });

  it('puts the pine tree topper above the foliage', () => {
    const shapes = DecorativeLibrary.withBuiltins().expand(instance({ name: 'pine_tree' }));
    expect(shapes.map((shape) => shape.type)).toEqual(['rectangle', 'triangle', 'triangle', 'triangle', 'star']);
    expect(shapes.map((shape) => shape.zIndex)).toEqual([0, 0, 0, 0, 1]);
  });
});

describe('DecorativeLibrary scaling', () => {
  // Anchored coordinates per shape type, and plain lengths
  const GEOMETRY: Record<string, { xs: string[]; ys: string[]; lengths: string[] }> = {
    rectangle: { xs: ['x'], ys: ['y'], lengths: ['width', 'height'] },
    circle: { xs: ['centerX'], ys: ['centerY'], lengths: ['radius'] },
    triangle: { xs: ['x1', 'x2', 'x3'], ys: ['y1', 'y2', 'y3'], lengths: [] },
    star: { xs: ['centerX'], ys: ['centerY'], lengths: ['outerRadius', 'innerRadius'] },
    line: { xs: ['startX', 'endX'], ys: ['startY', 'endY'], lengths: [] },
  };

  function numberField(shape: object, key: string): number {
    const value: unknown = Object.entries(shape).find(([name]) => name === key)?.[1];
    if (typeof value !== 'number') throw new Error(`${key} is not a number`);
    return value;
  }

  const library = DecorativeLibrary.withBuiltins();

  it.each(library.names())('doubles every dimension from the anchor of %s', (name) => {
    const anchor = { x: 1, y: 2 };
    const single = library.expand(instance({ name, ...anchor, scale: 1 }));
    const double = library.expand(instance({ name, ...anchor, scale: 2 }));

    expect(double).toHaveLength(single.length);
    single.forEach((child, i) => {
      const scaled = double[i];
      expect(scaled.type).toBe(child.type);
      expect(scaled.fillColor).toBe(child.fillColor);
      expect(scaled.strokeColor).toBe(child.strokeColor);

      const fields = GEOMETRY[child.type];
      for (const key of fields.xs) {
        expect(numberField(scaled, key) - anchor.x).toBeCloseTo(2 * (numberField(child, key) - anchor.x));
      }
      for (const key of fields.ys) {
        expect(numberField(scaled, key) - anchor.y).toBeCloseTo(2 * (numberField(child, key) - anchor.y));
      }
      for (const key of fields.lengths) {
        expect(numberField(scaled, key)).toBeCloseTo(2 * numberField(child, key));
      }
    });
  });
});
