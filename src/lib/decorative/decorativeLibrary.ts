// =============================================================================
// DECORATIVE LIBRARY
// =============================================================================
// Named compositions of basic shapes (trees, ornaments, gift boxes...) that a
// scene places with a decorative_element. Expansion:
//   1. palette = composition roles, overridden by the instance palette
//   2. `{role}` in fillColor / strokeColor → palette color
//   3. positions × scale + anchor, lengths × scale
//   4. rotation (child + instance) mod 360; zIndex inherited when unset
//   5. validate as primitive shapes
//
// The library is an explicit handle passed to the card renderer.
// =============================================================================

import { primitiveShapeSchema } from '@/lib/card/schemas';
import type { DecorativeElement, PrimitiveShape } from '@/lib/card/types';
import { RenderError, ValidationError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import builtinDefinitions from './builtinElements.json';
import { decorativeDefinitionSchema, type DecorativeDefinition, type ShapeTemplate } from './types';

const log = createLogger('DecorativeLibrary');

const PLACEHOLDER_PATTERN = /^\{(.+)\}$/;

/**
 * Which template fields are anchored points and which are plain lengths
 */
const GEOMETRY_FIELDS: Record<ShapeTemplate['type'], { points: Array<[string, string]>; lengths: string[] }> = {
  rectangle: { points: [['x', 'y']], lengths: ['width', 'height'] },
  circle: { points: [['centerX', 'centerY']], lengths: ['radius'] },
  triangle: { points: [['x1', 'y1'], ['x2', 'y2'], ['x3', 'y3']], lengths: [] },
  star: { points: [['centerX', 'centerY']], lengths: ['outerRadius', 'innerRadius'] },
  line: { points: [['startX', 'startY'], ['endX', 'endY']], lengths: [] },
  svg_path: { points: [], lengths: [] },
};

function resolvePlaceholder(value: string | undefined, palette: Record<string, string>): string | undefined {
  if (value === undefined) return undefined;
  const match = PLACEHOLDER_PATTERN.exec(value);
  if (!match) return value;
  return palette[match[1]] ?? value;
}

export class DecorativeLibrary {
  private readonly definitions = new Map<string, DecorativeDefinition>();

  constructor(definitions: readonly unknown[] = []) {
    definitions.forEach((definition) => this.register(definition));
  }

  /**
   * Library preloaded with the bundled compositions
   */
  static withBuiltins(): DecorativeLibrary {
    return new DecorativeLibrary(builtinDefinitions);
  }

  /**
   * Validate and add a composition; a later one with the same name replaces
   * the earlier
   * @throws ValidationError
   */
  register(input: unknown): DecorativeDefinition {
    const result = decorativeDefinitionSchema.safeParse(input);
    if (!result.success) {
      throw ValidationError.fromZod('decorative definition', result.error);
    }
    if (this.definitions.has(result.data.name)) {
      log.warn(`Replacing decorative definition '${result.data.name}'`);
    }
    this.definitions.set(result.data.name, result.data);
    return result.data;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }

  /**
   * @throws RenderError when no composition has this name
   */
  getDefinition(name: string): DecorativeDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      const available = this.names().join(', ') || 'none';
      throw new RenderError('decorative', `Decorative element '${name}' not found in library. Available: ${available}`);
    }
    return definition;
  }

  /**
   * Replace `{role}` placeholders. Unknown roles are left in place and fail
   * validation later.
   */
  resolveColors(definition: DecorativeDefinition, palette?: Record<string, string>): ShapeTemplate[] {
    const merged = { ...definition.colorRoles, ...palette };
    return definition.shapes.map((template) => ({
      ...template,
      fillColor: resolvePlaceholder(template.fillColor, merged),
      strokeColor: resolvePlaceholder(template.strokeColor, merged),
    }));
  }

  /**
   * Scale about the composition origin, move to the instance anchor, add the
   * instance rotation and inherit its zIndex
   */
  applyTransforms(templates: readonly ShapeTemplate[], element: DecorativeElement): ShapeTemplate[] {
    return templates.map((template) => {
      const transformed: ShapeTemplate = { ...template };
      const fields = GEOMETRY_FIELDS[template.type];

      for (const [xKey, yKey] of fields.points) {
        const x = transformed[xKey];
        const y = transformed[yKey];
        if (typeof x === 'number') transformed[xKey] = x * element.scale + element.x;
        if (typeof y === 'number') transformed[yKey] = y * element.scale + element.y;
      }
      for (const key of fields.lengths) {
        const value = transformed[key];
        if (typeof value === 'number') transformed[key] = value * element.scale;
      }

      transformed.rotation = ((template.rotation ?? 0) + element.rotation) % 360;
      transformed.zIndex = template.zIndex ?? element.zIndex;
      return transformed;
    });
  }

  /**
   * Expand an instance into validated primitive shapes
   * @throws RenderError (kind `decorative`)
   */
  expand(element: DecorativeElement): PrimitiveShape[] {
    const definition = this.getDefinition(element.name);
    const templates = this.applyTransforms(this.resolveColors(definition, element.colorPalette), element);

    return templates.map((template, index) => {
      const candidate = { id: `${element.id}-${index}`, ...template };
      const result = primitiveShapeSchema.safeParse(candidate);
      if (!result.success) {
        const cause = ValidationError.fromZod(`${element.name} shape ${index}`, result.error);
        throw new RenderError('decorative', cause.message, element.id, { cause });
      }
      return result.data;
    });
  }
}
