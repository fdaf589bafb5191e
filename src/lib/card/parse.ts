import type { z } from 'zod';
import { ValidationError } from '@/lib/errors';
import {
  cardSchema,
  clipMaskSchema,
  fillStyleSchema,
  imageElementSchema,
  panelSchema,
  primitiveShapeSchema,
  shapeSchema,
  textElementSchema,
} from './schemas';
import type {
  Card,
  ClipMask,
  FillStyle,
  ImageElement,
  Panel,
  PrimitiveShape,
  Shape,
  TextElement,
} from './types';

/**
 * Validate `input` against `schema`, throwing ValidationError on failure
 */
function parseWith<S extends z.ZodTypeAny>(schema: S, subject: string, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(subject, result.error);
  }
  return result.data;
}

export const parseShape = (input: unknown): Shape => parseWith(shapeSchema, 'shape', input);

export const parsePrimitiveShape = (input: unknown): PrimitiveShape =>
  parseWith(primitiveShapeSchema, 'shape', input);

export const parseFillStyle = (input: unknown): FillStyle => parseWith(fillStyleSchema, 'fill style', input);

export const parseClipMask = (input: unknown): ClipMask => parseWith(clipMaskSchema, 'clip mask', input);

export const parseTextElement = (input: unknown): TextElement =>
  parseWith(textElementSchema, 'text element', input);

export const parseImageElement = (input: unknown): ImageElement =>
  parseWith(imageElementSchema, 'image element', input);

export const parsePanel = (input: unknown): Panel => parseWith(panelSchema, 'panel', input);

export const parseCard = (input: unknown): Card => parseWith(cardSchema, 'card', input);
