import { ValidationError } from '@/lib/errors';

/**
 * RGB color, channels in [0, 1]
 */
export interface Color {
  r: number;
  g: number;
  b: number;
}

export const BLACK: Color = { r: 0, g: 0, b: 0 };
export const WHITE: Color = { r: 1, g: 1, b: 1 };

const HEX_PATTERN = /^#?([0-9a-fA-F]{6})$/;

export function isHexColor(value: string): boolean {
  return HEX_PATTERN.test(value);
}

/**
 * Add the leading '#' when missing. Does not validate.
 */
export function normalizeHex(value: string): string {
  return value.startsWith('#') ? value : `#${value}`;
}

/**
 * Parse '#RRGGBB' or 'RRGGBB'
 */
export function colorFromHex(hex: string): Color {
  const match = HEX_PATTERN.exec(hex);
  if (!match) {
    throw new ValidationError('color', [{ path: '', message: `'${hex}' is not a #RRGGBB color` }]);
  }
  const digits = match[1];
  return {
    r: parseInt(digits.substring(0, 2), 16) / 255,
    g: parseInt(digits.substring(2, 4), 16) / 255,
    b: parseInt(digits.substring(4, 6), 16) / 255,
  };
}

function channelToHex(value: number): string {
  const clamped = Math.min(1, Math.max(0, value));
  return Math.round(clamped * 255).toString(16).padStart(2, '0');
}

/**
 * Lowercase '#rrggbb'
 */
export function colorToHex(color: Color): string {
  return `#${channelToHex(color.r)}${channelToHex(color.g)}${channelToHex(color.b)}`;
}

export function grayColor(level: number): Color {
  return { r: level, g: level, b: level };
}
