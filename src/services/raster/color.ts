import { InvalidColorFormatError } from './errors';

export type Color = { kind: 'opaque'; hex: string } | { kind: 'transparent' };

export type Rgba = readonly [r: number, g: number, b: number, a: number];

export type ColorField = 'Background color' | 'Border color';

const HEX_COLOR = /^#[A-Fa-f0-9]{6}$/;
const TRANSPARENT_ALIASES = new Set(['', 'transparent', 'none']);

export const TRANSPARENT: Color = { kind: 'transparent' };

export function parseHexColor(value: string, field: ColorField): Color {
  const trimmed = value.trim();
  if (TRANSPARENT_ALIASES.has(trimmed.toLowerCase())) {
    return TRANSPARENT;
  }
  if (!HEX_COLOR.test(trimmed)) {
    throw new InvalidColorFormatError(field, value);
  }
  return { kind: 'opaque', hex: trimmed.slice(1).toLowerCase() };
}

/**
 * Expands a hex string to RGBA with full opacity. Accepts the 3-digit
 * shorthand (`abc` -> `aabbcc`) although parseHexColor never produces it.
 */
export function hexToRgba(hex: string): Rgba {
  let digits = hex.startsWith('#') ? hex.slice(1) : hex;
  if (digits.length === 3) {
    digits = digits
      .split('')
      .map((digit) => digit + digit)
      .join('');
  }
  if (!/^[A-Fa-f0-9]{6}$/.test(digits)) {
    throw new TypeError(`Expected 3 or 6 hex digits, got '${hex}'`);
  }
  return [
    Number.parseInt(digits.slice(0, 2), 16),
    Number.parseInt(digits.slice(2, 4), 16),
    Number.parseInt(digits.slice(4, 6), 16),
    255,
  ];
}

export function colorToRgba(color: Color): Rgba {
  return color.kind === 'opaque' ? hexToRgba(color.hex) : [0, 0, 0, 0];
}

/** The fill handed to the renderer; transparent means no fill at all. */
export function colorToCss(color: Color): string | undefined {
  return color.kind === 'opaque' ? `#${color.hex}` : undefined;
}
