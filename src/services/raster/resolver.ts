import { type Color, parseHexColor } from './color';
import { EmptyInputError, InvalidBorderError, InvalidSizingError } from './errors';

export type SizingMode =
  | { kind: 'byWidth'; pixels: number }
  | { kind: 'byScale'; factor: number };

export interface RenderDirective {
  sizing: SizingMode;
  background: Color;
}

export interface BorderSpec {
  width: number;
  color: Color;
}

/** Raw request fields, exactly as a caller supplies them. */
export interface RasterizeRequest {
  svgText: string;
  width: number;
  scale: number;
  backgroundColor: string;
  borderWidth: number;
  borderColor: string;
}

export interface ResolvedRequest {
  svg: Buffer;
  directive: RenderDirective;
  border: BorderSpec;
}

/** A positive width always wins; scale is only consulted when width <= 0. */
export function resolveSizing(width: number, scale: number): SizingMode {
  if (width > 0) {
    if (!Number.isInteger(width)) {
      throw new InvalidSizingError(`Width must be a whole number of pixels (got ${width})`);
    }
    return { kind: 'byWidth', pixels: width };
  }
  if (scale > 0 && Number.isFinite(scale)) {
    return { kind: 'byScale', factor: scale };
  }
  throw new InvalidSizingError();
}

export function resolveBorder(width: number, color: string): BorderSpec {
  if (!Number.isInteger(width) || width < 0) {
    throw new InvalidBorderError(width);
  }
  return { width, color: parseHexColor(color, 'Border color') };
}

export function resolveRequest(request: RasterizeRequest): ResolvedRequest {
  if (request.svgText.trim().length === 0) {
    throw new EmptyInputError();
  }
  const sizing = resolveSizing(request.width, request.scale);
  const background = parseHexColor(request.backgroundColor, 'Background color');
  const border = resolveBorder(request.borderWidth, request.borderColor);

  return {
    svg: Buffer.from(request.svgText, 'utf-8'),
    directive: { sizing, background },
    border,
  };
}
