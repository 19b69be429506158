import sharp from 'sharp';

import { colorToCss } from './color';
import { RenderFailureError } from './errors';
import type { RenderDirective } from './resolver';
import type { RasterImage } from './types';

/** Exactly one of `widthPx` or `scale` is set. */
export type RenderCall =
  | { widthPx: number; scale?: undefined; background?: string }
  | { scale: number; widthPx?: undefined; background?: string };

export interface VectorRenderer {
  render(svg: Buffer, call: RenderCall): Promise<RasterImage>;
}

export function toRenderCall(directive: RenderDirective): RenderCall {
  const background = colorToCss(directive.background);
  if (directive.sizing.kind === 'byWidth') {
    return { widthPx: directive.sizing.pixels, background };
  }
  return { scale: directive.sizing.factor, background };
}

// librsvg renders one CSS pixel per point at 72 dpi
export const DEFAULT_BASE_DENSITY = 72;
const MIN_DENSITY = 1;
const MAX_DENSITY = 100000;

const clampDensity = (density: number) => Math.min(MAX_DENSITY, Math.max(MIN_DENSITY, density));

interface SharpVectorRendererOptions {
  baseDensity?: number;
}

export class SharpVectorRenderer implements VectorRenderer {
  private readonly baseDensity: number;

  constructor(options: SharpVectorRendererOptions = {}) {
    this.baseDensity = options.baseDensity ?? DEFAULT_BASE_DENSITY;
  }

  async render(svg: Buffer, call: RenderCall): Promise<RasterImage> {
    try {
      const { density, targetWidth } = await this.plan(svg, call);
      let pipeline = sharp(svg, { density });
      if (targetWidth !== undefined) {
        pipeline = pipeline.resize({ width: targetWidth });
      }
      if (call.background) {
        pipeline = pipeline.flatten({ background: call.background });
      }
      const { data, info } = await pipeline
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
      if (info.channels !== 4) {
        throw new Error(`Expected RGBA output, got ${info.channels} channel(s)`);
      }
      return { data, width: info.width, height: info.height, channels: 4 };
    } catch (error) {
      if (error instanceof RenderFailureError) {
        throw error;
      }
      throw new RenderFailureError(error);
    }
  }

  /**
   * Picks the density librsvg renders at and, when that density alone cannot
   * produce the requested size (width sizing, or a scale outside the density
   * range), the width to resize to afterwards.
   */
  private async plan(svg: Buffer, call: RenderCall): Promise<{ density: number; targetWidth?: number }> {
    const { width, format } = await sharp(svg, { density: this.baseDensity }).metadata();
    if (format !== 'svg') {
      throw new RenderFailureError(`Input is not an SVG document (detected ${format ?? 'unknown'})`);
    }
    if (!width) {
      throw new RenderFailureError('SVG has no intrinsic width');
    }
    if (call.widthPx === undefined) {
      const density = this.baseDensity * call.scale;
      const clamped = clampDensity(density);
      if (clamped === density) {
        return { density };
      }
      return { density: clamped, targetWidth: Math.max(1, Math.round(width * call.scale)) };
    }
    return {
      density: clampDensity((this.baseDensity * call.widthPx) / width),
      targetWidth: call.widthPx,
    };
  }
}
