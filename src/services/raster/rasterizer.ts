import sharp from 'sharp';

import { logger } from '../../logger';
import { applyBorder } from './compositor';
import {
  type BorderSpec,
  type RasterizeRequest,
  type RenderDirective,
  type SizingMode,
  resolveRequest,
} from './resolver';
import type { RasterImage } from './types';
import { toRenderCall, type VectorRenderer } from './vectorRenderer';

export interface RasterizeResult {
  image: RasterImage;
  directive: RenderDirective;
  border: BorderSpec;
}

export const describeSizing = (sizing: SizingMode) =>
  sizing.kind === 'byWidth' ? `width=${sizing.pixels}px` : `scale=${sizing.factor}x`;

export class SvgRasterizer {
  constructor(private readonly renderer: VectorRenderer) {}

  async rasterize(request: RasterizeRequest): Promise<RasterizeResult> {
    const { svg, directive, border } = resolveRequest(request);
    const startedAt = Date.now();

    let rendered: RasterImage;
    try {
      rendered = await this.renderer.render(svg, toRenderCall(directive));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`[Raster] Render failed (${describeSizing(directive.sizing)}): ${reason}`);
      throw error;
    }

    const image = await applyBorder(rendered, border);
    logger.info(
      `[Raster] Rendered ${image.width}x${image.height} (${describeSizing(directive.sizing)}, border=${border.width}px) in ${
        Date.now() - startedAt
      }ms`
    );
    return { image, directive, border };
  }
}

export async function encodePng(image: RasterImage): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })
    .png()
    .toBuffer();
}

export const toDataUrl = (png: Buffer) => `data:image/png;base64,${png.toString('base64')}`;
