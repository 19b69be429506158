import sharp from 'sharp';

import { colorToRgba } from './color';
import type { BorderSpec } from './resolver';
import type { RasterImage } from './types';

/**
 * Frames `image` with a uniform border of `border.width` pixels. The image is
 * pasted over the border fill using its own alpha, so transparent regions show
 * the fill underneath. A zero-width border returns the input untouched.
 */
export async function applyBorder(image: RasterImage, border: BorderSpec): Promise<RasterImage> {
  if (border.width === 0) {
    return image;
  }

  const [r, g, b, a] = colorToRgba(border.color);
  const width = image.width + border.width * 2;
  const height = image.height + border.width * 2;

  const { data, info } = await sharp({
    create: {
      width,
      height,
      channels: 4,
      background: { r, g, b, alpha: a / 255 },
    },
  })
    .composite([
      {
        input: image.data,
        raw: { width: image.width, height: image.height, channels: image.channels },
        left: border.width,
        top: border.width,
        blend: 'over',
      },
    ])
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height, channels: 4 };
}
