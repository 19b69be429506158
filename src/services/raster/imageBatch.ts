import type { RasterChannels, RasterImage } from './types';

export interface ImageBatch {
  shape: readonly [batch: 1, height: number, width: number, channels: RasterChannels];
  data: Float32Array;
}

/** Normalizes bytes to [0, 1] and adds a leading batch dimension of one. */
export function toImageBatch(image: RasterImage): ImageBatch {
  const length = image.width * image.height * image.channels;
  if (image.data.length < length) {
    throw new RangeError(
      `Image buffer holds ${image.data.length} bytes, expected ${length} for ${image.width}x${image.height}x${image.channels}`
    );
  }
  const data = new Float32Array(length);
  for (let i = 0; i < length; i += 1) {
    data[i] = image.data[i] / 255;
  }
  return { shape: [1, image.height, image.width, image.channels], data };
}
