import type { RasterImage } from '../services/raster/types';

export const solidImage = (
  width: number,
  height: number,
  pixel: readonly number[]
): RasterImage => {
  const channels = pixel.length === 3 ? 3 : 4;
  const data = Buffer.alloc(width * height * channels);
  for (let offset = 0; offset < data.length; offset += channels) {
    data.set(pixel.slice(0, channels), offset);
  }
  return { data, width, height, channels };
};

export const pixelAt = (image: RasterImage, x: number, y: number): number[] => {
  const offset = (y * image.width + x) * image.channels;
  return Array.from(image.data.subarray(offset, offset + image.channels));
};

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};
