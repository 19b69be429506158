export type RasterChannels = 3 | 4;

/** Straight-alpha pixel buffer, row-major, `channels` bytes per pixel. */
export interface RasterImage {
  data: Buffer;
  width: number;
  height: number;
  channels: RasterChannels;
}
