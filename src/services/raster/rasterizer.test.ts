import { describe, expect, it, vi } from 'vitest';

import { pixelAt, solidImage } from '../../test/fixtures';
import { InvalidColorFormatError, RenderFailureError } from './errors';
import { encodePng, SvgRasterizer, toDataUrl } from './rasterizer';
import type { RasterizeRequest } from './resolver';
import { SharpVectorRenderer, type VectorRenderer } from './vectorRenderer';

const request: RasterizeRequest = {
  svgText: '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10"/>',
  width: 300,
  scale: 5,
  backgroundColor: 'transparent',
  borderWidth: 0,
  borderColor: '#000000',
};

const fakeRenderer = (render: VectorRenderer['render']) => {
  const spy = vi.fn<VectorRenderer['render']>(render);
  const renderer: VectorRenderer = { render: spy };
  return { renderer, spy };
};

describe('SvgRasterizer', () => {
  it('hands the renderer exactly one sizing parameter', async () => {
    const { renderer, spy } = fakeRenderer(async () => solidImage(3, 3, [1, 1, 1, 255]));
    await new SvgRasterizer(renderer).rasterize(request);

    expect(spy).toHaveBeenCalledTimes(1);
    const [svg, call] = spy.mock.calls[0];
    expect(svg.toString('utf-8')).toBe(request.svgText);
    expect(call).toEqual({ widthPx: 300, background: undefined });
    expect('scale' in call).toBe(false);
  });

  it('passes an opaque background through to the renderer', async () => {
    const { renderer, spy } = fakeRenderer(async () => solidImage(3, 3, [1, 1, 1, 255]));
    await new SvgRasterizer(renderer).rasterize({ ...request, width: 0, scale: 1.5, backgroundColor: '#ffffff' });

    expect(spy.mock.calls[0][1]).toEqual({ scale: 1.5, background: '#ffffff' });
  });

  it('never reaches the renderer with invalid input', async () => {
    const { renderer, spy } = fakeRenderer(async () => solidImage(1, 1, [0, 0, 0, 255]));
    const rasterizer = new SvgRasterizer(renderer);

    await expect(rasterizer.rasterize({ ...request, borderColor: 'black' })).rejects.toBeInstanceOf(
      InvalidColorFormatError
    );
    await expect(rasterizer.rasterize({ ...request, svgText: '' })).rejects.toMatchObject({
      code: 'EMPTY_INPUT',
    });
    await expect(rasterizer.rasterize({ ...request, width: 0, scale: 0 })).rejects.toMatchObject({
      code: 'INVALID_SIZING',
    });
    expect(spy).not.toHaveBeenCalled();
  });

  it('propagates render failures without a fallback image', async () => {
    const failure = new RenderFailureError(new Error('bad markup'));
    const { renderer } = fakeRenderer(async () => {
      throw failure;
    });

    await expect(new SvgRasterizer(renderer).rasterize(request)).rejects.toBe(failure);
  });

  it('frames the rendered image with the border', async () => {
    const { renderer } = fakeRenderer(async () => solidImage(4, 2, [10, 20, 30, 255]));
    const result = await new SvgRasterizer(renderer).rasterize({
      ...request,
      borderWidth: 2,
      borderColor: '#ffffff',
    });

    expect([result.image.width, result.image.height]).toEqual([8, 6]);
    expect(result.border).toEqual({ width: 2, color: { kind: 'opaque', hex: 'ffffff' } });
    expect(pixelAt(result.image, 0, 0)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(result.image, 2, 2)).toEqual([10, 20, 30, 255]);
  });

  it('renders a red square into a black 10px frame end to end', async () => {
    const rasterizer = new SvgRasterizer(new SharpVectorRenderer());
    const { image, directive } = await rasterizer.rasterize({
      svgText:
        "<svg xmlns='http://www.w3.org/2000/svg' width='10' height='10' viewBox='0 0 10 10'><rect width='10' height='10' fill='#ff0000'/></svg>",
      width: 100,
      scale: 1.0,
      backgroundColor: 'transparent',
      borderWidth: 10,
      borderColor: '#000000',
    });

    expect(directive.sizing).toEqual({ kind: 'byWidth', pixels: 100 });
    expect([image.width, image.height, image.channels]).toEqual([120, 120, 4]);
    expect(pixelAt(image, 0, 0)).toEqual([0, 0, 0, 255]);
    expect(pixelAt(image, 5, 60)).toEqual([0, 0, 0, 255]);
    expect(pixelAt(image, 119, 119)).toEqual([0, 0, 0, 255]);
    expect(pixelAt(image, 60, 60)).toEqual([255, 0, 0, 255]);
    expect(pixelAt(image, 15, 100)).toEqual([255, 0, 0, 255]);
  });
});

describe('encodePng', () => {
  it('produces a PNG data URL', async () => {
    const png = await encodePng(solidImage(2, 2, [0, 0, 0, 255]));

    expect(Array.from(png.subarray(0, 8))).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    expect(toDataUrl(png)).toBe(`data:image/png;base64,${png.toString('base64')}`);
  });
});
