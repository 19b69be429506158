import { Router } from 'express';
import { z } from 'zod';

import type { RequestDefaults } from '../config';
import { toImageBatch } from '../services/raster/imageBatch';
import { encodePng, type SvgRasterizer, toDataUrl } from '../services/raster/rasterizer';

export const createRasterizeRouter = (rasterizer: SvgRasterizer, defaults: RequestDefaults) => {
  // range checks live in the resolver so failures keep their typed error codes
  const rasterizeSchema = z.object({
    svgText: z.string(),
    width: z.number().default(defaults.width),
    scale: z.number().default(defaults.scale),
    backgroundColor: z.string().default(defaults.backgroundColor),
    borderWidth: z.number().default(defaults.borderWidth),
    borderColor: z.string().default(defaults.borderColor),
    output: z.enum(['json', 'png', 'batch']).default('json'),
  });

  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const { output, ...request } = rasterizeSchema.parse(req.body ?? {});
      const { image, directive, border } = await rasterizer.rasterize(request);
      if (output === 'batch') {
        const { shape, data } = toImageBatch(image);
        res.json({
          shape,
          dtype: 'float32',
          data: Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64'),
        });
        return;
      }
      const png = await encodePng(image);
      if (output === 'png') {
        res.type('image/png').send(png);
        return;
      }
      res.json({
        width: image.width,
        height: image.height,
        channels: image.channels,
        sizing: directive.sizing,
        borderWidth: border.width,
        previewData: toDataUrl(png),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
