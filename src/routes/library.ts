import { Router } from 'express';

import type { SvgLibrary } from '../services/library/svgLibrary';
import { encodePng, toDataUrl } from '../services/raster/rasterizer';

export const createLibraryRouter = (library: SvgLibrary) => {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      res.json({ files: await library.list() });
    } catch (error) {
      next(error);
    }
  });

  // registered before the GET route so HEAD does not render a preview
  router.head('/:name', async (req, res, next) => {
    try {
      res.sendStatus((await library.exists(req.params.name)) ? 200 : 404);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:name', async (req, res, next) => {
    try {
      const { name, svgText, preview } = await library.load(req.params.name);
      res.json({
        name,
        svgText,
        width: preview.width,
        height: preview.height,
        previewData: toDataUrl(await encodePng(preview)),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:name/fingerprint', async (req, res, next) => {
    try {
      const sha256 = await library.fingerprint(req.params.name);
      res.json({ name: req.params.name, sha256 });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
