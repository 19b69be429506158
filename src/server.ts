import cors from 'cors';
import express from 'express';
import { ZodError } from 'zod';

import type { RequestDefaults } from './config';
import { logger } from './logger';
import { createLibraryRouter } from './routes/library';
import { createRasterizeRouter } from './routes/rasterize';
import type { SvgLibrary } from './services/library/svgLibrary';
import { InvalidColorFormatError, RasterError } from './services/raster/errors';
import type { SvgRasterizer } from './services/raster/rasterizer';

interface AppDependencies {
  rasterizer: SvgRasterizer;
  library: SvgLibrary;
  defaults: RequestDefaults;
  jsonLimit?: string;
}

export function createApp({ rasterizer, library, defaults, jsonLimit = '10mb' }: AppDependencies) {
  const app = express();
  app.use(
    cors({
      origin: true,
      credentials: true,
    })
  );
  app.use(express.json({ limit: jsonLimit }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  const api = express.Router();
  api.use('/rasterize', createRasterizeRouter(rasterizer, defaults));
  api.use('/svgs', createLibraryRouter(library));
  app.use('/api', api);

  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (err instanceof RasterError) {
        logger.warn(`[API] ${err.code}: ${err.message}`);
        res.status(err.status).json({
          code: err.code,
          message: err.message,
          ...(err instanceof InvalidColorFormatError ? { field: err.fieldName } : {}),
        });
        return;
      }
      if (err instanceof ZodError) {
        const message = err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        logger.warn(`[API] Invalid request: ${message}`);
        res.status(400).json({ code: 'INVALID_REQUEST', message });
        return;
      }
      // body-parser errors (malformed JSON, oversized payloads) carry their own status
      const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
      if (status >= 500) {
        logger.error(`[API] ${err.stack ?? err.message}`);
      } else {
        logger.warn(`[API] ${err.message}`);
      }
      res.status(status).json({ code: status >= 500 ? 'INTERNAL' : 'BAD_REQUEST', message: err.message });
    }
  );

  return app;
}
