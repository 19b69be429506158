import { createServer } from 'http';

import { SettingsService } from './config';
import { logger } from './logger';
import { createApp } from './server';
import { SvgLibrary } from './services/library/svgLibrary';
import { SvgRasterizer } from './services/raster/rasterizer';
import { SharpVectorRenderer } from './services/raster/vectorRenderer';

async function bootstrap() {
  const settings = await SettingsService.getInstance().load();

  const renderer = new SharpVectorRenderer({ baseDensity: settings.renderer.baseDensity });
  const rasterizer = new SvgRasterizer(renderer);
  const library = new SvgLibrary({
    inputDir: settings.storage.inputDir,
    renderer,
    previewWidth: settings.preview.defaultWidth,
  });

  const app = createApp({
    rasterizer,
    library,
    defaults: settings.defaults,
    jsonLimit: settings.server.jsonLimit,
  });

  const server = createServer(app);
  server.listen(settings.server.port, () => {
    logger.info(`SVG raster service listening on http://localhost:${settings.server.port}`);
    logger.info(`Serving SVG documents from ${settings.storage.inputDir}`);
  });

  const gracefulShutdown = () => {
    logger.info('Shutting down...');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', gracefulShutdown);
  process.on('SIGTERM', gracefulShutdown);
}

bootstrap().catch((error) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
