import { createHash } from 'crypto';
import { readdir, readFile, stat } from 'fs/promises';
import path from 'path';

import { logger } from '../../logger';
import { SvgNotFoundError } from '../raster/errors';
import type { RasterImage } from '../raster/types';
import type { VectorRenderer } from '../raster/vectorRenderer';

export const DEFAULT_PREVIEW_WIDTH = 512;

export interface LoadedSvg {
  name: string;
  svgText: string;
  preview: RasterImage;
}

const isFile = async (filePath: string) => {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
};

interface SvgLibraryOptions {
  inputDir: string;
  renderer: VectorRenderer;
  previewWidth?: number;
}

/** SVG documents available in the input directory, addressed by file name. */
export class SvgLibrary {
  private readonly inputDir: string;

  constructor(private readonly options: SvgLibraryOptions) {
    this.inputDir = path.resolve(options.inputDir);
  }

  async list(): Promise<string[]> {
    const entries = await readdir(this.inputDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.svg'))
      .map((entry) => entry.name)
      .sort();
  }

  async exists(name: string): Promise<boolean> {
    const filePath = this.resolvePath(name);
    return filePath !== undefined && (await isFile(filePath));
  }

  async read(name: string): Promise<string> {
    return (await this.readBytes(name)).toString('utf-8');
  }

  /** SHA-256 of the file contents, used to tell whether a document changed. */
  async fingerprint(name: string): Promise<string> {
    const bytes = await this.readBytes(name);
    return createHash('sha256').update(bytes).digest('hex');
  }

  async load(name: string): Promise<LoadedSvg> {
    const svgText = await this.read(name);
    const width = this.options.previewWidth ?? DEFAULT_PREVIEW_WIDTH;
    const preview = await this.options.renderer.render(Buffer.from(svgText, 'utf-8'), { widthPx: width });
    logger.info(`[Library] Loaded ${name} (preview ${preview.width}x${preview.height})`);
    return { name, svgText, preview };
  }

  private async readBytes(name: string) {
    const filePath = this.resolvePath(name);
    if (!filePath || !(await isFile(filePath))) {
      throw new SvgNotFoundError(name);
    }
    return readFile(filePath);
  }

  private resolvePath(name: string): string | undefined {
    const filePath = path.resolve(this.inputDir, name);
    if (path.dirname(filePath) !== this.inputDir) {
      return undefined;
    }
    return filePath;
  }
}
