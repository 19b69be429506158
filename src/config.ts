import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

const portSchema = z.coerce.number().int().min(1).max(65535);

const settingsSchema = z.object({
  server: z.object({
    port: portSchema,
    jsonLimit: z.string().default('10mb'),
  }),
  storage: z.object({
    inputDir: z.string(),
  }),
  preview: z.object({
    defaultWidth: z.number().int().positive().default(512),
  }),
  renderer: z.object({
    baseDensity: z.number().positive().default(72),
  }),
  defaults: z.object({
    width: z.number().int().default(0),
    scale: z.number().default(1),
    backgroundColor: z.string().default('transparent'),
    borderWidth: z.number().int().default(0),
    borderColor: z.string().default('#000000'),
  }),
});

export type Settings = z.infer<typeof settingsSchema>;
export type RequestDefaults = Settings['defaults'];

export const parseSettings = (raw: unknown, baseDir: string): Settings => {
  const settings = settingsSchema.parse(raw);
  const port = process.env.PORT ? portSchema.parse(process.env.PORT) : settings.server.port;
  return {
    ...settings,
    server: { ...settings.server, port },
    storage: { inputDir: path.resolve(baseDir, settings.storage.inputDir) },
  };
};

export class SettingsService {
  private static instance: SettingsService;
  private config?: Settings;

  private constructor() {}

  static getInstance() {
    if (!SettingsService.instance) {
      SettingsService.instance = new SettingsService();
    }
    return SettingsService.instance;
  }

  async load(): Promise<Settings> {
    if (this.config) {
      return this.config;
    }
    const settingsPath =
      process.env.SVG_RASTER_SETTINGS ??
      path.resolve(process.cwd(), 'config/settings.json');
    const file = await readFile(settingsPath, 'utf-8');
    // inputDir is relative to the project root, one level above config/
    this.config = parseSettings(JSON.parse(file), path.resolve(path.dirname(settingsPath), '..'));
    return this.config;
  }
}
