import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { logger } from './logger';

const width = z.number().int().min(10).max(500);

export const configSchema = z.object({
  display: z
    .object({
      messageWidth: width.default(60),
      choiceMessageWidth: width.default(50),
      pageSize: z.number().int().min(3).max(100).default(15),
      lineNumbers: z.boolean().default(true),
    })
    .default({}),
  ui: z
    .object({
      colorOutput: z.boolean().default(true),
      showProgress: z.boolean().default(true),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigManager {
  private static instance: ConfigManager | null = null;
  private static configPath: string | null = null;
  private config: Config;

  private constructor() {
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  static setConfigPath(customPath: string): void {
    ConfigManager.configPath = customPath;
    // Reset instance to reload config from new path
    ConfigManager.instance = new ConfigManager();
  }

  static getConfigPath(): string {
    if (ConfigManager.configPath) {
      return ConfigManager.configPath;
    }

    return path.join(os.homedir(), '.branch-picker', 'config.json');
  }

  static getDefaultConfig(): Config {
    return configSchema.parse({});
  }

  private loadConfig(): Config {
    const configPath = ConfigManager.getConfigPath();
    if (!fs.pathExistsSync(configPath)) {
      return ConfigManager.getDefaultConfig();
    }

    try {
      const parsed = configSchema.safeParse(fs.readJsonSync(configPath));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn(`Invalid config at ${configPath}, using defaults`);
      logger.debug(parsed.error.message);
    } catch (error) {
      logger.warn(`Failed to read config at ${configPath}, using defaults`);
      logger.debug(error instanceof Error ? error.message : String(error));
    }
    return ConfigManager.getDefaultConfig();
  }

  get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  getAll(): Config {
    return { ...this.config };
  }
}
