import { readFile } from 'fs/promises';
import { join, extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { PipelineConfigSchema, type PipelineConfig } from './schema.js';
import { ConfigError } from '../pipeline/errors.js';
import { logger } from '../utils/logger.js';

/** Looked up in this order */
export const CONFIG_FILE_NAMES = ['pipeline.yaml', 'pipeline.yml', 'pipeline.json'] as const;

export class ConfigLoader {
  private configDir: string;
  private cachedConfig: PipelineConfig | null = null;

  constructor(configDir: string) {
    this.configDir = configDir;
  }

  async loadPipelineConfig(): Promise<PipelineConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const { path, raw } = await this.readFirstConfigFile();

    let parsed: unknown;
    try {
      parsed = extname(path) === '.json' ? JSON.parse(raw) : parseYaml(raw);
    } catch (err) {
      throw new ConfigError(path, `Invalid ${extname(path) === '.json' ? 'JSON' : 'YAML'} in config file: ${path}`, {
        cause: err,
      });
    }

    try {
      this.cachedConfig = PipelineConfigSchema.parse(parsed);
    } catch (err) {
      if (err instanceof ZodError) {
        const details = err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
        throw new ConfigError(path, `Invalid config in ${path}: ${details}`, { cause: err });
      }
      throw err;
    }

    logger.info('Loaded pipeline config', { path, tracks: this.cachedConfig.tracks.length });
    return this.cachedConfig;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  private async readFirstConfigFile(): Promise<{ path: string; raw: string }> {
    for (const name of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, name);
      try {
        return { path, raw: await readFile(path, 'utf-8') };
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
          continue;
        }
        throw err;
      }
    }

    throw new ConfigError(
      this.configDir,
      `Config file not found: expected one of ${CONFIG_FILE_NAMES.join(', ')} in ${this.configDir}`
    );
  }
}
