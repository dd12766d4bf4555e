/**
 * Config manager - handles reading, writing, and validating config
 */

import { access, mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { DEFAULT_CONFIG, type Config } from '../types/index.js';
import { resolveConfigPath } from '../utils/config-path.js';
import {
  formatValidationErrors,
  parseConfig,
  validateConfig,
  type ValidationError,
  type ValidationResult,
} from './schema.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly errors: ValidationError[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function createDefaultConfig(): Config {
  return structuredClone(DEFAULT_CONFIG);
}

export class ConfigManager {
  private configPath: string;
  private config: Config | null = null;
  /** Cache TTL in milliseconds (default: 5 seconds) */
  private cacheTtlMs: number;
  /** Timestamp when cache was last updated */
  private cacheUpdatedAt: number = 0;

  constructor(configPath?: string, options?: { cacheTtlMs?: number }) {
    this.configPath = resolveConfigPath({ configPath });
    this.cacheTtlMs = options?.cacheTtlMs ?? 5000;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return dirname(this.configPath);
  }

  async exists(): Promise<boolean> {
    return access(this.configPath).then(
      () => true,
      () => false
    );
  }

  /**
   * @throws {ConfigError} when the file is missing or invalid
   */
  async load(): Promise<Config> {
    const now = Date.now();
    if (this.config && (now - this.cacheUpdatedAt) < this.cacheTtlMs) {
      return this.config;
    }

    const content = await this.readText();
    if (content === null) {
      throw new ConfigError(`Config file not found: ${this.configPath}`, this.configPath);
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new ConfigError(`Invalid config: ${formatValidationErrors(errors)}`, this.configPath, errors);
    }

    this.config = config;
    this.cacheUpdatedAt = now;
    return config;
  }

  /**
   * Invalidate the config cache (force reload on next access)
   */
  invalidateCache(): void {
    this.cacheUpdatedAt = 0;
  }

  /**
   * Load the config, or the defaults when no file exists.
   * An existing but invalid file is still an error.
   */
  async loadOrDefault(): Promise<Config> {
    if (!(await this.exists())) {
      return createDefaultConfig();
    }
    return this.load();
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new ConfigError(`Invalid config: ${formatValidationErrors(result.errors)}`, this.configPath, result.errors);
    }

    await this.writeText(JSON.stringify(config, null, 2) + '\n');
    this.config = config;
    this.cacheUpdatedAt = Date.now();
  }

  async init(force: boolean = false): Promise<{ created: boolean; path: string }> {
    const exists = await this.exists();
    if (exists && !force) {
      return { created: false, path: this.configPath };
    }

    await this.save(createDefaultConfig());
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ValidationResult> {
    const content = await this.readText();
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }

    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }

  /** File contents, or null when there is no config file */
  private async readText(): Promise<string | null> {
    try {
      return await readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Replace the config file in one rename, so a reader never sees half a file.
   * The temp file sits beside the target to stay on the same filesystem.
   */
  private async writeText(content: string): Promise<void> {
    const dir = this.getConfigDir();
    await mkdir(dir, { recursive: true });

    const tmpPath = join(dir, `.${basename(this.configPath)}.${process.pid}.tmp`);
    try {
      await writeFile(tmpPath, content, 'utf-8');
      await rename(tmpPath, this.configPath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }
  }
}
