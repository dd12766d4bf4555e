/**
 * Tests for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigManager, ConfigError, createDefaultConfig } from '../manager.js';
import { join } from 'path';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tasksift-test-'));
    configPath = join(tempDir, 'config.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(value: unknown): Promise<void> {
    await writeFile(configPath, JSON.stringify(value, null, 2));
  }

  describe('init', () => {
    it('creates a default config', async () => {
      const manager = new ConfigManager(configPath);

      const result = await manager.init();

      expect(result).toEqual({ created: true, path: configPath });
      const saved = JSON.parse(await readFile(configPath, 'utf-8'));
      expect(saved).toEqual({
        version: 1,
        defaults: { list: 'today' },
        bridge: { timeoutMs: 30000 },
        filter: { maxDepth: 64 },
        output: { color: 'auto' },
      });
    });

    it('keeps an existing config unless forced', async () => {
      await writeConfig({ version: 1, defaults: { list: 'inbox' } });
      const manager = new ConfigManager(configPath);

      expect((await manager.init()).created).toBe(false);
      expect((await manager.load()).defaults.list).toBe('inbox');

      expect((await manager.init(true)).created).toBe(true);
      manager.invalidateCache();
      expect((await manager.load()).defaults.list).toBe('today');
    });
  });

  describe('load', () => {
    it('fills omitted sections with defaults', async () => {
      await writeConfig({ version: 1, database: { path: '/tmp/main.sqlite' } });
      const config = await new ConfigManager(configPath).load();

      expect(config.database).toEqual({ path: '/tmp/main.sqlite' });
      expect(config.filter.maxDepth).toBe(64);
    });

    it('throws ConfigError for a missing file', async () => {
      await expect(new ConfigManager(configPath).load()).rejects.toBeInstanceOf(ConfigError);
    });

    it('throws ConfigError listing every invalid path', async () => {
      await writeConfig({ version: 2, output: { color: 'sometimes' } });
      await expect(new ConfigManager(configPath).load()).rejects.toThrow(
        'Invalid config: version: version must be 1, output.color: color must be one of: auto, always, never'
      );
    });
  });

  describe('loadOrDefault', () => {
    it('returns defaults when no file exists', async () => {
      const config = await new ConfigManager(configPath).loadOrDefault();
      expect(config.defaults.list).toBe('today');
    });

    it('still rejects an invalid file', async () => {
      await writeFile(configPath, '{ not json');
      await expect(new ConfigManager(configPath).loadOrDefault()).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('cache', () => {
    it('returns the cached config within the TTL', async () => {
      await writeConfig({ version: 1, defaults: { list: 'inbox' } });
      const manager = new ConfigManager(configPath, { cacheTtlMs: 10000 });
      const first = await manager.load();

      await writeConfig({ version: 1, defaults: { list: 'someday' } });

      expect(await manager.load()).toBe(first);
    });

    it('reloads after the TTL expires', async () => {
      await writeConfig({ version: 1, defaults: { list: 'inbox' } });
      const manager = new ConfigManager(configPath, { cacheTtlMs: 20 });
      await manager.load();

      await writeConfig({ version: 1, defaults: { list: 'someday' } });
      await sleep(40);

      expect((await manager.load()).defaults.list).toBe('someday');
    });

    it('reloads after invalidateCache()', async () => {
      await writeConfig({ version: 1, defaults: { list: 'inbox' } });
      const manager = new ConfigManager(configPath, { cacheTtlMs: 10000 });
      await manager.load();

      await writeConfig({ version: 1, defaults: { list: 'logbook' } });
      manager.invalidateCache();

      expect((await manager.load()).defaults.list).toBe('logbook');
    });
  });

  describe('save', () => {
    it('creates missing parent directories', async () => {
      const nestedPath = join(tempDir, 'nested', 'deeper', 'config.json');
      const manager = new ConfigManager(nestedPath);

      await manager.save(createDefaultConfig());

      expect(JSON.parse(await readFile(nestedPath, 'utf-8')).version).toBe(1);
    });

    it('replaces the file without leaving temp files behind', async () => {
      await writeConfig({ version: 1, defaults: { list: 'inbox' } });
      const manager = new ConfigManager(configPath);
      const config = createDefaultConfig();
      config.defaults.list = 'anytime';

      await manager.save(config);

      expect(await readdir(tempDir)).toEqual(['config.json']);
      expect(await readFile(configPath, 'utf-8')).toBe(JSON.stringify(config, null, 2) + '\n');
    });

    it('refuses an invalid config and keeps the old file', async () => {
      await writeConfig({ version: 1 });
      const before = await readFile(configPath, 'utf-8');
      const config = createDefaultConfig();
      config.bridge.timeoutMs = 5;

      await expect(new ConfigManager(configPath).save(config)).rejects.toBeInstanceOf(ConfigError);
      expect(await readFile(configPath, 'utf-8')).toBe(before);
    });

    it('serves the saved config from the cache', async () => {
      const manager = new ConfigManager(configPath, { cacheTtlMs: 10000 });
      const config = createDefaultConfig();

      await manager.save(config);

      expect(await manager.load()).toBe(config);
    });
  });

  describe('validate', () => {
    it('reports a missing file', async () => {
      expect(await new ConfigManager(configPath).validate()).toEqual({
        valid: false,
        errors: [{ path: '', message: 'Config file not found' }],
      });
    });

    it('accepts a valid file', async () => {
      await writeConfig({ version: 1 });
      expect((await new ConfigManager(configPath).validate()).valid).toBe(true);
    });
  });
});
