import { describe, it, expect } from 'vitest';
import { parseConfig, readConfig, validateConfig } from './schema.js';

describe('readConfig', () => {
  it('requires an object', () => {
    expect(readConfig([])).toEqual({ config: null, errors: [{ path: '', message: 'config must be an object' }] });
  });

  it('builds a full config from a minimal one', () => {
    expect(readConfig({ version: 1 }).config).toEqual({
      version: 1,
      defaults: { list: 'today' },
      bridge: { timeoutMs: 30000 },
      filter: { maxDepth: 64 },
      output: { color: 'auto' },
    });
  });

  it('keeps valid settings', () => {
    const { config } = readConfig({
      version: 1,
      database: { path: '/data/main.sqlite' },
      defaults: { list: 'anytime' },
      bridge: { timeoutMs: 5000 },
      filter: { maxDepth: 8 },
      output: { color: 'never' },
    });
    expect(config?.database?.path).toBe('/data/main.sqlite');
    expect(config?.defaults.list).toBe('anytime');
    expect(config?.bridge.timeoutMs).toBe(5000);
    expect(config?.filter.maxDepth).toBe(8);
    expect(config?.output.color).toBe('never');
  });

  it('reports each invalid field by path', () => {
    const { config, errors } = readConfig({
      version: 1,
      database: { path: '' },
      defaults: { list: 'later' },
      bridge: { timeoutMs: 10 },
      filter: 'deep',
    });
    expect(config).toBeNull();
    expect(errors.map((e) => e.path)).toEqual(['database.path', 'defaults.list', 'bridge.timeoutMs', 'filter']);
  });

  it('rejects non-integer limits', () => {
    expect(validateConfig({ version: 1, filter: { maxDepth: 2.5 } }).errors).toEqual([
      { path: 'filter.maxDepth', message: 'maxDepth must be an integer between 1 and 1000' },
    ]);
  });
});

describe('parseConfig', () => {
  it('reports invalid JSON', () => {
    const { config, errors } = parseConfig('{');
    expect(config).toBeNull();
    expect(errors[0].message).toMatch(/^Invalid JSON: /);
  });
});
