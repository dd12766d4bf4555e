/**
 * Config schema validation
 *
 * Sections other than `version` may be omitted; missing values take
 * their defaults. Every problem is reported with its JSON path.
 */

import {
  COLOR_MODES,
  DEFAULT_CONFIG,
  LIST_VIEWS,
  isListView,
  type Config,
  type ColorMode,
  type ListView,
} from '../types/index.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(cfg: JsonObject, key: string, errors: ValidationError[]): JsonObject {
  const value = cfg[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    errors.push({ path: key, message: `${key} must be an object` });
    return {};
  }
  return value;
}

function readInteger(
  section: JsonObject,
  key: string,
  path: string,
  fallback: number,
  range: { min: number; max: number },
  errors: ValidationError[]
): number {
  const value = section[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < range.min || value > range.max) {
    errors.push({ path, message: `${key} must be an integer between ${range.min} and ${range.max}` });
    return fallback;
  }
  return value;
}

function readDatabasePath(section: JsonObject, errors: ValidationError[]): string | undefined {
  const value = section.path;
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !value.trim()) {
    errors.push({ path: 'database.path', message: 'path must be a non-empty string' });
    return undefined;
  }
  return value;
}

function readList(section: JsonObject, errors: ValidationError[]): ListView {
  const value = section.list;
  if (value === undefined) {
    return DEFAULT_CONFIG.defaults.list;
  }
  if (typeof value !== 'string' || !isListView(value)) {
    errors.push({ path: 'defaults.list', message: `list must be one of: ${LIST_VIEWS.join(', ')}` });
    return DEFAULT_CONFIG.defaults.list;
  }
  return value;
}

function readColor(section: JsonObject, errors: ValidationError[]): ColorMode {
  const value = section.color;
  if (value === undefined) {
    return DEFAULT_CONFIG.output.color;
  }
  const mode = COLOR_MODES.find((m) => m === value);
  if (!mode) {
    errors.push({ path: 'output.color', message: `color must be one of: ${COLOR_MODES.join(', ')}` });
    return DEFAULT_CONFIG.output.color;
  }
  return mode;
}

/**
 * Validate a parsed config value and build the typed config from it
 */
export function readConfig(value: unknown): { config: Config | null; errors: ValidationError[] } {
  if (!isRecord(value)) {
    return { config: null, errors: [{ path: '', message: 'config must be an object' }] };
  }

  const errors: ValidationError[] = [];

  if (value.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  const databasePath = readDatabasePath(readSection(value, 'database', errors), errors);
  const list = readList(readSection(value, 'defaults', errors), errors);
  const timeoutMs = readInteger(
    readSection(value, 'bridge', errors),
    'timeoutMs',
    'bridge.timeoutMs',
    DEFAULT_CONFIG.bridge.timeoutMs,
    { min: 1000, max: 600000 },
    errors
  );
  const maxDepth = readInteger(
    readSection(value, 'filter', errors),
    'maxDepth',
    'filter.maxDepth',
    DEFAULT_CONFIG.filter.maxDepth,
    { min: 1, max: 1000 },
    errors
  );
  const colorMode = readColor(readSection(value, 'output', errors), errors);

  if (errors.length > 0) {
    return { config: null, errors };
  }

  const config: Config = {
    version: 1,
    defaults: { list },
    bridge: { timeoutMs },
    filter: { maxDepth },
    output: { color: colorMode },
  };
  if (databasePath !== undefined) {
    config.database = { path: databasePath };
  }
  return { config, errors: [] };
}

export function validateConfig(config: unknown): ValidationResult {
  const { errors } = readConfig(config);
  return { valid: errors.length === 0, errors };
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ValidationError[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  return readConfig(parsed);
}

export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ');
}
