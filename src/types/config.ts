/**
 * Configuration types for tasksift
 */

import { DEFAULT_MAX_DEPTH } from '../filter/parser.js';
import type { ListView } from './task.js';

export type ColorMode = 'auto' | 'always' | 'never';

export const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

export interface DatabaseConfig {
  /** Path to the task database (main.sqlite); discovered when unset */
  path?: string;
}

export interface DefaultsConfig {
  /** List shown by `list` without an argument */
  list: ListView;
}

export interface BridgeConfig {
  /** Timeout for one automation script, in milliseconds */
  timeoutMs: number;
}

export interface FilterConfig {
  /** Maximum nesting of parentheses and NOT in a query */
  maxDepth: number;
}

export interface OutputConfig {
  color: ColorMode;
}

export interface Config {
  version: 1;
  database?: DatabaseConfig;
  defaults: DefaultsConfig;
  bridge: BridgeConfig;
  filter: FilterConfig;
  output: OutputConfig;
}

export const DEFAULT_CONFIG: Config = {
  version: 1,
  defaults: {
    list: 'today',
  },
  bridge: {
    timeoutMs: 30000,
  },
  filter: {
    maxDepth: DEFAULT_MAX_DEPTH,
  },
  output: {
    color: 'auto',
  },
};
