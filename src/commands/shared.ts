/**
 * Helpers shared by the task commands
 */

import { InvalidArgumentError } from 'commander';
import { ConfigError, ConfigManager } from '../config/index.js';
import { TaskStore } from '../db/task-store.js';
import { TaskStoreError, databaseErrorHint, resolveDatabasePath } from '../db/connection.js';
import { JsonSourceError } from '../db/json-source.js';
import { BridgeError, OsascriptBridge, type AutomationBridge } from '../bridge/index.js';
import { isFilterError, parseFilter, type FilterError, type FilterExpression } from '../filter/index.js';
import type { Config, ListView, Task } from '../types/index.js';
import { isListView, LIST_VIEWS } from '../types/index.js';
import { getOutputOptions, output, outputError } from '../utils/output.js';
import { dim, formatTaskLine } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';

/** Global option accessors handed to every command factory */
export interface CliContext {
  getConfigPath: () => string;
  /** --db, when given */
  getDbPath: () => string | undefined;
}

/**
 * A filter that failed to compile, kept with its source text
 */
export class QueryError extends Error {
  constructor(
    readonly query: string,
    readonly filterError: FilterError
  ) {
    super(`Invalid filter: ${filterError.message}`);
    this.name = 'QueryError';
  }
}

/** Bridge used by the mutating commands (replaceable in tests) */
export type BridgeFactory = (config: Config) => AutomationBridge;

export const defaultBridgeFactory: BridgeFactory = (config) =>
  new OsascriptBridge({ timeoutMs: config.bridge.timeoutMs });

export async function loadConfig(ctx: CliContext): Promise<Config> {
  return new ConfigManager(ctx.getConfigPath()).loadOrDefault();
}

export function openStore(ctx: CliContext, config: Config): TaskStore {
  const dbPath = resolveDatabasePath({ dbPath: ctx.getDbPath(), config });
  logger.debug({ event: 'db_open', path: dbPath });
  return TaskStore.open(dbPath);
}

/**
 * Compile `--where`; null when the option was not given
 * @throws {QueryError}
 */
export function compileQuery(query: string | undefined, config: Config): FilterExpression | null {
  if (query === undefined) {
    return null;
  }
  const result = parseFilter(query, { maxDepth: config.filter.maxDepth });
  if (!result.ok) {
    throw new QueryError(query, result.error);
  }
  logger.debug({ event: 'filter_compiled', query });
  return result.ast;
}

/**
 * Read from the store and always close it
 */
export function withStore<T>(ctx: CliContext, config: Config, fn: (store: TaskStore) => T): T {
  const store = openStore(ctx, config);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

/** commander argument parser for list views */
export function parseListView(value: string): ListView {
  if (!isListView(value)) {
    throw new InvalidArgumentError(`Expected one of: ${LIST_VIEWS.join(', ')}`);
  }
  return value;
}

/** commander argument parser for positive integers */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return n;
}

/**
 * Source line with a caret under the failing character
 */
export function pointAt(query: string, position: number | undefined): string[] {
  if (position === undefined) {
    return [];
  }
  return [query, `${' '.repeat(Math.min(position, query.length))}^`];
}

/**
 * Follow-up lines printed under an error
 */
export function errorHints(err: unknown): string[] {
  if (err instanceof QueryError) {
    return pointAt(err.query, err.filterError.position);
  }
  if (err instanceof TaskStoreError) {
    return databaseErrorHint(err);
  }
  if (err instanceof ConfigError && err.errors.length > 0) {
    return err.errors.map((e) => `- ${e.path || '(root)'}: ${e.message}`);
  }
  if (err instanceof JsonSourceError && err.errors.length > 0) {
    return err.errors.slice(0, 10).map((e) => `- ${e.path}: ${e.message}`);
  }
  return [];
}

/**
 * Stable code for errors tsift raises itself; undefined for anything else
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof QueryError) {
    return err.filterError.code;
  }
  if (err instanceof TaskStoreError || err instanceof BridgeError || isFilterError(err)) {
    return err.code;
  }
  if (err instanceof ConfigError) {
    return 'CONFIG_ERROR';
  }
  if (err instanceof JsonSourceError) {
    return 'JSON_SOURCE_ERROR';
  }
  return undefined;
}

/**
 * Print an error with its code and hints, then exit 1
 */
export function exitWithError(context: string, err: unknown): never {
  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);

  logger.debug({ event: 'command_failed', command: context, code, error: message });

  const cause = err instanceof Error ? err : undefined;
  if (code) {
    outputError(message, { code, hints: errorHints(err), cause });
  } else {
    outputError(`${context} failed: ${message}`, { cause });
  }
  process.exit(1);
}

/**
 * Print tasks: the records themselves under --json, one line each otherwise
 */
export function printTasks(tasks: readonly Task[], emptyMessage: string = 'No tasks.'): void {
  if (getOutputOptions().json) {
    output(tasks);
    return;
  }

  if (tasks.length === 0) {
    console.log(dim(emptyMessage));
    return;
  }

  const showId = getOutputOptions().verbose === true;
  for (const task of tasks) {
    console.log(formatTaskLine(task, { showId }));
  }
  console.log(dim(`${tasks.length} task${tasks.length === 1 ? '' : 's'}`));
}
