/**
 * Task database connection management
 *
 * The task database belongs to the task manager app. It is only ever
 * opened read-only; writes go through the automation bridge.
 */

import Database from 'better-sqlite3';
import { join } from 'path';
import { homedir } from 'os';
import { existsSync, readdirSync, statSync } from 'fs';
import type { Config } from '../types/index.js';

export const DB_ENV_VAR = 'TASKSIFT_DB';

/** App group container, relative to the home directory */
export const GROUP_CONTAINER = 'Library/Group Containers/JLMPQHK86H.com.culturedcode.ThingsMac';

/** Database file inside a ThingsData-* directory */
export const DATABASE_RELATIVE_PATH = 'Things Database.thingsdatabase/main.sqlite';

export type TaskStoreErrorCode = 'NOT_FOUND' | 'OPEN_FAILED' | 'QUERY_FAILED';

export class TaskStoreError extends Error {
  constructor(
    message: string,
    readonly code: TaskStoreErrorCode,
    readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TaskStoreError';
  }
}

/**
 * Look for the database under the app group container.
 * The data directory carries a per-install suffix (ThingsData-XXXXX).
 */
export function findThingsDatabase(home: string = homedir()): string | null {
  const containerPath = join(home, GROUP_CONTAINER);

  let entries: string[];
  try {
    entries = readdirSync(containerPath);
  } catch {
    return null;
  }

  for (const name of entries.sort()) {
    if (!name.startsWith('ThingsData-')) continue;
    const candidate = join(containerPath, name, DATABASE_RELATIVE_PATH);
    if (existsSync(candidate) && statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return null;
}

export interface ResolveDatabaseOptions {
  /** Explicit path (--db) */
  dbPath?: string;
  config?: Config;
  home?: string;
}

/**
 * Resolve the database path
 *
 * Priority:
 * 1. --db option
 * 2. TASKSIFT_DB environment variable
 * 3. database.path from config
 * 4. Discovery under the group container
 *
 * @throws {TaskStoreError} when nothing is found
 */
export function resolveDatabasePath(options: ResolveDatabaseOptions = {}): string {
  if (options.dbPath) {
    return options.dbPath;
  }

  const envPath = process.env[DB_ENV_VAR];
  if (envPath) {
    return envPath;
  }

  if (options.config?.database?.path) {
    return options.config.database.path;
  }

  const discovered = findThingsDatabase(options.home);
  if (discovered) {
    return discovered;
  }

  throw new TaskStoreError(
    `Could not find the Things 3 database. Set ${DB_ENV_VAR}, database.path in config, or pass --db.`,
    'NOT_FOUND'
  );
}

/**
 * Open the task database read-only
 * @throws {TaskStoreError} when the file is missing or unreadable
 */
export function openTaskDatabase(dbPath: string): Database.Database {
  if (!existsSync(dbPath)) {
    throw new TaskStoreError(`Database not found: ${dbPath}`, 'NOT_FOUND', dbPath);
  }

  try {
    return new Database(dbPath, { readonly: true, fileMustExist: true });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TaskStoreError(`Failed to open database: ${reason}`, 'OPEN_FAILED', dbPath, { cause: err });
  }
}

/**
 * Recovery hint printed under a database error (human output only)
 */
export function databaseErrorHint(err: TaskStoreError): string[] {
  switch (err.code) {
    case 'NOT_FOUND':
      return [
        'Is Things 3 installed and opened at least once?',
        `Point to the database explicitly with --db or ${DB_ENV_VAR}.`,
        'Or read exported tasks with: tsift list --from-json <file>',
      ];
    case 'OPEN_FAILED':
      return [
        'The terminal may need Full Disk Access',
        '(System Settings > Privacy & Security > Full Disk Access).',
      ];
    case 'QUERY_FAILED':
      return ['The database schema may be from an unsupported app version.'];
  }
}
