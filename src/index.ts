/**
 * tasksift - filter and bulk-edit Things 3 tasks
 * Programmatic API exports
 */

// Filter DSL
export * from './filter/index.js';

// Types
export type { ListView, Task, StoreSummary } from './types/task.js';
export { LIST_VIEWS, isListView } from './types/task.js';
export type {
  ColorMode,
  Config,
  DatabaseConfig,
  DefaultsConfig,
  BridgeConfig,
  FilterConfig,
  OutputConfig,
} from './types/config.js';
export { DEFAULT_CONFIG } from './types/config.js';

// Config
export { ConfigManager, ConfigError, createDefaultConfig, parseConfig, validateConfig } from './config/index.js';

// Task database
export { TaskStore, statusFromCode } from './db/task-store.js';
export {
  TaskStoreError,
  findThingsDatabase,
  openTaskDatabase,
  resolveDatabasePath,
} from './db/connection.js';
export { JsonSourceError, loadTasksFromJson, parseTasksJson } from './db/json-source.js';

// Mutations
export * from './bridge/index.js';
export * from './bulk/index.js';

// Logging
export { createLogger } from './utils/logger.js';
export type { Logger, LogEntry, LogLevel } from './utils/logger.js';
