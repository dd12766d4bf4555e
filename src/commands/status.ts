/**
 * Status command - show config, database location and record counts
 */

import { Command } from 'commander';
import { statSync } from 'fs';
import { ConfigManager } from '../config/index.js';
import { TaskStore } from '../db/task-store.js';
import { TaskStoreError, databaseErrorHint, resolveDatabasePath } from '../db/connection.js';
import type { StoreSummary } from '../types/index.js';
import { output, getOutputOptions } from '../utils/output.js';
import { formatBytes, warning } from '../utils/formatters.js';
import { exitWithError, type CliContext } from './shared.js';

interface DatabaseStatus {
  path: string | null;
  size: number | null;
  counts: StoreSummary | null;
  error: string | null;
}

async function inspectDatabase(
  dbPath: string | undefined,
  manager: ConfigManager,
  hints: string[]
): Promise<DatabaseStatus> {
  const config = await manager.loadOrDefault();

  let path: string;
  try {
    path = resolveDatabasePath({ dbPath, config });
  } catch (err) {
    if (err instanceof TaskStoreError) {
      hints.push(...databaseErrorHint(err));
      return { path: null, size: null, counts: null, error: err.message };
    }
    throw err;
  }

  try {
    const store = TaskStore.open(path);
    try {
      return { path, size: statSync(path).size, counts: store.countSummary(), error: null };
    } finally {
      store.close();
    }
  } catch (err) {
    if (err instanceof TaskStoreError) {
      hints.push(...databaseErrorHint(err));
      return { path, size: null, counts: null, error: err.message };
    }
    throw err;
  }
}

export function createStatusCommand(ctx: CliContext): Command {
  const cmd = new Command('status')
    .description('Show config, database and record counts')
    .action(async () => {
      try {
        const manager = new ConfigManager(ctx.getConfigPath());
        const configExists = await manager.exists();
        const hints: string[] = [];
        const db = await inspectDatabase(ctx.getDbPath(), manager, hints);

        if (getOutputOptions().json) {
          output({
            config_path: manager.getConfigPath(),
            config_exists: configExists,
            database: db,
          });
          return;
        }

        console.log('tasksift Status');
        console.log('═════════════════════════════════════════════════════');
        console.log();

        console.log('Configuration:');
        console.log(`  Config file:  ${manager.getConfigPath()}${configExists ? '' : ' (not created, using defaults)'}`);
        console.log();

        console.log('Database:');
        if (db.path) {
          console.log(`  Path:         ${db.path}`);
        }
        if (db.size !== null) {
          console.log(`  Size:         ${formatBytes(db.size)}`);
        }
        if (db.error) {
          console.log(`  ${warning(db.error)}`);
          for (const hint of hints) {
            console.log(`  ${hint}`);
          }
        }
        console.log();

        if (db.counts) {
          console.log('Data Summary:');
          console.log(`  Open tasks:   ${db.counts.openTasks}`);
          console.log(`  Projects:     ${db.counts.projects}`);
          console.log(`  Areas:        ${db.counts.areas}`);
          console.log(`  Tags:         ${db.counts.tags}`);
          console.log();
        }

        console.log('Quick Commands:');
        console.log('  tsift list today                        Show the Today list');
        console.log("  tsift list --where \"tags CONTAINS 'x'\"  Filter open tasks");
        console.log('  tsift filter fields                     Fields a filter can use');
      } catch (error) {
        exitWithError('status', error);
      }
    });

  return cmd;
}
