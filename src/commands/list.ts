/**
 * list command - show a built-in list, optionally narrowed by a filter
 *
 *   tsift list today --where "tags CONTAINS 'jira'"
 *   tsift list --from-json tasks.json --where "status = open"
 */

import { Command } from 'commander';
import { filterRecords, type FilterExpression } from '../filter/index.js';
import { loadTasksFromJson } from '../db/json-source.js';
import type { ListView, Task } from '../types/index.js';
import { LIST_VIEWS } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { outputError } from '../utils/output.js';
import {
  compileQuery,
  exitWithError,
  loadConfig,
  parseListView,
  parsePositiveInt,
  printTasks,
  withStore,
  type CliContext,
} from './shared.js';

interface ListOptions {
  where?: string;
  limit?: number;
  fromJson?: string;
}

/**
 * Apply the filter, then the limit
 */
export function selectTasks<T extends Task>(tasks: readonly T[], expr: FilterExpression | null, limit?: number): T[] {
  const matched = expr ? filterRecords(tasks, expr) : [...tasks];
  return limit === undefined ? matched : matched.slice(0, limit);
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List tasks in a built-in list')
    .argument(
      '[view]',
      `List to show (${LIST_VIEWS.join(', ')}; default from config; not with --from-json)`,
      parseListView
    )
    .option('-w, --where <query>', 'Only tasks matching a filter expression')
    .option('-n, --limit <n>', 'Show at most n tasks', parsePositiveInt)
    .option('--from-json <file>', 'Read tasks from a JSON file instead of the database')
    .action(async (view: ListView | undefined, options: ListOptions) => {
      if (view && options.fromJson) {
        outputError('A list view cannot be combined with --from-json', { code: 'USAGE_ERROR' });
        process.exit(1);
      }

      try {
        const startTime = Date.now();
        const config = await loadConfig(ctx);
        const expr = compileQuery(options.where, config);
        const listName = view ?? config.defaults.list;

        const tasks = options.fromJson
          ? await loadTasksFromJson(options.fromJson)
          : withStore(ctx, config, (store) => store.fetchList(listName));

        const selected = selectTasks(tasks, expr, options.limit);
        logger.debug({
          event: 'list_done',
          command: 'list',
          query: options.where,
          count: selected.length,
          duration_ms: Date.now() - startTime,
        });

        printTasks(selected, options.fromJson ? 'No tasks.' : `No tasks in ${listName}.`);
      } catch (error) {
        exitWithError('list', error);
      }
    });
}
