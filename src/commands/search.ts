/**
 * search command - substring search over titles and notes
 */

import { Command } from 'commander';
import { SEARCH_LIMIT } from '../db/task-store.js';
import { logger } from '../utils/logger.js';
import { selectTasks } from './list.js';
import {
  compileQuery,
  exitWithError,
  loadConfig,
  parsePositiveInt,
  printTasks,
  withStore,
  type CliContext,
} from './shared.js';

interface SearchOptions {
  where?: string;
  limit?: number;
}

export function createSearchCommand(ctx: CliContext): Command {
  return new Command('search')
    .description('Search task titles and notes')
    .argument('<text>', 'Text to look for (case-insensitive)')
    .option('-w, --where <query>', 'Only tasks matching a filter expression')
    .option('-n, --limit <n>', `Show at most n tasks (default ${SEARCH_LIMIT})`, parsePositiveInt)
    .action(async (text: string, options: SearchOptions) => {
      try {
        const config = await loadConfig(ctx);
        const expr = compileQuery(options.where, config);
        const limit = options.limit ?? SEARCH_LIMIT;
        // With a filter, the limit applies to what survives it
        const tasks = withStore(ctx, config, (store) => store.search(text, expr ? undefined : limit));
        const selected = selectTasks(tasks, expr, limit);

        logger.debug({ event: 'search_done', command: 'search', query: text, count: selected.length });
        printTasks(selected, `No tasks match "${text}".`);
      } catch (error) {
        exitWithError('search', error);
      }
    });
}
