/**
 * show command - every field of one to-do
 *
 *   tsift show 7E3A1C2B-...
 */

import { Command } from 'commander';
import type { Task } from '../types/index.js';
import { output, outputError } from '../utils/output.js';
import { formatTaskDetails } from '../utils/formatters.js';
import { exitWithError, loadConfig, withStore, type CliContext } from './shared.js';

export function createShowCommand(ctx: CliContext): Command {
  return new Command('show')
    .description('Show one task in full')
    .argument('<id>', 'Task id (shown in list output with --verbose)')
    .action(async (id: string) => {
      let found: Task | null = null;
      try {
        const config = await loadConfig(ctx);
        found = withStore(ctx, config, (store) => store.fetchTask(id));
      } catch (error) {
        exitWithError('show', error);
      }

      if (!found) {
        outputError(`Task not found: ${id}`, { code: 'TASK_NOT_FOUND' });
        process.exit(1);
      }

      output(found, formatTaskDetails(found));
    });
}
