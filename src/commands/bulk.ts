/**
 * bulk command - complete, cancel or tag every task a filter selects
 *
 *   tsift bulk complete --where "tags CONTAINS 'done-ish'" --dry-run
 *   tsift bulk tag waiting --list today --where "project IS NULL" --yes
 *
 * Targets are read from the database; changes go through the automation
 * bridge one task at a time.
 */

import { Command } from 'commander';
import {
  describeAction,
  executeBulk,
  parseTagList,
  planBulk,
  type BatchResult,
  type BulkAction,
} from '../bulk/index.js';
import type { ListView, Task } from '../types/index.js';
import { getOutputOptions, output, outputError } from '../utils/output.js';
import { bold, dim, error as errorText, formatTaskLine, success } from '../utils/formatters.js';
import { detectTerminal } from '../utils/terminal.js';
import { confirm } from '../utils/prompt.js';
import { withSpinner } from '../utils/spinner.js';
import {
  compileQuery,
  defaultBridgeFactory,
  exitWithError,
  loadConfig,
  parseListView,
  withStore,
  type BridgeFactory,
  type CliContext,
} from './shared.js';

interface BulkOptions {
  where?: string;
  list?: ListView;
  dryRun?: boolean;
  yes?: boolean;
}

/** Targets shown before asking; the rest are summarized */
const PREVIEW_LIMIT = 20;

/**
 * Human summary of a finished batch
 */
export function formatBatchSummary(result: BatchResult): string[] {
  const lines = [`Completed: ${result.succeeded}, Failed: ${result.failed}`];
  for (const e of result.errors) {
    lines.push(`  ✗ ${e.name} (${e.id}): ${e.error}`);
  }
  return lines;
}

function printTargets(targets: readonly Task[], action: BulkAction): void {
  console.log(bold(`Will ${describeAction(action)} ${targets.length} task${targets.length === 1 ? '' : 's'}:`));
  for (const task of targets.slice(0, PREVIEW_LIMIT)) {
    console.log(`  ${formatTaskLine(task)}`);
  }
  if (targets.length > PREVIEW_LIMIT) {
    console.log(dim(`  ... and ${targets.length - PREVIEW_LIMIT} more`));
  }
  console.log();
}

async function runBulk(
  ctx: CliContext,
  action: BulkAction,
  options: BulkOptions,
  bridgeFactory: BridgeFactory
): Promise<void> {
  if (options.where === undefined && options.list === undefined) {
    outputError('Select tasks with --where and/or --list');
    process.exit(1);
  }

  const config = await loadConfig(ctx);
  const expr = compileQuery(options.where, config);
  const tasks = withStore(ctx, config, (store) =>
    options.list ? store.fetchList(options.list) : store.fetchAll()
  );
  const targets = planBulk(tasks, expr);
  const json = getOutputOptions().json === true;
  const actionName = describeAction(action);

  if (targets.length === 0) {
    if (json) {
      output({ action: actionName, dry_run: options.dryRun === true, matched: 0, succeeded: 0, failed: 0, errors: [] });
    } else {
      console.log(dim('No matching tasks.'));
    }
    return;
  }

  if (options.dryRun) {
    if (json) {
      output({
        action: actionName,
        dry_run: true,
        matched: targets.length,
        targets: targets.map((t) => ({ id: t.id, name: t.name })),
      });
    } else {
      printTargets(targets, action);
      console.log(dim('Dry run: no changes made.'));
    }
    return;
  }

  if (!json) {
    printTargets(targets, action);
  }

  if (!options.yes) {
    if (json || !detectTerminal().interactive) {
      outputError('Confirmation required; pass --yes to apply without asking');
      process.exit(1);
    }
    if (!(await confirm('Proceed?'))) {
      console.log('Aborted.');
      return;
    }
  }

  const bridge = bridgeFactory(config);
  const result = await withSpinner(`Applying to ${targets.length} tasks...`, (spinner) =>
    executeBulk(bridge, targets, action, {
      onProgress: (done, total) => {
        if (spinner) {
          spinner.text = `Applying... ${done}/${total}`;
        }
      },
    })
  );

  if (json) {
    output({ action: actionName, dry_run: false, matched: targets.length, ...result });
  } else {
    const [headline, ...details] = formatBatchSummary(result);
    console.log(result.failed === 0 ? success(headline) : errorText(headline));
    for (const line of details) {
      console.log(line);
    }
  }

  if (result.failed > 0) {
    process.exitCode = 1;
  }
}

function addSelectionOptions(cmd: Command): Command {
  return cmd
    .option('-w, --where <query>', 'Filter expression selecting the tasks')
    .option('-l, --list <view>', 'Start from a built-in list instead of all open tasks', parseListView)
    .option('--dry-run', 'Show the tasks that would change, then stop')
    .option('-y, --yes', 'Do not ask for confirmation');
}

export function createBulkCommand(ctx: CliContext, bridgeFactory: BridgeFactory = defaultBridgeFactory): Command {
  const cmd = new Command('bulk').description('Change many tasks at once');

  cmd.addCommand(
    addSelectionOptions(new Command('complete').description('Mark matching tasks completed')).action(
      async (options: BulkOptions) => {
        try {
          await runBulk(ctx, { type: 'complete' }, options, bridgeFactory);
        } catch (error) {
          exitWithError('bulk complete', error);
        }
      }
    )
  );

  cmd.addCommand(
    addSelectionOptions(new Command('cancel').description('Mark matching tasks canceled')).action(
      async (options: BulkOptions) => {
        try {
          await runBulk(ctx, { type: 'cancel' }, options, bridgeFactory);
        } catch (error) {
          exitWithError('bulk cancel', error);
        }
      }
    )
  );

  cmd.addCommand(
    addSelectionOptions(
      new Command('tag')
        .description('Add tags to matching tasks')
        .argument('<tags>', 'Comma-separated tag names')
    ).action(async (tagArg: string, options: BulkOptions) => {
      try {
        const tags = parseTagList(tagArg);
        if (tags.length === 0) {
          outputError('No tag names given');
          process.exit(1);
        }
        await runBulk(ctx, { type: 'tag', tags }, options, bridgeFactory);
      } catch (error) {
        exitWithError('bulk tag', error);
      }
    })
  );

  return cmd;
}
