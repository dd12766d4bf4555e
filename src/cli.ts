#!/usr/bin/env node
/**
 * tasksift CLI - filter and bulk-edit Things 3 tasks
 *
 * Command structure (git-style flat):
 *   tsift list [view]    # Show a built-in list (default)
 *   tsift search <text>  # Search titles and notes
 *   tsift show <id>      # One task in full
 *   tsift complete <id>  # Complete / cancel one task
 *   tsift tags           # tags / projects / areas
 *   tsift bulk ...       # complete / cancel / tag matching tasks
 *   tsift filter ...     # check / explain / fields
 *   tsift config ...     # path / init / show / validate
 *   tsift status         # Config, database and counts
 *
 * Shortcuts:
 *   ls = list, s = search, st = status
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveConfigPath } from './utils/config-path.js';
import { setOutputOptions } from './utils/output.js';
import { configureLogger } from './utils/logger.js';
import { setColorMode } from './utils/formatters.js';
import { ConfigManager } from './config/index.js';
import {
  createAreasCommand,
  createBulkCommand,
  createCancelCommand,
  createCompleteCommand,
  createConfigCommand,
  createFilterCommand,
  createListCommand,
  createProjectsCommand,
  createSearchCommand,
  createShowCommand,
  createStatusCommand,
  createTagsCommand,
  withDefaultCommand,
  type CliContext,
} from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');
const VERSION = packageJson.version;

const program = new Command();

// Global state for --config / --db
let globalConfigPath: string | undefined;
let globalDbPath: string | undefined;

const ctx: CliContext = {
  getConfigPath: () => resolveConfigPath({ configPath: globalConfigPath }),
  getDbPath: () => globalDbPath,
};

const HELP_HEADER = `
tasksift - filter and bulk-edit Things 3 tasks

Common Commands:
  list, ls      Show a built-in list (default: config defaults.list)
  search, s     Search task titles and notes
  show          Show one task in full
  complete      Complete one task by id
  cancel        Cancel one task by id
  bulk          Complete, cancel or tag many tasks at once
  tags          List tag names
  projects      List open projects
  areas         List areas
  filter        Check or explain a filter expression
  status, st    Show config, database and counts

Management:
  config        Configuration management

Filter expressions:
  status = open AND (tags CONTAINS 'jira' OR area LIKE '%Work%')
  Fields: name notes status tags project area due (deadline)
  Operators: = != LIKE CONTAINS IN (...) IS [NOT] NULL, with NOT AND OR

Examples:
  tsift                                         # Today's tasks
  tsift list anytime --where "project IS NULL"
  tsift search invoice --where "status = open"
  tsift bulk complete --where "tags CONTAINS 'done'" --dry-run
  tsift filter explain "NOT (a = 'x') OR status = open"
`;

program
  .name('tsift')
  .description('Filter and bulk-edit Things 3 tasks')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to config file')
  .option('--db <path>', 'Path to the Things database')
  .option('--json', 'Output in JSON format')
  .option('-v, --verbose', 'Verbose output (debug logs on stderr)')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', async (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string; db?: string; json?: boolean; verbose?: boolean }>();
    globalConfigPath = opts.config;
    globalDbPath = opts.db;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
    configureLogger({ verbose: opts.verbose });

    // A broken config is reported by the command itself; colors stay on auto
    const config = await new ConfigManager(ctx.getConfigPath()).loadOrDefault().catch(() => null);
    setColorMode(config?.output.color ?? 'auto');
  });

// ============================================================
// Commands
// ============================================================

// list (default command)
program.addCommand(createListCommand(ctx));

// Alias: ls = list
const lsCmd = createListCommand(ctx);
lsCmd.name('ls').description('Alias for list');
program.addCommand(lsCmd);

// search
program.addCommand(createSearchCommand(ctx));

// Alias: s = search
const sCmd = createSearchCommand(ctx);
sCmd.name('s').description('Alias for search');
program.addCommand(sCmd);

program.addCommand(createShowCommand(ctx));
program.addCommand(createCompleteCommand(ctx));
program.addCommand(createCancelCommand(ctx));
program.addCommand(createBulkCommand(ctx));
program.addCommand(createTagsCommand(ctx));
program.addCommand(createProjectsCommand(ctx));
program.addCommand(createAreasCommand(ctx));
program.addCommand(createFilterCommand(ctx));
program.addCommand(createConfigCommand(ctx));

// status
program.addCommand(createStatusCommand(ctx));

// Alias: st = status
const stCmd = createStatusCommand(ctx);
stCmd.name('st').description('Alias for status');
program.addCommand(stCmd);

// ============================================================
// Default action: tsift → tsift list
// ============================================================

const KNOWN_COMMANDS = new Set(program.commands.map((cmd) => cmd.name()).concat('help'));

await program.parseAsync(withDefaultCommand(process.argv, KNOWN_COMMANDS));
