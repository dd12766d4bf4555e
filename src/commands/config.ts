/**
 * Config commands
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/index.js';
import { output, outputSuccess, outputError, getOutputOptions } from '../utils/output.js';
import { dim } from '../utils/formatters.js';
import { exitWithError, type CliContext } from './shared.js';

export function createConfigCommand(ctx: CliContext): Command {
  const cmd = new Command('config')
    .description('Manage tasksift configuration');

  cmd
    .command('path')
    .description('Show the config file path')
    .action(() => {
      const configPath = ctx.getConfigPath();
      output({ path: configPath }, configPath);
    });

  cmd
    .command('init')
    .description('Initialize a new config file')
    .option('-f, --force', 'Overwrite existing config')
    .action(async (options: { force?: boolean }) => {
      try {
        const manager = new ConfigManager(ctx.getConfigPath());
        const result = await manager.init(options.force === true);

        if (result.created) {
          outputSuccess(`Config created at: ${result.path}`);
        } else {
          output(
            { exists: true, path: result.path },
            `Config already exists at: ${result.path}\nUse --force to overwrite.`
          );
        }
      } catch (error) {
        exitWithError('config init', error);
      }
    });

  cmd
    .command('show')
    .description('Show the effective config (defaults filled in)')
    .action(async () => {
      try {
        const manager = new ConfigManager(ctx.getConfigPath());
        const exists = await manager.exists();
        const config = await manager.loadOrDefault();

        if (getOutputOptions().json) {
          output(config);
          return;
        }

        if (!exists) {
          console.log(dim(`# No config file at ${manager.getConfigPath()}; showing defaults`));
        }
        console.log(JSON.stringify(config, null, 2));
      } catch (error) {
        exitWithError('config show', error);
      }
    });

  cmd
    .command('validate')
    .description('Validate the config file')
    .action(async () => {
      try {
        const manager = new ConfigManager(ctx.getConfigPath());
        const result = await manager.validate();

        if (result.valid) {
          outputSuccess('Config is valid');
        } else {
          if (getOutputOptions().json) {
            output({ valid: false, errors: result.errors });
          } else {
            outputError('Config validation failed', {
              code: 'CONFIG_ERROR',
              hints: result.errors.map((e) => `- ${e.path || '(root)'}: ${e.message}`),
            });
          }
          process.exit(1);
        }
      } catch (error) {
        exitWithError('config validate', error);
      }
    });

  return cmd;
}
