/**
 * complete / cancel commands - change one to-do by id
 *
 *   tsift complete 7E3A1C2B-...
 *
 * For many tasks at once see `tsift bulk`.
 */

import { Command } from 'commander';
import { BridgeError } from '../bridge/index.js';
import { outputSuccess } from '../utils/output.js';
import { logger } from '../utils/logger.js';
import { withSpinner } from '../utils/spinner.js';
import {
  defaultBridgeFactory,
  exitWithError,
  loadConfig,
  type BridgeFactory,
  type CliContext,
} from './shared.js';

type SingleAction = 'complete' | 'cancel';

const WORDING: Record<SingleAction, { doing: string; done: string; status: string }> = {
  complete: { doing: 'Completing', done: 'Completed', status: 'completed' },
  cancel: { doing: 'Canceling', done: 'Canceled', status: 'canceled' },
};

function createSingleCommand(ctx: CliContext, action: SingleAction, bridgeFactory: BridgeFactory): Command {
  return new Command(action)
    .description(`Mark one task as ${WORDING[action].status}`)
    .argument('<id>', 'Task id')
    .action(async (id: string) => {
      try {
        const config = await loadConfig(ctx);
        const bridge = bridgeFactory(config);
        const result = await withSpinner(`${WORDING[action].doing} ${id}...`, () =>
          action === 'complete' ? bridge.completeTask(id) : bridge.cancelTask(id)
        );

        logger.debug({ event: 'task_mutated', command: action, task_id: id, success: result.success });
        if (!result.success) {
          throw new BridgeError(`Could not ${action} ${id}: ${result.error ?? 'unknown error'}`, 'SCRIPT_FAILED');
        }
        outputSuccess(`${WORDING[action].done} ${id}`, result);
      } catch (error) {
        exitWithError(action, error);
      }
    });
}

export function createCompleteCommand(
  ctx: CliContext,
  bridgeFactory: BridgeFactory = defaultBridgeFactory
): Command {
  return createSingleCommand(ctx, 'complete', bridgeFactory);
}

export function createCancelCommand(ctx: CliContext, bridgeFactory: BridgeFactory = defaultBridgeFactory): Command {
  return createSingleCommand(ctx, 'cancel', bridgeFactory);
}
