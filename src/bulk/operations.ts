/**
 * Bulk operations - apply one mutation to every task a filter selects
 */

import { filterRecords, type FilterExpression } from '../filter/index.js';
import { BridgeError, type AutomationBridge, type MutationResult } from '../bridge/index.js';
import type { Task } from '../types/index.js';
import { logger } from '../utils/logger.js';

export type BulkAction =
  | { type: 'complete' }
  | { type: 'cancel' }
  | { type: 'tag'; tags: readonly string[] };

export interface BatchError {
  id: string;
  name: string;
  error: string;
}

export interface BatchResult {
  succeeded: number;
  failed: number;
  errors: BatchError[];
}

export interface ExecuteBulkOptions {
  /** Called after each task */
  onProgress?: (done: number, total: number, task: Task) => void;
}

export function describeAction(action: BulkAction): string {
  switch (action.type) {
    case 'complete':
      return 'complete';
    case 'cancel':
      return 'cancel';
    case 'tag':
      return `tag with ${action.tags.join(', ')}`;
  }
}

/**
 * Split a comma-separated tag argument. Blank entries and repeats are dropped.
 */
export function parseTagList(input: string): string[] {
  const tags: string[] = [];
  for (const part of input.split(',')) {
    const tag = part.trim();
    if (tag && !tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags;
}

/**
 * Select the tasks a bulk action will touch.
 * A null expression selects every task.
 */
export function planBulk<T extends Task>(tasks: readonly T[], expr: FilterExpression | null): T[] {
  return expr ? filterRecords(tasks, expr) : [...tasks];
}

function apply(bridge: AutomationBridge, task: Task, action: BulkAction): Promise<MutationResult> {
  switch (action.type) {
    case 'complete':
      return bridge.completeTask(task.id);
    case 'cancel':
      return bridge.cancelTask(task.id);
    case 'tag':
      return bridge.addTags(task.id, action.tags);
  }
}

/**
 * Apply `action` to each target in order, one at a time.
 * A failure on one task does not stop the rest.
 *
 * @throws {BridgeError} when the bridge cannot run at all
 */
export async function executeBulk(
  bridge: AutomationBridge,
  targets: readonly Task[],
  action: BulkAction,
  options: ExecuteBulkOptions = {}
): Promise<BatchResult> {
  const result: BatchResult = { succeeded: 0, failed: 0, errors: [] };
  const startTime = Date.now();

  logger.info({ event: 'bulk_start', action: action.type, count: targets.length });

  for (const [index, task] of targets.entries()) {
    let outcome: MutationResult;
    try {
      outcome = await apply(bridge, task, action);
    } catch (err) {
      if (err instanceof BridgeError) {
        throw err;
      }
      outcome = { id: task.id, success: false, error: err instanceof Error ? err.message : String(err) };
    }

    if (outcome.success) {
      result.succeeded++;
    } else {
      result.failed++;
      result.errors.push({ id: task.id, name: task.name, error: outcome.error ?? 'Unknown error' });
    }
    options.onProgress?.(index + 1, targets.length, task);
  }

  logger.info({
    event: 'bulk_done',
    action: action.type,
    count: targets.length,
    succeeded: result.succeeded,
    failed: result.failed,
    duration_ms: Date.now() - startTime,
  });

  return result;
}
