/**
 * osascript bridge - runs JavaScript for Automation scripts against the app
 */

import { execFile } from 'child_process';
import { canRunAutomation } from '../utils/terminal.js';
import { logger } from '../utils/logger.js';
import { buildAddTagsScript, buildSetStatusScript } from './scripts.js';
import {
  BridgeError,
  type AutomationBridge,
  type MutationResult,
  type ScriptRunner,
} from './types.js';

export const DEFAULT_BRIDGE_TIMEOUT_MS = 30000;

/** Output larger than this is an error */
const MAX_OUTPUT_BYTES = 1024 * 1024;

/**
 * Map osascript stderr to a bridge error
 */
export function classifyScriptFailure(stderr: string): BridgeError {
  const message = stderr.trim() || 'osascript failed';

  // -1743: the user has not allowed this terminal to control the app
  if (message.includes('-1743') || /not authori[sz]ed/i.test(message)) {
    return new BridgeError(
      'Not authorized to control Things 3. Allow it in System Settings > Privacy & Security > Automation.',
      'NOT_AUTHORIZED'
    );
  }
  if (message.includes('-600') || /isn.t running/i.test(message)) {
    return new BridgeError('Things 3 is not running', 'APP_NOT_RUNNING');
  }
  return new BridgeError(message, 'SCRIPT_FAILED');
}

/**
 * Default runner: `osascript -l JavaScript -e <script>`
 */
export const runOsascript: ScriptRunner = (script, { timeoutMs }) =>
  new Promise((resolve, reject) => {
    if (!canRunAutomation()) {
      reject(new BridgeError('Mutations need macOS with Things 3 installed', 'NOT_AVAILABLE'));
      return;
    }

    execFile(
      'osascript',
      ['-l', 'JavaScript', '-e', script],
      { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf-8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve(stdout);
          return;
        }
        if (String(error.code) === 'ENOENT') {
          reject(new BridgeError('osascript not found', 'NOT_AVAILABLE', { cause: error }));
        } else if (error.killed) {
          reject(new BridgeError(`Script timed out after ${timeoutMs}ms`, 'TIMEOUT', { cause: error }));
        } else {
          reject(classifyScriptFailure(stderr));
        }
      }
    );
  });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the JSON result a mutation script prints
 */
export function parseMutationResult(stdout: string, id: string): MutationResult {
  const trimmed = stdout.trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return { id, success: false, error: `Unexpected script output: ${trimmed.slice(0, 200)}` };
  }

  if (!isRecord(parsed) || typeof parsed.success !== 'boolean') {
    return { id, success: false, error: `Unexpected script output: ${trimmed.slice(0, 200)}` };
  }

  if (parsed.success) {
    return { id, success: true };
  }
  return {
    id,
    success: false,
    error: typeof parsed.error === 'string' ? parsed.error : 'Unknown error',
  };
}

export interface OsascriptBridgeOptions {
  timeoutMs?: number;
  /** Replaces osascript (tests) */
  runner?: ScriptRunner;
}

export class OsascriptBridge implements AutomationBridge {
  private readonly timeoutMs: number;
  private readonly runner: ScriptRunner;

  constructor(options: OsascriptBridgeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BRIDGE_TIMEOUT_MS;
    this.runner = options.runner ?? runOsascript;
  }

  completeTask(id: string): Promise<MutationResult> {
    return this.run(id, 'complete', buildSetStatusScript(id, 'completed'));
  }

  cancelTask(id: string): Promise<MutationResult> {
    return this.run(id, 'cancel', buildSetStatusScript(id, 'canceled'));
  }

  addTags(id: string, tags: readonly string[]): Promise<MutationResult> {
    return this.run(id, 'tag', buildAddTagsScript(id, tags));
  }

  /**
   * Per-task failures resolve as unsuccessful results.
   * @throws {BridgeError} only when no script can run at all (NOT_AVAILABLE, NOT_AUTHORIZED)
   */
  private async run(id: string, action: string, script: string): Promise<MutationResult> {
    const startTime = Date.now();
    let stdout: string;
    try {
      stdout = await this.runner(script, { timeoutMs: this.timeoutMs });
    } catch (err) {
      if (err instanceof BridgeError && (err.code === 'NOT_AVAILABLE' || err.code === 'NOT_AUTHORIZED')) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ event: 'bridge_failed', task_id: id, action, error: message });
      return { id, success: false, error: message };
    }

    const result = parseMutationResult(stdout, id);
    logger.debug({
      event: 'bridge_script',
      task_id: id,
      action,
      success: result.success,
      duration_ms: Date.now() - startTime,
    });
    return result;
  }
}
