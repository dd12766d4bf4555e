/**
 * Mutation bridge types
 *
 * Writes never touch the task database directly; they go through the
 * app's scripting interface.
 */

export interface MutationResult {
  id: string;
  success: boolean;
  error?: string;
}

export interface AutomationBridge {
  completeTask(id: string): Promise<MutationResult>;
  cancelTask(id: string): Promise<MutationResult>;
  /** Add tags, keeping the ones the task already has */
  addTags(id: string, tags: readonly string[]): Promise<MutationResult>;
}

/**
 * Runs one automation script and resolves to its stdout
 */
export type ScriptRunner = (script: string, options: { timeoutMs: number }) => Promise<string>;

export type BridgeErrorCode = 'NOT_AVAILABLE' | 'NOT_AUTHORIZED' | 'APP_NOT_RUNNING' | 'TIMEOUT' | 'SCRIPT_FAILED';

export class BridgeError extends Error {
  constructor(
    message: string,
    readonly code: BridgeErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BridgeError';
  }
}
