/**
 * osascript bridge tests (script runner faked in-process)
 */

import { describe, it, expect, vi } from 'vitest';
import { OsascriptBridge, classifyScriptFailure, parseMutationResult } from './osascript.js';
import { BridgeError, type ScriptRunner } from './types.js';

describe('parseMutationResult', () => {
  it('reads success', () => {
    expect(parseMutationResult('{"success":true,"id":"T1"}\n', 'T1')).toEqual({ id: 'T1', success: true });
  });

  it('reads failure with its message', () => {
    expect(parseMutationResult('{"success":false,"error":"Todo not found","id":"T1"}', 'T1')).toEqual({
      id: 'T1',
      success: false,
      error: 'Todo not found',
    });
  });

  it('reports output that is not a result', () => {
    expect(parseMutationResult('', 'T1')).toEqual({ id: 'T1', success: false, error: 'Unexpected script output: ' });
    expect(parseMutationResult('[1]', 'T1')).toEqual({
      id: 'T1',
      success: false,
      error: 'Unexpected script output: [1]',
    });
  });
});

describe('classifyScriptFailure', () => {
  it('detects missing automation permission', () => {
    expect(classifyScriptFailure('execution error: Not authorized to send Apple events to Things3. (-1743)').code).toBe(
      'NOT_AUTHORIZED'
    );
  });

  it('detects the app not running', () => {
    expect(classifyScriptFailure("execution error: Application isn't running. (-600)").code).toBe('APP_NOT_RUNNING');
  });

  it('keeps other messages', () => {
    const error = classifyScriptFailure('  syntax error  \n');
    expect(error.code).toBe('SCRIPT_FAILED');
    expect(error.message).toBe('syntax error');
  });
});

describe('OsascriptBridge', () => {
  function fakeRunner(output: string) {
    return vi.fn<ScriptRunner>().mockResolvedValue(output);
  }

  it('completes a task', async () => {
    const runner = fakeRunner('{"success":true,"id":"T1"}');
    const bridge = new OsascriptBridge({ runner, timeoutMs: 5000 });

    await expect(bridge.completeTask('T1')).resolves.toEqual({ id: 'T1', success: true });
    expect(runner).toHaveBeenCalledTimes(1);
    expect(runner.mock.calls[0][0]).toContain("todo.status = 'completed';");
    expect(runner.mock.calls[0][1]).toEqual({ timeoutMs: 5000 });
  });

  it('cancels a task', async () => {
    const runner = fakeRunner('{"success":true,"id":"T2"}');
    await new OsascriptBridge({ runner }).cancelTask('T2');
    expect(runner.mock.calls[0][0]).toContain("todo.status = 'canceled';");
    expect(runner.mock.calls[0][1]).toEqual({ timeoutMs: 30000 });
  });

  it('adds tags', async () => {
    const runner = fakeRunner('{"success":true,"id":"T3"}');
    await new OsascriptBridge({ runner }).addTags('T3', ['later']);
    expect(runner.mock.calls[0][0]).toContain("['later'].filter");
  });

  it('turns a per-task script failure into a failed result', async () => {
    const runner: ScriptRunner = () => Promise.reject(new BridgeError('Script timed out after 10ms', 'TIMEOUT'));
    await expect(new OsascriptBridge({ runner }).completeTask('T1')).resolves.toEqual({
      id: 'T1',
      success: false,
      error: 'Script timed out after 10ms',
    });
  });

  it('rethrows when scripts cannot run at all', async () => {
    const runner: ScriptRunner = () => Promise.reject(new BridgeError('osascript not found', 'NOT_AVAILABLE'));
    await expect(new OsascriptBridge({ runner }).completeTask('T1')).rejects.toBeInstanceOf(BridgeError);
  });
});
