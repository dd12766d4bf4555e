export type { AutomationBridge, BridgeErrorCode, MutationResult, ScriptRunner } from './types.js';
export { BridgeError } from './types.js';
export { buildAddTagsScript, buildSetStatusScript, escapeScriptString, scriptStringArray } from './scripts.js';
export type { TerminalStatus } from './scripts.js';
export {
  DEFAULT_BRIDGE_TIMEOUT_MS,
  OsascriptBridge,
  classifyScriptFailure,
  parseMutationResult,
  runOsascript,
} from './osascript.js';
export type { OsascriptBridgeOptions } from './osascript.js';
