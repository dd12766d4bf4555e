/**
 * Output helpers
 *
 * Every command prints through these so that `--json` switches the whole
 * CLI between human text and machine-readable records. Errors always go
 * to stderr; in JSON mode they are a single object with a stable code.
 */

import { formatTable } from './formatters.js';

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

/** What an error carries beyond its message */
export interface ErrorDetail {
  /** Stable identifier scripts can branch on, e.g. `PARSE_ERROR` */
  code?: string;
  /** Follow-up lines: a caret under a query, setup advice, per-field problems */
  hints?: readonly string[];
  /** Underlying error; its stack is printed with --verbose */
  cause?: Error;
}

/** Shape of an error in --json mode */
export interface ErrorPayload {
  error: string;
  code?: string;
  hints?: string[];
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

/**
 * Print `data` as JSON, or the human rendering (one string or several lines)
 */
export function output(data: unknown, humanReadable?: string | readonly string[]): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  if (humanReadable === undefined) {
    console.log(String(data));
  } else if (typeof humanReadable === 'string') {
    console.log(humanReadable);
  } else {
    for (const line of humanReadable) {
      console.log(line);
    }
  }
}

export function errorPayload(message: string, detail: ErrorDetail = {}): ErrorPayload {
  const payload: ErrorPayload = { error: message };
  if (detail.code) {
    payload.code = detail.code;
  }
  if (detail.hints && detail.hints.length > 0) {
    payload.hints = [...detail.hints];
  }
  return payload;
}

export function outputError(message: string, detail: ErrorDetail = {}): void {
  if (globalOptions.json) {
    console.error(JSON.stringify(errorPayload(message, detail)));
    return;
  }

  console.error(`Error: ${message}`);
  for (const hint of detail.hints ?? []) {
    console.error(`  ${hint}`);
  }
  if (detail.cause?.stack && globalOptions.verbose) {
    console.error(detail.cause.stack);
  }
}

export function outputSuccess(message: string, data?: unknown): void {
  if (globalOptions.json) {
    const result: { success: boolean; message: string; data?: unknown } = {
      success: true,
      message,
    };
    if (data !== undefined) {
      result.data = data;
    }
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ ${message}`);
  }
}

/**
 * Rows as objects keyed by header under --json, an aligned table otherwise
 */
export function outputTable(headers: string[], rows: string[][]): void {
  if (globalOptions.json) {
    const objects = rows.map((row) =>
      Object.fromEntries(headers.map((h, i) => [h, row[i] ?? '']))
    );
    console.log(JSON.stringify(objects, null, 2));
    return;
  }

  console.log(formatTable(headers, rows));
}
