/**
 * Structured JSON logger
 *
 * One JSON object per line on stderr, so stdout stays clean for
 * command output and --json results.
 *
 * Log format:
 * { timestamp, level, event, ... }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields a caller passes; timestamp and level are added on write */
export interface LogInput {
  event: string;
  command?: string;
  task_id?: string;
  query?: string;
  count?: number;
  duration_ms?: number;
  path?: string;
  error?: string;
  [key: string]: unknown;
}

export interface LogEntry extends LogInput {
  timestamp: string;
  level: LogLevel;
}

export interface Logger {
  debug(entry: LogInput): void;
  info(entry: LogInput): void;
  warn(entry: LogInput): void;
  error(entry: LogInput): void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function writeStderr(line: string): void {
  process.stderr.write(line + '\n');
}

/**
 * Create a structured JSON logger
 * @param output Write function (default: stderr)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = writeStderr,
  minLevel: LogLevel = 'warn'
): Logger {
  const log = (level: LogLevel, entry: LogInput) => {
    if (LEVELS[level] < LEVELS[minLevel]) return;

    output(JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      ...entry,
    }));
  };

  return {
    debug: (entry) => log('debug', entry),
    info: (entry) => log('info', entry),
    warn: (entry) => log('warn', entry),
    error: (entry) => log('error', entry),
  };
}

let current: Logger = createLogger();

/**
 * Replace the process-wide logger (called once from the CLI preAction hook)
 */
export function configureLogger(options: { verbose?: boolean; output?: (line: string) => void }): void {
  current = createLogger(options.output, options.verbose ? 'debug' : 'warn');
}

/** Process-wide logger; delegates to whatever configureLogger installed */
export const logger: Logger = {
  debug: (entry) => current.debug(entry),
  info: (entry) => current.info(entry),
  warn: (entry) => current.warn(entry),
  error: (entry) => current.error(entry),
};
