/**
 * Spinner utility
 *
 * ora spinner on stderr, shown only on an interactive terminal and
 * never in --json mode.
 */

import ora, { type Ora } from 'ora';
import { getOutputOptions } from './output.js';
import { detectTerminal } from './terminal.js';

/** Braille spinner frames (consistent across the app) */
export const BRAILLE_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export interface SpinnerOptions {
  /** Initial text to display */
  text: string;
  /** Stream to output to (default: stderr) */
  stream?: NodeJS.WritableStream;
}

/**
 * Check if spinner should be shown
 */
export function shouldShowSpinner(): boolean {
  if (getOutputOptions().json) {
    return false;
  }
  return detectTerminal().spinnerAllowed;
}

/**
 * Create and start a spinner
 * @returns Ora spinner instance or null if spinner disabled
 */
export function createSpinner(options: SpinnerOptions): Ora | null {
  if (!shouldShowSpinner()) {
    return null;
  }

  const spinner = ora({
    text: options.text,
    stream: options.stream || process.stderr,
    spinner: {
      frames: BRAILLE_FRAMES,
      interval: 80,
    },
  });

  // Ctrl-C while spinning: clear the line, exit 130 (128 + SIGINT)
  let interrupted = false;
  const onSigint = () => {
    if (interrupted) return;
    interrupted = true;
    spinner.stop();
    process.exit(130);
  };

  process.on('SIGINT', onSigint);
  spinner.start();

  const release = () => {
    process.removeListener('SIGINT', onSigint);
  };

  const originalStop = spinner.stop.bind(spinner);
  const originalSucceed = spinner.succeed.bind(spinner);
  const originalFail = spinner.fail.bind(spinner);

  spinner.stop = () => {
    release();
    return originalStop();
  };

  spinner.succeed = (text?: string) => {
    release();
    return originalSucceed(text);
  };

  spinner.fail = (text?: string) => {
    release();
    return originalFail(text);
  };

  return spinner;
}

/**
 * Run an async operation with a spinner
 *
 * @example
 * ```typescript
 * const tasks = await withSpinner('Reading tasks...', () => loadTasks(), 'Tasks loaded');
 * ```
 */
export async function withSpinner<T>(
  text: string,
  fn: (spinner: Ora | null) => Promise<T>,
  successText?: string,
  failText?: string
): Promise<T> {
  const spinner = createSpinner({ text });

  try {
    const result = await fn(spinner);
    spinner?.succeed(successText);
    return result;
  } catch (error) {
    spinner?.fail(failText);
    throw error;
  }
}
