/**
 * Yes/no confirmation prompt
 */

import { createInterface } from 'readline';

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Only `y` and `yes` (any case) confirm
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Ask `question (y/N)`. End of input counts as no.
 */
export async function confirm(question: string, streams: PromptStreams = {}): Promise<boolean> {
  const rl = createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stderr,
    terminal: false,
  });

  return new Promise((resolve) => {
    let answered = false;

    rl.on('close', () => {
      if (!answered) {
        resolve(false);
      }
    });

    rl.question(`${question} (y/N) `, (answer) => {
      answered = true;
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
}
