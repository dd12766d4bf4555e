/**
 * Terminal capabilities
 *
 * Decides which decorations tsift may use: ANSI color, the progress
 * spinner and the y/N confirmation prompt. Inputs are injectable so the
 * policy can be checked without touching the real process.
 */

export type Env = Readonly<Record<string, string | undefined>>;

export interface TtyStreams {
  stdin: { isTTY?: boolean };
  stdout: { isTTY?: boolean };
  stderr: { isTTY?: boolean };
}

export interface TerminalCapabilities {
  /** All three standard streams are attached to a terminal; prompts are possible */
  interactive: boolean;
  /** Neither NO_COLOR nor a dumb terminal rules color out */
  colorAllowed: boolean;
  /** An animated spinner will render cleanly on stderr */
  spinnerAllowed: boolean;
}

/**
 * PowerShell renders spinner frames through its progress stream, garbling them.
 */
function isPowerShellHost(env: Env): boolean {
  if (env.PSModulePath || env.POWERSHELL_DISTRIBUTION_CHANNEL) {
    return true;
  }
  return (env.ComSpec ?? '').toLowerCase().includes('powershell');
}

export function detectTerminal(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  streams: TtyStreams = process
): TerminalCapabilities {
  const interactive =
    streams.stdin.isTTY === true && streams.stdout.isTTY === true && streams.stderr.isTTY === true;
  const dumb = env.TERM === 'dumb';

  return {
    interactive,
    // https://no-color.org: any non-empty value disables color
    colorAllowed: !env.NO_COLOR && !dumb,
    spinnerAllowed:
      interactive && !dumb && !env.CI && platform !== 'win32' && !isPowerShellHost(env),
  };
}

/**
 * Things 3 and osascript only exist on macOS.
 */
export function canRunAutomation(platform: NodeJS.Platform = process.platform): boolean {
  return platform === 'darwin';
}
