/**
 * Where tsift looks for its config file
 *
 * `--config`, then $TASKSIFT_CONFIG, then `config.json` in the platform's
 * per-user config directory.
 */

import { homedir } from 'os';
import { posix, win32 } from 'path';
import type { Env } from './terminal.js';

export const CONFIG_ENV_VAR = 'TASKSIFT_CONFIG';
export const CONFIG_FILE_NAME = 'config.json';

const APP_DIR = 'tasksift';

export interface ConfigPathOptions {
  /** --config */
  configPath?: string;
  env?: Env;
  platform?: NodeJS.Platform;
  home?: string;
}

/**
 * Per-user config directory:
 *   macOS    ~/Library/Application Support/tasksift
 *   Windows  %APPDATA%\tasksift
 *   other    $XDG_CONFIG_HOME/tasksift or ~/.config/tasksift
 */
export function getDefaultConfigDir(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir()
): string {
  if (platform === 'win32') {
    return win32.join(env.APPDATA || win32.join(home, 'AppData', 'Roaming'), APP_DIR);
  }
  if (platform === 'darwin') {
    return posix.join(home, 'Library', 'Application Support', APP_DIR);
  }
  return posix.join(env.XDG_CONFIG_HOME || posix.join(home, '.config'), APP_DIR);
}

export function resolveConfigPath(options: ConfigPathOptions = {}): string {
  const env = options.env ?? process.env;
  if (options.configPath) {
    return options.configPath;
  }
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return fromEnv;
  }

  const platform = options.platform ?? process.platform;
  const dir = getDefaultConfigDir(env, platform, options.home ?? homedir());
  return (platform === 'win32' ? win32 : posix).join(dir, CONFIG_FILE_NAME);
}
