/**
 * Config path resolution.
 */

import * as path from 'path';
import * as os from 'os';

export const APP_DIR_NAME = 'artnet-console';

/**
 * Gets the console's config directory.
 * ~/.config/artnet-console on Unix, %APPDATA%/artnet-console on Windows.
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), APP_DIR_NAME);
  }
  return path.join(os.homedir(), '.config', APP_DIR_NAME);
}

/** Default location of config.json. */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/** Default location of the console's diagnostic log. */
export function getDefaultLogPath(): string {
  return path.join(getConfigDir(), 'console.log');
}
