/**
 * Cross-platform path utilities for git-readout
 *
 * Resolves where the global configuration file lives on each platform.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Application name used for directory naming
 */
const APP_NAME = 'git-readout';

/**
 * Get the user's home directory
 */
export function getHomeDir(): string {
  return homedir();
}

/**
 * Get the git-readout configuration directory
 *
 * - macOS/Linux: $XDG_CONFIG_HOME/git-readout when set, else ~/.git-readout
 * - Windows: %APPDATA%\git-readout
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA;
    if (appData) {
      return join(appData, APP_NAME);
    }
    return join(getHomeDir(), 'AppData', 'Roaming', APP_NAME);
  }

  const xdgConfigHome = process.env.XDG_CONFIG_HOME;
  if (xdgConfigHome) {
    return join(xdgConfigHome, APP_NAME);
  }

  return join(getHomeDir(), `.${APP_NAME}`);
}

/**
 * Get the global configuration file path
 */
export function getGlobalConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}
