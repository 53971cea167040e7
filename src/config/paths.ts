/**
 * Cross-platform path utilities for likewise
 *
 * Provides platform-independent paths for data storage.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Application name used for directory naming
 */
const APP_NAME = 'likewise';

/**
 * Get the likewise data directory
 *
 * - macOS/Linux: ~/.likewise (or $XDG_DATA_HOME/likewise if set)
 * - Windows: %LOCALAPPDATA%\likewise
 */
export function getDataDir(): string {
  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA;
    if (localAppData) {
      return join(localAppData, APP_NAME);
    }
    return join(homedir(), 'AppData', 'Local', APP_NAME);
  }

  const xdgDataHome = process.env.XDG_DATA_HOME;
  if (xdgDataHome) {
    return join(xdgDataHome, APP_NAME);
  }
  return join(homedir(), `.${APP_NAME}`);
}

/**
 * Get the default similarity database path
 */
export function getDefaultDatabasePath(): string {
  return join(getDataDir(), 'similarities.db');
}

/**
 * Get the path of the global configuration file
 */
export function getGlobalConfigPath(): string {
  return join(homedir(), `.${APP_NAME}`, 'config.json');
}
