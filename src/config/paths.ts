/**
 * Cross-platform path utilities for partlens
 *
 * Provides platform-independent paths for data storage.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';

/**
 * Application name used for directory naming
 */
const APP_NAME = 'partlens';

/**
 * Get the partlens data directory
 *
 * Cross-platform locations:
 * - macOS: ~/.partlens
 * - Linux: ~/.partlens (or $XDG_DATA_HOME/partlens if set)
 * - Windows: %LOCALAPPDATA%\partlens
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
 * Get the default database path (parts, snapshots)
 */
export function getDefaultDatabasePath(): string {
  return join(getDataDir(), 'parts.db');
}

/**
 * Ensure the data directory exists and return it
 */
export function ensureDataDir(): string {
  const dataDir = getDataDir();

  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }

  return dataDir;
}
