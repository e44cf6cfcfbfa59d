/**
 * Configuration Module
 * Resolves where the bookmarks file lives
 */

import os from 'os';
import path from 'path';

export const APP_NAME = 'bk';
export const BOOKMARKS_FILENAME = 'bookmarks.json';

export type Env = Record<string, string | undefined>;

/**
 * Per-user application config directory for the given platform
 */
export function getConfigDir(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string {
  if (platform === 'win32') {
    const appData = env.APPDATA;
    if (appData) return appData;
    return path.join(home, 'AppData', 'Roaming');
  }

  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support');
  }

  const xdg = env.XDG_CONFIG_HOME;
  if (xdg && path.isAbsolute(xdg)) return xdg;
  return path.join(home, '.config');
}

export function getBookmarksFile(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string {
  const override = env.BK_BOOKMARKS_FILE;
  if (override) return path.resolve(override);
  return path.join(getConfigDir(env, platform, home), APP_NAME, BOOKMARKS_FILENAME);
}

export function isDebug(env: Env = process.env): boolean {
  return env.DEBUG === '1';
}
