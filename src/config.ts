import { homedir } from 'node:os';
import { join } from 'node:path';

export type Env = Record<string, string | undefined>;

export interface ArcmarkConfig {
  /** Holds data.json, settings.json and the Icons cache. */
  dataDir: string;
  chromeBookmarksPath: string;
  arcSidebarPath: string;
}

export const APP_DIR_NAME = 'Arcmark';

function nonEmpty(value: string | undefined): string | null {
  return value && value.trim() !== '' ? value : null;
}

/**
 * Resolve runtime paths from the environment.
 *
 * Windows layout (LOCALAPPDATA) first, XDG-style locations under the home
 * directory otherwise. Each path has an ARCMARK_* override.
 */
export function resolveConfig(env: Env = process.env, home: string = homedir()): ArcmarkConfig {
  const localAppData = nonEmpty(env.LOCALAPPDATA);
  const browserRoot = localAppData ?? join(home, '.config');

  return {
    dataDir:
      nonEmpty(env.ARCMARK_DATA_DIR) ??
      (localAppData ? join(localAppData, APP_DIR_NAME) : join(home, '.local', 'share', APP_DIR_NAME)),
    chromeBookmarksPath:
      nonEmpty(env.ARCMARK_CHROME_BOOKMARKS) ??
      join(browserRoot, 'Google', 'Chrome', 'User Data', 'Default', 'Bookmarks'),
    arcSidebarPath:
      nonEmpty(env.ARCMARK_ARC_SIDEBAR) ??
      join(browserRoot, 'Arc', 'User Data', 'Default', 'StorableSidebar.json'),
  };
}
