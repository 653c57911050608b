import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolveConfig } from './config';
import type { ArcmarkConfig } from './config';
import { DataStore } from './data/data-store';
import { BookmarkStore } from './data/store';
import { UserSettings } from './data/user-settings';
import type { ImportResult } from './types';
import { convertArcSidebar } from './utils/arc-sidebar-converter';
import { convertChromeBookmarks } from './utils/browser-bookmark-converter';
import type { ChromeImportOptions } from './utils/browser-bookmark-converter';
import { importBookmarkFile } from './utils/bookmark-parsers';
import { errorMessage, importFailure, summarizeImport } from './utils/import-result';

export const SETTINGS_FILE = 'settings.json';

export interface ArcmarkApp {
  config: ArcmarkConfig;
  dataStore: DataStore;
  settings: UserSettings;
  store: BookmarkStore;
  /** Import from any supported bookmark file and merge the result into the store. */
  importFile(path: string, options?: ChromeImportOptions): ImportResult;
  importFromChrome(options?: ChromeImportOptions): ImportResult;
  importFromArc(): ImportResult;
}

function readBrowserFile(path: string, missingMessage: string): string | ImportResult {
  if (!existsSync(path)) return importFailure(missingMessage);
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    return importFailure(`Could not read ${path}: ${errorMessage(err)}`);
  }
}

/** Wire persistence, settings and the bookmark store for one data directory. */
export function createApp(overrides: Partial<ArcmarkConfig> = {}): ArcmarkApp {
  const config: ArcmarkConfig = { ...resolveConfig(), ...overrides };

  const dataStore = new DataStore(config.dataDir);
  const settings = new UserSettings(join(config.dataDir, SETTINGS_FILE));
  const store = new BookmarkStore(dataStore, settings);
  console.log('[App] Data directory:', config.dataDir);

  function merge(result: ImportResult): ImportResult {
    if (result.success) store.importWorkspaces(result.workspaces);
    console.log(`[App] ${summarizeImport(result)}`);
    return result;
  }

  return {
    config,
    dataStore,
    settings,
    store,
    importFile: (path, options) => merge(importBookmarkFile(path, options)),
    importFromChrome: (options) => {
      const content = readBrowserFile(config.chromeBookmarksPath, 'Chrome bookmarks file not found.');
      return merge(typeof content === 'string' ? convertChromeBookmarks(content, options) : content);
    },
    importFromArc: () => {
      const content = readBrowserFile(config.arcSidebarPath, 'Arc browser data not found. Arc may not be installed.');
      return merge(typeof content === 'string' ? convertArcSidebar(content) : content);
    },
  };
}
