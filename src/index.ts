export * from './types';
export { BookmarkStore } from './data/store';
export type { ChangeListener } from './data/store';
export { DataStore } from './data/data-store';
export { UserSettings, DEFAULT_PREFERENCES, normalizePreferences } from './data/user-settings';
export { createDefaultState, createWorkspace, randomColor, DEFAULT_COLOR, DEFAULT_WORKSPACE_NAME } from './data/defaults';
export { serializeState, parseState } from './data/serialization';
export { filterNodes } from './utils/tree-filter';
export { normalizeUrlForDuplicates, defaultTitleForUrl } from './utils/url';
export { convertChromeBookmarks, cleanFolderName } from './utils/browser-bookmark-converter';
export type { ChromeImportOptions } from './utils/browser-bookmark-converter';
export { convertArcSidebar } from './utils/arc-sidebar-converter';
export { detectImportFormat, parseImport, importBookmarkFile } from './utils/bookmark-parsers';
export type { ImportFormat } from './utils/bookmark-parsers';
export { summarizeImport } from './utils/import-result';
export { resolveConfig } from './config';
export type { ArcmarkConfig, Env } from './config';
export { createApp } from './app';
export type { ArcmarkApp } from './app';
