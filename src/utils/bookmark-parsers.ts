import { readFileSync } from 'node:fs';
import { parseState } from '../data/serialization';
import type { ImportResult } from '../types';
import { convertArcSidebar } from './arc-sidebar-converter';
import { convertChromeBookmarks } from './browser-bookmark-converter';
import type { ChromeImportOptions } from './browser-bookmark-converter';
import { errorMessage, importFailure, importSuccess } from './import-result';

export type ImportFormat = 'chrome' | 'arc' | 'arcmark' | 'unknown';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sniff which kind of bookmark file `content` holds:
 * Chrome's `Bookmarks`, Arc's `StorableSidebar.json`, or an Arcmark `data.json`.
 */
export function detectImportFormat(content: string): ImportFormat {
  const trimmed = content.trimStart();
  if (!trimmed.startsWith('{')) return 'unknown';

  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    return 'unknown';
  }
  if (!isRecord(data)) return 'unknown';

  if (isRecord(data.roots)) return 'chrome';
  if (Array.isArray(data.workspaces)) return 'arcmark';
  if ('sidebar' in data || 'spaces' in data || 'sidebarSyncState' in data) return 'arc';
  return 'unknown';
}

function parseArcmarkData(content: string): ImportResult {
  try {
    return importSuccess(parseState(content).workspaces);
  } catch (err) {
    return importFailure(`Failed to import Arcmark data: ${errorMessage(err)}`);
  }
}

export function parseImport(content: string, options: ChromeImportOptions = {}): ImportResult {
  const format = detectImportFormat(content);
  switch (format) {
    case 'chrome':
      return convertChromeBookmarks(content, options);
    case 'arc':
      return convertArcSidebar(content);
    case 'arcmark':
      return parseArcmarkData(content);
    case 'unknown':
      return importFailure('Unrecognized bookmark file format.');
  }
}

/** Reads a bookmark file from disk and converts it. Never throws. */
export function importBookmarkFile(path: string, options: ChromeImportOptions = {}): ImportResult {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    console.error('[Import] Failed to read bookmark file:', err);
    return importFailure(`Could not read ${path}: ${errorMessage(err)}`);
  }

  const result = parseImport(content, options);
  if (!result.success) {
    console.error(`[Import] ${result.errorMessage}`);
  }
  return result;
}
