import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_COLOR, randomColor } from '../data/defaults';
import type { ImportResult, Node, Workspace } from '../types';
import { errorMessage, importFailure, importSuccess } from './import-result';
import { isSkippableUrl } from './url';

// Chrome's `Bookmarks` file:
// { roots: { bookmark_bar: {...}, other: {...}, synced: {...} } }
// where each entry is { type: 'url', name, url } or { type: 'folder', name, children }.
interface ChromeBookmarkNode {
  type?: unknown;
  name?: unknown;
  url?: unknown;
  children?: unknown;
}

export interface ChromeImportOptions {
  /** Merge every root into a single "Chrome Bookmarks" workspace. */
  mergeIntoSingle?: boolean;
}

const CHROME_ROOTS: ReadonlyArray<[key: string, defaultName: string]> = [
  ['bookmark_bar', 'Bookmarks Bar'],
  ['other', 'Other Bookmarks'],
  ['synced', 'Mobile Bookmarks'],
];

export const MERGED_WORKSPACE_NAME = 'Chrome Bookmarks';

export function cleanFolderName(name: string): string {
  const map: Record<string, string> = {
    'bookmarks bar': 'Bookmarks Bar',
    'bookmark bar': 'Bookmarks Bar',
    'bookmarks toolbar': 'Bookmarks Bar',
    'favourites bar': 'Favorites Bar',
    'other bookmarks': 'Other Bookmarks',
    'other favourites': 'Other Favorites',
    'mobile bookmarks': 'Mobile Bookmarks',
  };
  return map[name.toLowerCase()] || name;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isChromeNode(value: unknown): value is ChromeBookmarkNode {
  return isRecord(value);
}

function childrenOf(node: ChromeBookmarkNode): ChromeBookmarkNode[] {
  return Array.isArray(node.children) ? node.children.filter(isChromeNode) : [];
}

function textOf(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function convertNode(node: ChromeBookmarkNode): Node | null {
  const name = textOf(node.name);

  if (node.type === 'url') {
    const url = textOf(node.url);
    if (!url || isSkippableUrl(url)) return null;
    return { type: 'link', link: { id: uuidv4(), title: name, url, faviconPath: null } };
  }

  if (node.type === 'folder') {
    const children: Node[] = [];
    for (const child of childrenOf(node)) {
      const converted = convertNode(child);
      if (converted) children.push(converted);
    }
    return { type: 'folder', folder: { id: uuidv4(), name, children, isExpanded: false } };
  }

  return null;
}

function convertRoot(root: ChromeBookmarkNode, defaultName: string): Workspace | null {
  const rawName = textOf(root.name);
  const items: Node[] = [];
  for (const child of childrenOf(root)) {
    const converted = convertNode(child);
    if (converted) items.push(converted);
  }
  if (items.length === 0) return null;

  return {
    id: uuidv4(),
    name: rawName ? cleanFolderName(rawName) : defaultName,
    colorId: randomColor(),
    items,
    pinnedLinks: [],
  };
}

/** Converts the contents of Chrome's `Bookmarks` file into workspaces. */
export function convertChromeBookmarks(content: string, options: ChromeImportOptions = {}): ImportResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return importFailure(`Failed to import Chrome bookmarks: ${errorMessage(err)}`);
  }

  const roots = isRecord(parsed) ? parsed.roots : undefined;
  if (!isRecord(roots)) {
    return importFailure("Invalid Chrome bookmarks format: missing 'roots'.");
  }

  let workspaces: Workspace[] = [];
  for (const [key, defaultName] of CHROME_ROOTS) {
    const root = roots[key];
    if (!isChromeNode(root)) continue;
    const workspace = convertRoot(root, defaultName);
    if (workspace) workspaces.push(workspace);
  }

  if (options.mergeIntoSingle && workspaces.length > 1) {
    workspaces = [
      {
        id: uuidv4(),
        name: MERGED_WORKSPACE_NAME,
        colorId: DEFAULT_COLOR,
        items: workspaces.flatMap((ws) => ws.items),
        pinnedLinks: [],
      },
    ];
  }

  return importSuccess(workspaces);
}
