import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_COLOR, randomColor } from '../data/defaults';
import type { ImportResult, Link, Node, Workspace } from '../types';
import { errorMessage, importFailure, importSuccess } from './import-result';

// Arc's StorableSidebar.json has moved its spaces around between releases:
// sidebar.containers, spaces, or sidebarSyncState.spaces. Items look like
// { id, title?, data: { tab: { savedTitle, savedURL } }, childrenIds: [...] }.

type JsonRecord = Record<string, unknown>;

export const DEFAULT_SPACE_NAME = 'Arc Space';
export const FALLBACK_WORKSPACE_NAME = 'Arc Import';

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function arrayAt(obj: JsonRecord, key: string): unknown[] | null {
  const value = obj[key];
  return Array.isArray(value) ? value : null;
}

function findSpaces(root: JsonRecord): unknown[] | null {
  const sidebar = root.sidebar;
  if (isRecord(sidebar)) {
    const containers = arrayAt(sidebar, 'containers');
    if (containers) return containers;
  }

  const spaces = arrayAt(root, 'spaces');
  if (spaces) return spaces;

  const syncState = root.sidebarSyncState;
  if (isRecord(syncState)) return arrayAt(syncState, 'spaces');

  return null;
}

/** Indexes every object carrying a non-empty string `id`, at any depth. Later duplicates win. */
function collectById(value: unknown, into: Map<string, JsonRecord>): Map<string, JsonRecord> {
  if (Array.isArray(value)) {
    for (const child of value) collectById(child, into);
  } else if (isRecord(value)) {
    const id = value.id;
    if (typeof id === 'string' && id !== '') into.set(id, value);
    for (const child of Object.values(value)) collectById(child, into);
  }
  return into;
}

function link(title: string, url: string): Node {
  const item: Link = { id: uuidv4(), title, url, faviconPath: null };
  return { type: 'link', link: item };
}

function readTitleAndUrl(item: JsonRecord): { title: string | null; url: string | null } {
  let title: string | null = null;
  let url: string | null = null;

  const data = item.data;
  const tab = isRecord(data) ? data.tab : undefined;
  if (isRecord(tab)) {
    title = stringOrNull(tab.savedTitle) ?? stringOrNull(tab.title);
    url = stringOrNull(tab.savedURL) ?? stringOrNull(tab.url);
  }

  return {
    title: title ?? stringOrNull(item.title),
    url: url ?? stringOrNull(item.url),
  };
}

function convertItem(item: JsonRecord, byId: Map<string, JsonRecord>, visiting: Set<JsonRecord>): Node | null {
  const { title, url } = readTitleAndUrl(item);

  const rawChildren = arrayAt(item, 'childrenIds') ?? [];
  const childIds = rawChildren.filter((id): id is string => typeof id === 'string' && id !== '');

  if (childIds.length > 0) {
    visiting.add(item);
    const children: Node[] = [];
    for (const childId of childIds) {
      const child = byId.get(childId);
      // A child that points back up the chain would recurse forever
      if (!child || visiting.has(child)) continue;
      const converted = convertItem(child, byId, visiting);
      if (converted) children.push(converted);
    }
    visiting.delete(item);
    return { type: 'folder', folder: { id: uuidv4(), name: title ?? 'Folder', children, isExpanded: false } };
  }

  if (url !== null && url.trim() !== '') return link(title ?? url, url);
  return null;
}

function convertSpace(space: JsonRecord): Workspace | null {
  const items = arrayAt(space, 'items') ?? arrayAt(space, 'tabs') ?? arrayAt(space, 'pinnedTabs');
  if (!items) return null;

  const byId = collectById(space, new Map());
  const nodes: Node[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const converted = convertItem(item, byId, new Set());
    if (converted) nodes.push(converted);
  }
  if (nodes.length === 0) return null;

  return {
    id: uuidv4(),
    name: stringOrNull(space.title) ?? DEFAULT_SPACE_NAME,
    colorId: randomColor(),
    items: nodes,
    pinnedLinks: [],
  };
}

function convertFlat(root: JsonRecord): ImportResult {
  const items: Node[] = [];
  for (const entry of collectById(root, new Map()).values()) {
    const url = stringOrNull(entry.savedURL);
    if (url === null || url.trim() === '') continue;
    items.push(link(stringOrNull(entry.savedTitle) ?? url, url));
  }

  if (items.length === 0) return importFailure('No bookmarks found in Arc data.');

  return importSuccess([
    { id: uuidv4(), name: FALLBACK_WORKSPACE_NAME, colorId: DEFAULT_COLOR, items, pinnedLinks: [] },
  ]);
}

/** Converts the contents of Arc's `StorableSidebar.json` into workspaces, one per space. */
export function convertArcSidebar(content: string): ImportResult {
  let root: unknown;
  try {
    root = JSON.parse(content);
  } catch (err) {
    return importFailure(`Failed to import Arc data: ${errorMessage(err)}`);
  }
  if (!isRecord(root)) return importFailure('Failed to import Arc data: expected a JSON object.');

  const spaces = findSpaces(root);
  if (!spaces) return convertFlat(root);

  const workspaces: Workspace[] = [];
  for (const space of spaces) {
    if (!isRecord(space)) continue;
    const workspace = convertSpace(space);
    if (workspace) workspaces.push(workspace);
  }

  if (workspaces.length === 0) return importFailure('No spaces found in Arc data.');
  return importSuccess(workspaces);
}
