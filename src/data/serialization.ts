import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_COLOR, isWorkspaceColorId } from './defaults';
import type { AppState, Folder, Link, Node, Workspace, WorkspaceColorId } from '../types';

// Wire format shared with the macOS app:
//   node      -> { "type": "folder", "folder": {...} } | { "type": "link", "link": {...} }
//   colorId   -> lowercase string, unknown values read as "sky"
//   output    -> two-space indent, keys sorted at every level

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursively rebuilds objects with their keys in ordinal order. */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (!isObject(value)) return value;

  const sorted: JsonObject = {};
  for (const key of Object.keys(value).sort()) {
    const child = value[key];
    if (child !== undefined) sorted[key] = sortKeys(child);
  }
  return sorted;
}

export function serializeState(state: AppState): string {
  return JSON.stringify(sortKeys(state), null, 2);
}

// --- Field readers ---
// A missing field takes its default; a present field of the wrong JSON type
// is a parse failure.

function readString(obj: JsonObject, key: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') throw new Error(`Expected '${key}' to be a string`);
  return value;
}

function readNullableString(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') throw new Error(`Expected '${key}' to be a string or null`);
  return value;
}

function readBoolean(obj: JsonObject, key: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new Error(`Expected '${key}' to be a boolean`);
  return value;
}

function readArray(obj: JsonObject, key: string): unknown[] {
  const value = obj[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new Error(`Expected '${key}' to be an array`);
  return value;
}

function readObject(value: unknown, what: string): JsonObject {
  if (!isObject(value)) throw new Error(`Expected ${what} to be an object`);
  return value;
}

// --- Decoders ---

export function parseColorId(value: unknown): WorkspaceColorId {
  return isWorkspaceColorId(value) ? value : DEFAULT_COLOR;
}

function parseLink(value: unknown): Link {
  const obj = readObject(value, 'link');
  return {
    id: readString(obj, 'id', uuidv4()),
    title: readString(obj, 'title', ''),
    url: readString(obj, 'url', ''),
    faviconPath: readNullableString(obj, 'faviconPath'),
  };
}

function parseFolder(value: unknown): Folder {
  const obj = readObject(value, 'folder');
  return {
    id: readString(obj, 'id', uuidv4()),
    name: readString(obj, 'name', ''),
    children: readArray(obj, 'children').map(parseNode),
    isExpanded: readBoolean(obj, 'isExpanded', false),
  };
}

export function parseNode(value: unknown): Node {
  const obj = readObject(value, 'node');

  if (!('type' in obj)) {
    throw new Error("Node JSON is missing required 'type' property");
  }

  const type = obj.type;
  switch (type) {
    case 'folder':
      if (!isObject(obj.folder)) {
        throw new Error("Node with type 'folder' is missing 'folder' property");
      }
      return { type: 'folder', folder: parseFolder(obj.folder) };
    case 'link':
      if (!isObject(obj.link)) {
        throw new Error("Node with type 'link' is missing 'link' property");
      }
      return { type: 'link', link: parseLink(obj.link) };
    default:
      throw new Error(`Unknown node type: '${String(type)}'`);
  }
}

export function parseWorkspace(value: unknown): Workspace {
  const obj = readObject(value, 'workspace');
  return {
    id: readString(obj, 'id', uuidv4()),
    name: readString(obj, 'name', ''),
    colorId: parseColorId(obj.colorId),
    items: readArray(obj, 'items').map(parseNode),
    pinnedLinks: readArray(obj, 'pinnedLinks').map(parseLink),
  };
}

/** Parses a persisted state document. Throws on malformed input. */
export function parseState(json: string): AppState {
  const root = readObject(JSON.parse(json), 'state document');

  const rawVersion = root.schemaVersion;
  let schemaVersion = 1;
  if (rawVersion !== undefined) {
    if (typeof rawVersion !== 'number' || !Number.isInteger(rawVersion)) {
      throw new Error("Expected 'schemaVersion' to be an integer");
    }
    schemaVersion = rawVersion;
  }

  return {
    schemaVersion,
    workspaces: readArray(root, 'workspaces').map(parseWorkspace),
    selectedWorkspaceId: readNullableString(root, 'selectedWorkspaceId'),
    isSettingsSelected: readBoolean(root, 'isSettingsSelected', false),
  };
}
