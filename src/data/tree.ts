import { v4 as uuidv4 } from 'uuid';
import type { Folder, Link, Node, NodeLocation } from '../types';

// Depth-first helpers over a workspace's item list. All of them walk the
// tree in display order and stop at the first hit; ids are unique so the
// first hit is the only one.

export function nodeId(node: Node): string {
  return node.type === 'folder' ? node.folder.id : node.link.id;
}

export function displayName(node: Node): string {
  return node.type === 'folder' ? node.folder.name : node.link.title;
}

export function folderNode(folder: Folder): Node {
  return { type: 'folder', folder };
}

export function linkNode(link: Link): Node {
  return { type: 'link', link };
}

export function findNode(id: string, nodes: Node[]): Node | null {
  for (const node of nodes) {
    if (nodeId(node) === id) return node;
    if (node.type === 'folder') {
      const found = findNode(id, node.folder.children);
      if (found) return found;
    }
  }
  return null;
}

export function findFolder(id: string, nodes: Node[]): Folder | null {
  const node = findNode(id, nodes);
  return node?.type === 'folder' ? node.folder : null;
}

export function findNodeLocation(
  id: string,
  nodes: Node[],
  parentId: string | null = null,
): NodeLocation | null {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    if (nodeId(node) === id) return { parentId, index: i };
    if (node.type === 'folder') {
      const location = findNodeLocation(id, node.folder.children, node.folder.id);
      if (location) return location;
    }
  }
  return null;
}

/** Removes the node (with its subtree) and returns it, or null if absent. */
export function removeNode(id: string, nodes: Node[]): Node | null {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    if (nodeId(node) === id) {
      nodes.splice(i, 1);
      return node;
    }
    if (node.type === 'folder') {
      const removed = removeNode(id, node.folder.children);
      if (removed) return removed;
    }
  }
  return null;
}

/**
 * Inserts into the root list (parentId null) or into the folder `parentId`.
 * A null index appends; any other index is clamped to the target list.
 * Returns false when the parent folder does not exist.
 */
export function insertNode(
  node: Node,
  parentId: string | null,
  index: number | null,
  nodes: Node[],
): boolean {
  let target: Node[];
  if (parentId === null) {
    target = nodes;
  } else {
    const parent = findFolder(parentId, nodes);
    if (!parent) return false;
    target = parent.children;
  }

  if (index === null) {
    target.push(node);
  } else {
    const clamped = Math.max(0, Math.min(index, target.length));
    target.splice(clamped, 0, node);
  }
  return true;
}

export function updateNode(id: string, nodes: Node[], mutate: (node: Node) => boolean): boolean {
  const node = findNode(id, nodes);
  if (!node) return false;
  return mutate(node);
}

/** True when `id` is `node` itself or anywhere below it. */
export function containsNode(id: string, node: Node): boolean {
  if (nodeId(node) === id) return true;
  if (node.type === 'folder') {
    return node.folder.children.some((child) => containsNode(id, child));
  }
  return false;
}

export function findLink(nodes: Node[], predicate: (link: Link) => boolean): Link | null {
  for (const node of nodes) {
    if (node.type === 'link') {
      if (predicate(node.link)) return node.link;
    } else {
      const found = findLink(node.folder.children, predicate);
      if (found) return found;
    }
  }
  return null;
}

export function countLinks(nodes: Node[]): number {
  let count = 0;
  for (const node of nodes) {
    if (node.type === 'link') count++;
    else count += countLinks(node.folder.children);
  }
  return count;
}

export function countFolders(nodes: Node[]): number {
  let count = 0;
  for (const node of nodes) {
    if (node.type === 'folder') count += 1 + countFolders(node.folder.children);
  }
  return count;
}

export function collectIds(nodes: Node[], into: Set<string> = new Set()): Set<string> {
  for (const node of nodes) {
    into.add(nodeId(node));
    if (node.type === 'folder') collectIds(node.folder.children, into);
  }
  return into;
}

/**
 * Gives a fresh id to every node whose id is already in `used`, then records
 * every id it leaves behind in `used`.
 */
export function claimUniqueIds(nodes: Node[], used: Set<string>): void {
  for (const node of nodes) {
    const item = node.type === 'folder' ? node.folder : node.link;
    if (used.has(item.id)) item.id = uuidv4();
    used.add(item.id);
    if (node.type === 'folder') claimUniqueIds(node.folder.children, used);
  }
}
