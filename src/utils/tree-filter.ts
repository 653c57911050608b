import type { Node } from '../types';

/**
 * Filter a bookmark tree for the sidebar search bar.
 *
 * Case-insensitive substring match on link titles, link URLs and folder
 * names. A folder survives when a descendant matches (keeping only the
 * matching descendants) or, failing that, when its own name matches
 * (keeping all of its children). Surviving folders are copies with
 * `isExpanded: true`; the input tree is left untouched.
 */
export function filterNodes(nodes: Node[], query: string | null | undefined): Node[] {
  if (!query || query.trim() === '') return nodes;

  return filterList(nodes, query.toLowerCase());
}

function filterList(nodes: Node[], lowerQuery: string): Node[] {
  const result: Node[] = [];
  for (const node of nodes) {
    const filtered = filterNode(node, lowerQuery);
    if (filtered) result.push(filtered);
  }
  return result;
}

function filterNode(node: Node, lowerQuery: string): Node | null {
  if (node.type === 'link') {
    const { title, url } = node.link;
    const matches = title.toLowerCase().includes(lowerQuery) || url.toLowerCase().includes(lowerQuery);
    return matches ? node : null;
  }

  const folder = node.folder;
  const matchingChildren = filterList(folder.children, lowerQuery);
  if (matchingChildren.length > 0) {
    return { type: 'folder', folder: { ...folder, children: matchingChildren, isExpanded: true } };
  }

  if (folder.name.toLowerCase().includes(lowerQuery)) {
    return { type: 'folder', folder: { ...folder, isExpanded: true } };
  }

  return null;
}
