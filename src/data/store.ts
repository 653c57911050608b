import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { MAX_PINNED_LINKS } from '../types';
import type {
  AppState,
  DuplicateLinkMatch,
  Link,
  Node,
  NodeLocation,
  SettingsProvider,
  StateGateway,
  Workspace,
  WorkspaceColorId,
  WorkspaceMoveDirection,
} from '../types';
import { DEFAULT_COLOR, DEFAULT_WORKSPACE_NAME, createWorkspace } from './defaults';
import {
  claimUniqueIds,
  collectIds,
  containsNode,
  findFolder,
  findLink,
  findNode,
  findNodeLocation,
  folderNode,
  insertNode,
  linkNode,
  removeNode,
  updateNode,
} from './tree';
import { defaultTitleForUrl, normalizeUrlForDuplicates } from '../utils/url';

export type ChangeListener = () => void;

interface CommitOptions {
  notify?: boolean;
}

/**
 * Owns the application state. Every mutation goes through one of the public
 * methods, is saved through the gateway, then announced to listeners.
 *
 * Unknown ids and refused operations (last workspace, full pin list, cyclic
 * move) leave the state untouched: nothing is saved and nobody is notified.
 */
export class BookmarkStore {
  private _state: AppState;
  private readonly listeners = new Set<ChangeListener>();

  constructor(
    private readonly gateway: StateGateway,
    private readonly settings: SettingsProvider | null = null,
  ) {
    this._state = gateway.load();
    this.restoreSelection();
  }

  private restoreSelection(): void {
    if (this._state.isSettingsSelected) return;

    const savedId = this.settings?.lastSelectedWorkspaceId ?? null;
    if (savedId !== null && isUuid(savedId) && this.workspaceById(savedId)) {
      this._state.selectedWorkspaceId = savedId;
    }
    if (this._state.selectedWorkspaceId === null) {
      this._state.selectedWorkspaceId = this._state.workspaces[0]?.id ?? null;
    }
  }

  // --- Change notification ---

  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit({ notify = true }: CommitOptions = {}): void {
    this.gateway.save(this._state);
    if (!notify) return;
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (err) {
        console.error('[Store] Change listener threw:', err);
      }
    }
  }

  // --- Read-only surface ---

  get state(): Readonly<AppState> {
    return this._state;
  }

  get workspaces(): readonly Workspace[] {
    return this._state.workspaces;
  }

  get selectedWorkspaceId(): string | null {
    return this._state.selectedWorkspaceId;
  }

  get isSettingsSelected(): boolean {
    return this._state.isSettingsSelected;
  }

  /**
   * The selected workspace, else the first one. With no workspaces at all an
   * Inbox is created, selected and saved on the spot.
   */
  get currentWorkspace(): Workspace {
    const selectedId = this._state.selectedWorkspaceId;
    if (selectedId !== null) {
      const selected = this.workspaceById(selectedId);
      if (selected) return selected;
    }

    const first = this._state.workspaces[0];
    if (first) return first;

    console.error('[Store] No workspaces in state, recreating Inbox');
    const fallback = createWorkspace(DEFAULT_WORKSPACE_NAME, DEFAULT_COLOR);
    this._state.workspaces.push(fallback);
    this._state.selectedWorkspaceId = fallback.id;
    this.commit();
    return fallback;
  }

  get pinnedLinks(): readonly Link[] {
    return this.currentWorkspace.pinnedLinks;
  }

  get canPinMore(): boolean {
    return this.currentWorkspace.pinnedLinks.length < MAX_PINNED_LINKS;
  }

  pinnedLinkById(id: string): Link | null {
    return this.currentWorkspace.pinnedLinks.find((link) => link.id === id) ?? null;
  }

  nodeById(id: string): Node | null {
    return findNode(id, this.currentWorkspace.items);
  }

  location(id: string): NodeLocation | null {
    return findNodeLocation(id, this.currentWorkspace.items);
  }

  private workspaceById(id: string): Workspace | null {
    return this._state.workspaces.find((ws) => ws.id === id) ?? null;
  }

  private rememberSelection(id: string): void {
    if (this.settings) this.settings.lastSelectedWorkspaceId = id;
  }

  /** Runs `mutate` on a workspace and commits only when it reports a change. */
  private updateWorkspace(
    id: string,
    mutate: (workspace: Workspace) => boolean,
    options: CommitOptions = {},
  ): boolean {
    const workspace = this.workspaceById(id);
    if (!workspace) return false;
    if (!mutate(workspace)) return false;
    this.commit(options);
    return true;
  }

  private updateCurrentNode(id: string, mutate: (node: Node) => boolean, options: CommitOptions = {}): boolean {
    return this.updateWorkspace(this.currentWorkspace.id, (ws) => updateNode(id, ws.items, mutate), options);
  }

  // --- Workspaces ---

  selectWorkspace(id: string): void {
    if (!this.workspaceById(id)) return;
    this._state.selectedWorkspaceId = id;
    this._state.isSettingsSelected = false;
    this.rememberSelection(id);
    this.commit();
  }

  selectSettingsView(): void {
    this._state.isSettingsSelected = true;
    this._state.selectedWorkspaceId = null;
    this.commit();
  }

  createWorkspace(name: string, colorId: WorkspaceColorId): string {
    const workspace = createWorkspace(name, colorId);
    this._state.workspaces.push(workspace);
    this._state.selectedWorkspaceId = workspace.id;
    this._state.isSettingsSelected = false;
    this.rememberSelection(workspace.id);
    this.commit();
    return workspace.id;
  }

  renameWorkspace(id: string, name: string): void {
    this.updateWorkspace(id, (ws) => {
      ws.name = name;
      return true;
    });
  }

  setWorkspaceColor(id: string, colorId: WorkspaceColorId): void {
    this.updateWorkspace(id, (ws) => {
      ws.colorId = colorId;
      return true;
    });
  }

  deleteWorkspace(id: string): void {
    const workspaces = this._state.workspaces;
    if (workspaces.length <= 1) return;

    const index = workspaces.findIndex((ws) => ws.id === id);
    if (index < 0) return;
    workspaces.splice(index, 1);

    if (this._state.selectedWorkspaceId === id) {
      const next = workspaces[0];
      this._state.selectedWorkspaceId = next.id;
      this.rememberSelection(next.id);
    }
    this.commit();
  }

  moveWorkspace(id: string, direction: WorkspaceMoveDirection): void {
    const workspaces = this._state.workspaces;
    const index = workspaces.findIndex((ws) => ws.id === id);
    if (index < 0) return;

    const target = direction === 'left' ? index - 1 : index + 1;
    if (target < 0 || target >= workspaces.length) return;

    const [workspace] = workspaces.splice(index, 1);
    workspaces.splice(target, 0, workspace);
    this.commit();
  }

  /** Moves a workspace to an absolute position (drag reorder in the switcher). */
  reorderWorkspace(id: string, toIndex: number): void {
    const workspaces = this._state.workspaces;
    const index = workspaces.findIndex((ws) => ws.id === id);
    if (index < 0) return;
    if (toIndex < 0 || toIndex >= workspaces.length || toIndex === index) return;

    const [workspace] = workspaces.splice(index, 1);
    workspaces.splice(toIndex, 0, workspace);
    this.commit();
  }

  // --- Nodes ---

  /** Returns the new folder's id, or null when `parentId` names no folder. */
  addFolder(name: string, parentId: string | null = null, expanded = true): string | null {
    const id = uuidv4();
    const node = folderNode({ id, name, children: [], isExpanded: expanded });
    return this.insertIntoCurrent(node, parentId) ? id : null;
  }

  /** Returns the new link's id, or null when `parentId` names no folder. */
  addLink(url: string, title: string, parentId: string | null = null): string | null {
    const id = uuidv4();
    const node = linkNode({ id, title, url, faviconPath: null });
    return this.insertIntoCurrent(node, parentId) ? id : null;
  }

  private insertIntoCurrent(node: Node, parentId: string | null): boolean {
    return this.updateWorkspace(this.currentWorkspace.id, (ws) => insertNode(node, parentId, null, ws.items));
  }

  renameNode(id: string, name: string): void {
    this.updateCurrentNode(id, (node) => {
      if (node.type === 'folder') node.folder.name = name;
      else node.link.title = name;
      return true;
    });
  }

  deleteNode(id: string): void {
    this.updateWorkspace(this.currentWorkspace.id, (ws) => removeNode(id, ws.items) !== null);
  }

  /**
   * Moves a node to `index` within `parentId` (null for the root list).
   * `index` is a drop position: when the node moves later within its own
   * list, the slot it vacates is accounted for.
   */
  moveNode(id: string, parentId: string | null, index: number): void {
    const items = this.currentWorkspace.items;
    const from = findNodeLocation(id, items);
    if (!from) return;

    if (parentId !== null) {
      if (!findFolder(parentId, items)) return;
      const node = findNode(id, items);
      // Refuse moving a folder into itself or its own subtree
      if (node && containsNode(parentId, node)) return;
    }

    this.updateWorkspace(this.currentWorkspace.id, (ws) => {
      const removed = removeNode(id, ws.items);
      if (!removed) return false;

      let target = Math.max(0, index);
      if (from.parentId === parentId && from.index < target) target--;

      return insertNode(removed, parentId, target, ws.items);
    });
  }

  moveNodeToWorkspace(id: string, workspaceId: string): void {
    this.moveNodesToWorkspace([id], workspaceId);
  }

  /** Moves the given nodes to the end of another workspace's root list, in the order given. */
  moveNodesToWorkspace(ids: readonly string[], workspaceId: string): void {
    const source = this.currentWorkspace;
    if (workspaceId === source.id || ids.length === 0) return;

    const destination = this.workspaceById(workspaceId);
    if (!destination) return;

    const moved: Node[] = [];
    for (const id of ids) {
      const removed = removeNode(id, source.items);
      if (removed) moved.push(removed);
    }
    if (moved.length === 0) return;

    destination.items.push(...moved);
    this.commit();
  }

  setFolderExpanded(id: string, expanded: boolean): void {
    this.updateCurrentNode(id, (node) => {
      if (node.type !== 'folder' || node.folder.isExpanded === expanded) return false;
      node.folder.isExpanded = expanded;
      return true;
    });
  }

  /** Collects the given nodes into a new expanded folder at the end of the root list. */
  groupIntoNewFolder(ids: readonly string[], folderName: string): string | null {
    const workspace = this.currentWorkspace;

    const grouped: Node[] = [];
    for (const id of ids) {
      const removed = removeNode(id, workspace.items);
      if (removed) grouped.push(removed);
    }
    if (grouped.length === 0) return null;

    const folderId = uuidv4();
    workspace.items.push(folderNode({ id: folderId, name: folderName, children: grouped, isExpanded: true }));
    this.commit();
    return folderId;
  }

  // --- Link details ---

  updateLinkFaviconPath(id: string, path: string | null, notify = true): void {
    this.updateCurrentNode(
      id,
      (node) => {
        if (node.type !== 'link' || node.link.faviconPath === path) return false;
        node.link.faviconPath = path;
        return true;
      },
      { notify },
    );
  }

  /** Also clears the cached icon. */
  updateLinkUrl(id: string, url: string): void {
    this.updateCurrentNode(id, (node) => {
      if (node.type !== 'link') return false;
      node.link.url = url;
      node.link.faviconPath = null;
      return true;
    });
  }

  /**
   * Replaces a link's title with a fetched page title, but only while the
   * link still carries the placeholder title it was created with.
   */
  updateLinkTitleIfDefault(id: string, title: string): boolean {
    const trimmed = title.trim();
    if (trimmed === '') return false;

    return this.updateCurrentNode(id, (node) => {
      if (node.type !== 'link') return false;
      const link = node.link;
      if (link.title !== defaultTitleForUrl(link.url) || link.title === trimmed) return false;
      link.title = trimmed;
      return true;
    });
  }

  // --- Pinned links ---

  pinLink(id: string): void {
    if (!this.canPinMore) return;
    const node = this.nodeById(id);
    if (node?.type !== 'link') return;
    if (this.pinnedLinkById(id)) return;

    this.updateWorkspace(this.currentWorkspace.id, (ws) => {
      removeNode(id, ws.items);
      ws.pinnedLinks.push(node.link);
      return true;
    });
  }

  unpinLink(id: string): void {
    this.updateWorkspace(this.currentWorkspace.id, (ws) => {
      const index = ws.pinnedLinks.findIndex((link) => link.id === id);
      if (index < 0) return false;
      const [link] = ws.pinnedLinks.splice(index, 1);
      ws.items.push(linkNode(link));
      return true;
    });
  }

  updatePinnedLinkFaviconPath(id: string, path: string | null): void {
    this.updateWorkspace(this.currentWorkspace.id, (ws) => {
      const link = ws.pinnedLinks.find((pinned) => pinned.id === id);
      if (!link || link.faviconPath === path) return false;
      link.faviconPath = path;
      return true;
    });
  }

  // --- Lookup ---

  /** First link, across all workspaces in order, whose URL normalizes to the same key. */
  findDuplicateLink(url: string): DuplicateLinkMatch | null {
    const key = normalizeUrlForDuplicates(url);
    for (const workspace of this._state.workspaces) {
      const match = findLink(workspace.items, (link) => normalizeUrlForDuplicates(link.url) === key);
      if (match) return { workspaceName: workspace.name, linkTitle: match.title };
    }
    return null;
  }

  // --- Import ---

  /**
   * Adds each imported workspace as a new workspace and selects the last one.
   * Node and pinned-link ids that collide with existing ones are replaced.
   */
  importWorkspaces(imported: readonly Workspace[]): string[] {
    if (imported.length === 0) return [];

    const usedIds = new Set<string>();
    for (const ws of this._state.workspaces) {
      collectIds(ws.items, usedIds);
      for (const link of ws.pinnedLinks) usedIds.add(link.id);
    }

    const createdIds: string[] = [];
    for (const source of imported) {
      const workspace = createWorkspace(source.name, source.colorId);
      workspace.items = structuredClone(source.items);
      const pinned = structuredClone(source.pinnedLinks);
      workspace.pinnedLinks = pinned.slice(0, MAX_PINNED_LINKS);
      // Pins over the limit stay in the workspace as plain links
      for (const link of pinned.slice(MAX_PINNED_LINKS)) {
        workspace.items.push({ type: 'link', link });
      }
      claimUniqueIds(workspace.items, usedIds);
      for (const link of workspace.pinnedLinks) {
        if (usedIds.has(link.id)) link.id = uuidv4();
        usedIds.add(link.id);
      }
      this._state.workspaces.push(workspace);
      createdIds.push(workspace.id);
    }

    const lastId = createdIds[createdIds.length - 1];
    this._state.selectedWorkspaceId = lastId;
    this._state.isSettingsSelected = false;
    this.rememberSelection(lastId);
    this.commit();

    console.log(`[Store] Imported ${createdIds.length} workspace(s)`);
    return createdIds;
  }
}
