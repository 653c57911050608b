export const MAX_PINNED_LINKS = 12;
export const CURRENT_SCHEMA_VERSION = 2;

export const WORKSPACE_COLORS = [
  'blush',
  'apricot',
  'butter',
  'leaf',
  'mint',
  'sky',
  'periwinkle',
  'lavender',
] as const;

export type WorkspaceColorId = (typeof WORKSPACE_COLORS)[number];

export interface Link {
  id: string;
  title: string;
  url: string;
  faviconPath: string | null;
}

export interface Folder {
  id: string;
  name: string;
  children: Node[];
  isExpanded: boolean;
}

export type Node =
  | { type: 'folder'; folder: Folder }
  | { type: 'link'; link: Link };

export interface Workspace {
  id: string;
  name: string;
  colorId: WorkspaceColorId;
  items: Node[];
  /** Quick-access links, kept out of `items`. At most MAX_PINNED_LINKS. */
  pinnedLinks: Link[];
}

export interface AppState {
  schemaVersion: number;
  workspaces: Workspace[];
  selectedWorkspaceId: string | null;
  isSettingsSelected: boolean;
}

/** `parentId` is null for nodes at the workspace root. */
export interface NodeLocation {
  parentId: string | null;
  index: number;
}

export type WorkspaceMoveDirection = 'left' | 'right';

export interface DuplicateLinkMatch {
  workspaceName: string;
  linkTitle: string;
}

// --- Collaborator seams ---

export interface StateGateway {
  load(): AppState;
  save(state: AppState): void;
}

export interface SettingsProvider {
  lastSelectedWorkspaceId: string | null;
}

export type SidebarPosition = 'left' | 'right';

export interface UserPreferences {
  lastSelectedWorkspaceId: string | null;
  alwaysOnTopEnabled: boolean;
  sidebarAttachmentEnabled: boolean;
  sidebarPosition: SidebarPosition;
  defaultBrowserPath: string | null;
  toggleSidebarShortcut: string | null;
}

export type ImportResult =
  | {
      success: true;
      workspaces: Workspace[];
      workspaceCount: number;
      linkCount: number;
      folderCount: number;
    }
  | { success: false; errorMessage: string };
