import { v4 as uuidv4 } from 'uuid';
import { CURRENT_SCHEMA_VERSION, WORKSPACE_COLORS } from '../types';
import type { AppState, Workspace, WorkspaceColorId } from '../types';

export const DEFAULT_WORKSPACE_NAME = 'Inbox';
export const DEFAULT_COLOR: WorkspaceColorId = 'sky';

export function isWorkspaceColorId(value: unknown): value is WorkspaceColorId {
  return WORKSPACE_COLORS.some((color) => color === value);
}

export function randomColor(): WorkspaceColorId {
  return WORKSPACE_COLORS[Math.floor(Math.random() * WORKSPACE_COLORS.length)];
}

export function createWorkspace(name: string, colorId: WorkspaceColorId): Workspace {
  return {
    id: uuidv4(),
    name,
    colorId,
    items: [],
    pinnedLinks: [],
  };
}

export function createDefaultState(): AppState {
  const inbox = createWorkspace(DEFAULT_WORKSPACE_NAME, DEFAULT_COLOR);
  return {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    workspaces: [inbox],
    selectedWorkspaceId: inbox.id,
    isSettingsSelected: false,
  };
}
