import { countFolders, countLinks } from '../data/tree';
import type { ImportResult, Workspace } from '../types';

export function importSuccess(workspaces: Workspace[]): ImportResult {
  let linkCount = 0;
  let folderCount = 0;
  for (const ws of workspaces) {
    linkCount += countLinks(ws.items);
    folderCount += countFolders(ws.items);
  }
  return {
    success: true,
    workspaces,
    workspaceCount: workspaces.length,
    linkCount,
    folderCount,
  };
}

export function importFailure(errorMessage: string): ImportResult {
  return { success: false, errorMessage };
}

/** One-line summary shown after an import attempt. */
export function summarizeImport(result: ImportResult): string {
  if (!result.success) return `Import failed: ${result.errorMessage}`;
  return `Imported ${result.workspaceCount} workspace(s), ${result.linkCount} link(s), ${result.folderCount} folder(s).`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
