import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { SettingsProvider, SidebarPosition, UserPreferences } from '../types';

export const DEFAULT_PREFERENCES: Readonly<UserPreferences> = {
  lastSelectedWorkspaceId: null,
  alwaysOnTopEnabled: false,
  sidebarAttachmentEnabled: false,
  sidebarPosition: 'right',
  defaultBrowserPath: null,
  toggleSidebarShortcut: null,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(value: unknown, fallback: string | null): string | null {
  return typeof value === 'string' ? value : fallback;
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function pickSidebarPosition(value: unknown): SidebarPosition {
  return value === 'left' || value === 'right' ? value : DEFAULT_PREFERENCES.sidebarPosition;
}

/** Coerces an arbitrary parsed document into preferences, field by field. */
export function normalizePreferences(raw: unknown): UserPreferences {
  if (!isRecord(raw)) return { ...DEFAULT_PREFERENCES };
  const data = raw;
  return {
    lastSelectedWorkspaceId: pickString(data.lastSelectedWorkspaceId, null),
    alwaysOnTopEnabled: pickBoolean(data.alwaysOnTopEnabled, DEFAULT_PREFERENCES.alwaysOnTopEnabled),
    sidebarAttachmentEnabled: pickBoolean(data.sidebarAttachmentEnabled, DEFAULT_PREFERENCES.sidebarAttachmentEnabled),
    sidebarPosition: pickSidebarPosition(data.sidebarPosition),
    defaultBrowserPath: pickString(data.defaultBrowserPath, null),
    toggleSidebarShortcut: pickString(data.toggleSidebarShortcut, null),
  };
}

/**
 * UI preferences kept in `settings.json` beside the data file.
 * Read lazily on first access; every setter writes straight back to disk.
 */
export class UserSettings implements SettingsProvider {
  private _prefs: UserPreferences | null = null;

  constructor(private readonly settingsPath: string) {}

  private get prefs(): UserPreferences {
    if (!this._prefs) this._prefs = this.load();
    return this._prefs;
  }

  get lastSelectedWorkspaceId(): string | null {
    return this.prefs.lastSelectedWorkspaceId;
  }

  set lastSelectedWorkspaceId(value: string | null) {
    this.update({ lastSelectedWorkspaceId: value });
  }

  get alwaysOnTopEnabled(): boolean {
    return this.prefs.alwaysOnTopEnabled;
  }

  set alwaysOnTopEnabled(value: boolean) {
    this.update({ alwaysOnTopEnabled: value });
  }

  get sidebarAttachmentEnabled(): boolean {
    return this.prefs.sidebarAttachmentEnabled;
  }

  set sidebarAttachmentEnabled(value: boolean) {
    this.update({ sidebarAttachmentEnabled: value });
  }

  get sidebarPosition(): SidebarPosition {
    return this.prefs.sidebarPosition;
  }

  set sidebarPosition(value: SidebarPosition) {
    this.update({ sidebarPosition: value });
  }

  get defaultBrowserPath(): string | null {
    return this.prefs.defaultBrowserPath;
  }

  set defaultBrowserPath(value: string | null) {
    this.update({ defaultBrowserPath: value });
  }

  /** Display string such as "Ctrl+Shift+A". */
  get toggleSidebarShortcut(): string | null {
    return this.prefs.toggleSidebarShortcut;
  }

  set toggleSidebarShortcut(value: string | null) {
    this.update({ toggleSidebarShortcut: value });
  }

  snapshot(): UserPreferences {
    return { ...this.prefs };
  }

  private update(patch: Partial<UserPreferences>): void {
    this._prefs = { ...this.prefs, ...patch };
    this.save();
  }

  private load(): UserPreferences {
    let raw: string;
    try {
      raw = readFileSync(this.settingsPath, 'utf-8');
    } catch {
      // No settings file yet
      return { ...DEFAULT_PREFERENCES };
    }
    try {
      return normalizePreferences(JSON.parse(raw));
    } catch (err) {
      console.error('[Settings] Ignoring unreadable settings file:', err);
      return { ...DEFAULT_PREFERENCES };
    }
  }

  private save(): void {
    try {
      mkdirSync(dirname(this.settingsPath), { recursive: true });
      writeFileSync(this.settingsPath, JSON.stringify(this.prefs, null, 2), 'utf-8');
    } catch (err) {
      console.error('[Settings] Failed to save settings:', err);
    }
  }
}
