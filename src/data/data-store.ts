import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { createDefaultState } from './defaults';
import { parseState, serializeState } from './serialization';
import type { AppState, StateGateway } from '../types';

const DATA_FILE = 'data.json';
const ICONS_DIR = 'Icons';

/**
 * Saves and loads AppState as `<baseDirectory>/data.json`.
 *
 * Writes are synchronous and go through a temp file + rename so a crash
 * mid-write leaves the previous document in place.
 */
export class DataStore implements StateGateway {
  readonly dataPath: string;

  constructor(private readonly baseDirectory: string) {
    this.dataPath = join(baseDirectory, DATA_FILE);
  }

  /** Returns the persisted state, or a freshly saved default when there is none or it cannot be read. */
  load(): AppState {
    try {
      this.ensureBaseDirectory();
    } catch (err) {
      console.error('[DataStore] Failed to create data directory:', err);
    }

    if (!existsSync(this.dataPath)) {
      const defaultState = createDefaultState();
      this.save(defaultState);
      return defaultState;
    }

    try {
      return parseState(readFileSync(this.dataPath, 'utf-8'));
    } catch (err) {
      console.error('[DataStore] Failed to load state, starting from defaults:', err);
      const fallback = createDefaultState();
      this.save(fallback);
      return fallback;
    }
  }

  save(state: AppState): void {
    const tmpPath = `${this.dataPath}.tmp.${uuidv4().slice(0, 8)}`;
    try {
      this.ensureBaseDirectory();
      writeFileSync(tmpPath, serializeState(state), 'utf-8');
      renameSync(tmpPath, this.dataPath);
    } catch (err) {
      console.error('[DataStore] Failed to save state:', err);
      this.removeTempFile(tmpPath);
    }
  }

  /** Directory for cached favicon files, created on first use. */
  iconsDirectory(): string {
    const iconsPath = join(this.baseDirectory, ICONS_DIR);
    mkdirSync(iconsPath, { recursive: true });
    return iconsPath;
  }

  private removeTempFile(tmpPath: string): void {
    try {
      rmSync(tmpPath, { force: true });
    } catch (err) {
      console.error('[DataStore] Failed to remove temporary file:', err);
    }
  }

  private ensureBaseDirectory(): void {
    mkdirSync(this.baseDirectory, { recursive: true });
  }
}
