/**
 * State Manager
 *
 * Reads and writes the hint file. Writes are atomic (temp file, then
 * rename) so an interrupted run never leaves a torn file behind.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';

import { StateError } from '../core/errors.js';
import { getStatePath } from '../lib/paths.js';
import type { HintFile, HintKey } from './types.js';

const HINT_KEYS: readonly HintKey[] = ['lastIdentifier', 'lastName', 'lastOs', 'lastStorage', 'lastAddress'];

function isHintKey(key: string): key is HintKey {
  return HINT_KEYS.some((known) => known === key);
}

/**
 * Validate parsed JSON as a hint file, dropping unknown keys.
 */
export function parseHintFile(data: unknown): HintFile | null {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return null;
  }
  if (!('version' in data) || data.version !== 1) {
    return null;
  }
  const updatedAt = 'updatedAt' in data && typeof data.updatedAt === 'string' ? data.updatedAt : '';
  const rawValues = 'values' in data ? data.values : undefined;
  if (typeof rawValues !== 'object' || rawValues === null || Array.isArray(rawValues)) {
    return null;
  }

  const values: HintFile['values'] = {};
  for (const [key, value] of Object.entries(rawValues)) {
    if (isHintKey(key) && typeof value === 'string') {
      values[key] = value;
    }
  }
  return { version: 1, updatedAt, values };
}

/**
 * Manages the hint file for labforge.
 */
export class StateManager {
  private readonly stateDir: string;
  private readonly statePath: string;
  private state: HintFile | null = null;

  constructor(stateDir: string) {
    this.stateDir = stateDir;
    this.statePath = getStatePath(stateDir);
  }

  getPath(): string {
    return this.statePath;
  }

  /**
   * Load hints from disk. A missing file is an empty set of hints.
   *
   * @throws StateError if the file exists but cannot be parsed
   */
  async load(): Promise<HintFile> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return this.reset();
      }
      throw error;
    }

    let parsed: HintFile | null;
    try {
      parsed = parseHintFile(JSON.parse(content));
    } catch {
      throw new StateError(`Hint file ${this.statePath} is not valid JSON`, this.statePath);
    }
    if (!parsed) {
      throw new StateError(`Hint file ${this.statePath} has an unknown format`, this.statePath);
    }

    this.state = parsed;
    return parsed;
  }

  /**
   * Start from an empty set of hints, discarding whatever is on disk.
   */
  reset(): HintFile {
    this.state = { version: 1, updatedAt: new Date().toISOString(), values: {} };
    return this.state;
  }

  /**
   * Get currently loaded state without reading from disk.
   *
   * @throws If state hasn't been loaded yet
   */
  getState(): HintFile {
    if (!this.state) {
      throw new Error('State not loaded. Call load() first.');
    }
    return this.state;
  }

  get(key: HintKey): string | undefined {
    return this.getState().values[key];
  }

  /**
   * Record hints in memory; call save() to persist.
   */
  set(values: Partial<Record<HintKey, string>>): void {
    const state = this.getState();
    state.values = { ...state.values, ...values };
  }

  /**
   * Save current state to disk using atomic write.
   */
  async save(): Promise<void> {
    const state = this.getState();
    state.updatedAt = new Date().toISOString();

    await mkdir(this.stateDir, { recursive: true });

    const tempPath = `${this.statePath}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, 'utf-8');
    await rename(tempPath, this.statePath);
  }
}
