import { join } from 'path';
import { FILE_PATTERNS } from '../constants/index.js';
import type { PersistedState } from '../types/index.js';
import { exists, readJsonOrJsoncFile, writeJsonFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Storage for the time of the last successful cache refresh.
 * Reads are synchronous from memory; writes persist in the background.
 */
export interface TimestampStore {
  /** Epoch milliseconds, or undefined if the cache was never refreshed */
  get(): number | undefined;
  set(timestampMs: number): Promise<void>;
}

export class MemoryTimestampStore implements TimestampStore {
  constructor(private value?: number) {}

  get(): number | undefined {
    return this.value;
  }

  async set(timestampMs: number): Promise<void> {
    this.value = timestampMs;
  }
}

/**
 * Keeps the refresh timestamp in `state.json` under the pkupdates directory.
 */
export class FileTimestampStore implements TimestampStore {
  private constructor(
    private readonly path: string,
    private value: number | undefined
  ) {}

  static async open(stateDir: string): Promise<FileTimestampStore> {
    const path = join(stateDir, FILE_PATTERNS.STATE_FILE);
    if (!(await exists(path))) {
      return new FileTimestampStore(path, undefined);
    }

    try {
      const raw = await readJsonOrJsoncFile(path);
      return new FileTimestampStore(path, readTimestamp(raw));
    } catch (error) {
      logger.warn(`Ignoring unreadable state file: ${path}`, { error });
      return new FileTimestampStore(path, undefined);
    }
  }

  get(): number | undefined {
    return this.value;
  }

  async set(timestampMs: number): Promise<void> {
    this.value = timestampMs;
    const state: PersistedState = { lastRefreshTimestamp: timestampMs };
    await writeJsonFile(this.path, state);
  }
}

function readTimestamp(raw: unknown): number | undefined {
  if (typeof raw !== 'object' || raw === null || !('lastRefreshTimestamp' in raw)) {
    return undefined;
  }
  const value = raw.lastRefreshTimestamp;
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
