import { stat } from 'node:fs/promises';
import type { SettingsOverrides } from '../config.js';
import { logger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';
import { loadRosterFile } from './rosterFile.js';
import type { RosterChange, RosterDiff, RosterSnapshot } from './types.js';

/** Key-set and enabled-flag diff between two roster snapshots. */
export function diffRosters(previous: RosterSnapshot, next: RosterSnapshot): RosterDiff {
  const diff: RosterDiff = { added: [], removed: [], enabled: [], disabled: [] };

  for (const [key, entry] of next.streamers) {
    const before = previous.streamers.get(key);
    if (!before) {
      diff.added.push(key);
    } else if (before.enabled && !entry.enabled) {
      diff.disabled.push(key);
    } else if (!before.enabled && entry.enabled) {
      diff.enabled.push(key);
    }
  }
  for (const key of previous.streamers.keys()) {
    if (!next.streamers.has(key)) diff.removed.push(key);
  }
  return diff;
}

export function isEmptyDiff(diff: RosterDiff): boolean {
  return !diff.added.length && !diff.removed.length && !diff.enabled.length && !diff.disabled.length;
}

/**
 * Polls the roster file's modification time once per monitor cycle and
 * reloads it when it changes. Overrides from the command line are re-applied
 * to every reload.
 */
export class ConfigWatcher {
  private snapshot: RosterSnapshot | null = null;
  private lastMtimeMs = 0;

  constructor(
    readonly path: string,
    private overrides: SettingsOverrides = {},
  ) {}

  /** Initial load. Errors propagate: a broken roster at startup is fatal. */
  async load(): Promise<RosterSnapshot> {
    const { snapshot, created } = await loadRosterFile(this.path, this.overrides);
    if (created) logger.info(`Created default config file: ${this.path}`);
    this.lastMtimeMs = await this.readMtime();
    this.snapshot = snapshot;
    return snapshot;
  }

  current(): RosterSnapshot {
    if (!this.snapshot) throw new Error('ConfigWatcher.load() has not completed');
    return this.snapshot;
  }

  /**
   * Returns the change when the file was modified since the last look, or
   * null. An invalid file after startup is logged and the previous snapshot
   * stays in effect.
   */
  async checkForChanges(): Promise<RosterChange | null> {
    const previous = this.current();
    let mtimeMs: number;
    try {
      mtimeMs = await this.readMtime();
    } catch (err) {
      logger.warn({ error: errorMessage(err) }, `Config file ${this.path} is not readable, keeping previous roster`);
      return null;
    }
    if (mtimeMs === this.lastMtimeMs) return null;
    this.lastMtimeMs = mtimeMs;

    let next: RosterSnapshot;
    try {
      ({ snapshot: next } = await loadRosterFile(this.path, this.overrides));
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Config reload failed, keeping previous roster');
      return null;
    }

    this.snapshot = next;
    const diff = diffRosters(previous, next);
    logger.info({ diff }, '🔄 Config reloaded');
    return { previous, next, diff };
  }

  private async readMtime(): Promise<number> {
    return (await stat(this.path)).mtimeMs;
  }
}
