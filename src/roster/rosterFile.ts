import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SettingsOverrides } from '../config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import type { Credentials, MonitorSettings, RosterSnapshot, StreamerEntry } from './types.js';

// ─── On-disk schema (snake_case) ───

const streamerSchema = z.object({
  username: z.string().min(1),
  enabled: z.boolean().default(true),
  session_id: z.string().nullable().default(null),
  tt_target_idc: z.string().nullable().default(null),
  tags: z.array(z.string()).default([]),
  notes: z.string().default(''),
});

const settingsSchema = z.object({
  check_interval_seconds: z.number().positive().default(30),
  max_concurrent_recordings: z.number().int().min(1).default(3),
  output_directory: z.string().min(1).default('recordings'),
  session_id: z.string().nullable().default(null),
  tt_target_idc: z.string().nullable().default('us-eastred'),
  stability_threshold: z.number().int().min(1).default(3),
  cooldown_seconds: z.number().min(0).default(90),
  stability_window_seconds: z.number().positive().default(600),
  disconnect_grace_seconds: z.number().min(0).default(60),
  probe_timeout_seconds: z.number().positive().default(10),
  probe_retries: z.number().int().min(0).default(2),
  poll_deadline_seconds: z.number().positive().default(30),
  status_port: z.number().int().min(0).max(65535).default(0),
});

export const rosterFileSchema = z.object({
  streamers: z.record(z.string(), streamerSchema).default({}),
  settings: settingsSchema.default({}),
});

export type RosterFile = z.input<typeof rosterFileSchema>;

export const DEFAULT_ROSTER_FILE: RosterFile = {
  streamers: {
    example_user1: {
      username: '@example_user1',
      enabled: true,
      session_id: null,
      tt_target_idc: null,
      tags: ['research', 'category1'],
      notes: 'Example streamer for research',
    },
    example_user2: {
      username: '@example_user2',
      enabled: true,
      session_id: null,
      tt_target_idc: null,
      tags: ['research', 'category2'],
      notes: 'Another example streamer',
    },
  },
  settings: {
    check_interval_seconds: 30,
    max_concurrent_recordings: 3,
    output_directory: 'recordings',
    session_id: null,
    tt_target_idc: 'us-eastred',
    stability_threshold: 3,
    cooldown_seconds: 90,
    disconnect_grace_seconds: 60,
    probe_timeout_seconds: 10,
    probe_retries: 2,
    status_port: 0,
  },
};

// ─── Parsing ───

/** Validate raw JSON and turn it into an immutable snapshot with overrides applied. */
export function parseRoster(raw: unknown, overrides: SettingsOverrides = {}, path = '<memory>'): RosterSnapshot {
  const parsed = rosterFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid roster file ${path}: ${issues}`, path);
  }

  const s = parsed.data.settings;
  const settings: MonitorSettings = applyOverrides({
    checkIntervalSeconds: s.check_interval_seconds,
    maxConcurrentRecordings: s.max_concurrent_recordings,
    outputDirectory: s.output_directory,
    sessionId: s.session_id,
    targetIdc: s.tt_target_idc,
    stabilityThreshold: s.stability_threshold,
    cooldownSeconds: s.cooldown_seconds,
    stabilityWindowSeconds: s.stability_window_seconds,
    disconnectGraceSeconds: s.disconnect_grace_seconds,
    probeTimeoutSeconds: s.probe_timeout_seconds,
    probeRetries: s.probe_retries,
    pollDeadlineSeconds: s.poll_deadline_seconds,
    statusPort: s.status_port,
  }, overrides);

  const streamers = new Map<string, StreamerEntry>();
  for (const [key, entry] of Object.entries(parsed.data.streamers)) {
    streamers.set(key, Object.freeze({
      key,
      username: entry.username,
      enabled: entry.enabled,
      sessionId: entry.session_id,
      targetIdc: entry.tt_target_idc,
      tags: Object.freeze([...entry.tags]),
      notes: entry.notes,
    }));
  }

  return Object.freeze({ streamers, settings: Object.freeze(settings) });
}

export function applyOverrides(settings: MonitorSettings, overrides: SettingsOverrides): MonitorSettings {
  return {
    ...settings,
    sessionId: overrides.sessionId ?? settings.sessionId,
    targetIdc: overrides.targetIdc ?? settings.targetIdc,
    checkIntervalSeconds: overrides.checkIntervalSeconds ?? settings.checkIntervalSeconds,
    outputDirectory: overrides.outputDirectory ?? settings.outputDirectory,
    statusPort: overrides.statusPort ?? settings.statusPort,
  };
}

/**
 * Read the roster file. A missing file is created with the documented default;
 * unreadable or invalid JSON is a ConfigError.
 */
export async function loadRosterFile(path: string, overrides: SettingsOverrides = {}): Promise<{ snapshot: RosterSnapshot; created: boolean }> {
  let created = false;
  if (!existsSync(path)) {
    await writeFile(path, JSON.stringify(DEFAULT_ROSTER_FILE, null, 2) + '\n', 'utf-8');
    created = true;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not read roster file ${path}: ${errorMessage(err)}`, path);
  }
  return { snapshot: parseRoster(raw, overrides, path), created };
}

// ─── Helpers ───

export function enabledStreamers(snapshot: RosterSnapshot): StreamerEntry[] {
  return [...snapshot.streamers.values()].filter((s) => s.enabled);
}

/** Per-entity credentials win; otherwise the (possibly overridden) global ones. */
export function resolveCredentials(entry: StreamerEntry, settings: MonitorSettings): Credentials {
  return {
    sessionId: entry.sessionId || settings.sessionId || null,
    targetIdc: entry.targetIdc || settings.targetIdc || null,
  };
}

/** `@name` → `name`, for file names. */
export function cleanUsername(username: string): string {
  return username.replace(/^@/, '');
}
