/** One monitored account, as listed in the roster file. */
export interface StreamerEntry {
  /** Roster key; the stable identifier every map is keyed by. */
  readonly key: string;
  /** Display identifier used to connect, e.g. `@someone`. */
  readonly username: string;
  readonly enabled: boolean;
  readonly sessionId: string | null;
  readonly targetIdc: string | null;
  readonly tags: readonly string[];
  readonly notes: string;
}

export interface MonitorSettings {
  checkIntervalSeconds: number;
  maxConcurrentRecordings: number;
  outputDirectory: string;
  sessionId: string | null;
  targetIdc: string | null;
  stabilityThreshold: number;
  cooldownSeconds: number;
  stabilityWindowSeconds: number;
  disconnectGraceSeconds: number;
  probeTimeoutSeconds: number;
  probeRetries: number;
  pollDeadlineSeconds: number;
  statusPort: number;
}

export interface RosterSnapshot {
  readonly streamers: ReadonlyMap<string, StreamerEntry>;
  readonly settings: Readonly<MonitorSettings>;
}

export interface Credentials {
  sessionId: string | null;
  targetIdc: string | null;
}

export interface RosterDiff {
  added: string[];
  removed: string[];
  enabled: string[];
  disabled: string[];
}

export interface RosterChange {
  previous: RosterSnapshot;
  next: RosterSnapshot;
  diff: RosterDiff;
}
