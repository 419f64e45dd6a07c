import { EventEmitter } from 'node:events';
import type { Credentials, MonitorSettings, StreamerEntry } from '../src/roster/types.js';
import type {
  EventSink,
  MediaCapture,
  SessionLogEntry,
  SessionSummaryLog,
} from '../src/recording/types.js';
import type { ConnectInfo, LiveClient, LiveEvent, LiveStatusSource } from '../src/tiktok/types.js';
import type { CsvValue } from '../src/utils/csv.js';

export function makeEntry(key: string, overrides: Partial<StreamerEntry> = {}): StreamerEntry {
  return {
    key,
    username: `@${key}`,
    enabled: true,
    sessionId: null,
    targetIdc: null,
    tags: ['test'],
    notes: '',
    ...overrides,
  };
}

export function makeSettings(overrides: Partial<MonitorSettings> = {}): MonitorSettings {
  return {
    checkIntervalSeconds: 30,
    maxConcurrentRecordings: 3,
    outputDirectory: 'recordings',
    sessionId: null,
    targetIdc: null,
    stabilityThreshold: 3,
    cooldownSeconds: 90,
    stabilityWindowSeconds: 600,
    disconnectGraceSeconds: 60,
    probeTimeoutSeconds: 10,
    probeRetries: 2,
    pollDeadlineSeconds: 30,
    statusPort: 0,
    ...overrides,
  };
}

export class FakeLiveClient extends EventEmitter implements LiveClient {
  connected = false;
  connectCalls = 0;
  reconnectCalls = 0;
  disconnectCalls = 0;
  connectError: Error | null = null;
  reconnectError: Error | null = null;
  /** When set, connect() waits for it before answering. */
  connectGate: Promise<void> | null = null;
  streamUrl: string | null = 'rtmp://stream.test/live';

  constructor(readonly username: string, readonly credentials: Credentials = { sessionId: null, targetIdc: null }) {
    super();
  }

  async connect(): Promise<ConnectInfo> {
    this.connectCalls++;
    if (this.connectGate) await this.connectGate;
    if (this.connectError) throw this.connectError;
    this.connected = true;
    return { roomId: '7000', streamUrl: this.streamUrl };
  }

  async reconnect(): Promise<void> {
    this.reconnectCalls++;
    if (this.reconnectError) throw this.reconnectError;
    this.connected = true;
    this.push({ type: 'connect', roomId: '7000' });
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  push(event: LiveEvent): void {
    this.emit('event', event);
  }
}

export class FakeCapture implements MediaCapture {
  capturing = false;
  startCalls = 0;
  stopCalls = 0;
  startError: Error | null = null;
  streamUrl: string | null = null;
  lost: string | null = null;

  constructor(readonly filePath: string) {}

  async start(streamUrl: string): Promise<void> {
    this.startCalls++;
    if (this.startError) throw this.startError;
    this.streamUrl = streamUrl;
    this.capturing = true;
  }

  async stop(): Promise<void> {
    this.stopCalls++;
    this.capturing = false;
  }

  isCapturing(): boolean {
    return this.capturing;
  }

  failure(): string | null {
    return this.lost;
  }

  /** Simulate the capture process dying mid-session. */
  die(reason: string): void {
    this.capturing = false;
    this.lost = reason;
  }
}

export class MemorySink implements EventSink {
  rows: CsvValue[][] = [];
  closeCalls = 0;

  constructor(readonly path: string, readonly header: readonly string[]) {}

  async write(row: readonly CsvValue[]): Promise<void> {
    if (this.closeCalls > 0) throw new Error(`Sink ${this.path} is closed`);
    this.rows.push([...row]);
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

export class MemorySessionLog implements SessionSummaryLog {
  entries: SessionLogEntry[] = [];

  async record(entry: SessionLogEntry): Promise<void> {
    this.entries.push(entry);
  }

  actions(): string[] {
    return this.entries.map((e) => `${e.action}/${e.status}`);
  }
}

/** Status source answering from a mutable table; unknown accounts are offline. */
export class TableStatusSource implements LiveStatusSource {
  live = new Map<string, boolean>();
  calls: string[] = [];

  async isLive(username: string): Promise<boolean> {
    this.calls.push(username);
    return this.live.get(username) ?? false;
  }
}

export const chatEvent = (comment: string, userId = 'viewer1'): LiveEvent => ({
  type: 'chat',
  user: { userId, nickname: userId.toUpperCase(), followerCount: 5 },
  comment,
});

/** Let queued promise callbacks run. */
/** A promise the test resolves by hand. */
export function gate(): { promise: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}
