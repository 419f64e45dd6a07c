import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ControlSignals } from '../src/control/ControlSignals.js';
import { StatusFile, type MonitorStatus } from '../src/control/StatusFile.js';
import { DisconnectConfirmer } from '../src/live/DisconnectConfirmer.js';
import type { ProbeTarget } from '../src/live/LivenessProber.js';
import type { PollResult } from '../src/live/PollEngine.js';
import { StabilityTracker } from '../src/live/StabilityTracker.js';
import { StreamMonitor } from '../src/monitor/StreamMonitor.js';
import { RecordingOrchestrator } from '../src/recording/RecordingOrchestrator.js';
import { ConfigWatcher } from '../src/roster/ConfigWatcher.js';
import { FakeCapture, FakeLiveClient, MemorySessionLog, MemorySink, chatEvent, flushPromises, gate } from './fakes.js';

let dir: string;
let configPath: string;
let mtime = Math.floor(Date.now() / 1000);

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'tiklive-monitor-'));
  configPath = join(dir, 'streamers_config.json');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeRoster(keys: string[]): Promise<void> {
  const streamers = Object.fromEntries(keys.map((k) => [k, { username: `@${k}` }]));
  const settings = {
    output_directory: join(dir, 'recordings'),
    stability_threshold: 1,
    cooldown_seconds: 0,
    max_concurrent_recordings: 2,
    disconnect_grace_seconds: 60,
  };
  await writeFile(configPath, JSON.stringify({ streamers, settings }), 'utf-8');
  mtime += 10;
  await utimes(configPath, mtime, mtime);
}

async function harness(keys: string[]) {
  await writeRoster(keys);
  const watcher = new ConfigWatcher(configPath);
  await watcher.load();

  let now = Date.UTC(2026, 0, 1, 12, 0, 0);
  const live = new Set<string>();
  const pollAll = vi.fn(async (targets: readonly ProbeTarget[]): Promise<PollResult> => ({
    statuses: new Map(targets.map((t) => [t.key, live.has(t.key)])),
    timedOut: [],
    durationMs: 0,
  }));

  const clients = new Map<string, FakeLiveClient>();
  const prepare: { client?: (c: FakeLiveClient) => void } = {};
  const sinks: MemorySink[] = [];
  const log = new MemorySessionLog();
  const orchestrator = new RecordingOrchestrator({
    settings: () => watcher.current().settings,
    clientFactory: (username, credentials) => {
      const client = new FakeLiveClient(username, credentials);
      prepare.client?.(client);
      clients.set(username, client);
      return client;
    },
    captureFactory: (filePath) => new FakeCapture(filePath),
    openSink: async (path, header) => {
      const sink = new MemorySink(path, header);
      sinks.push(sink);
      return sink;
    },
    sessionLog: log,
  });
  const confirmer = new DisconnectConfirmer({
    graceMs: () => watcher.current().settings.disconnectGraceSeconds * 1000,
    probe: async (key) => live.has(key),
    isActive: (key) => orchestrator.isRecording(key),
    reconnect: (key) => orchestrator.reconnect(key),
    stop: (key, reason) => orchestrator.stop(key, reason),
  });
  const statusPath = join(dir, 'monitor_status.json');
  const monitor = new StreamMonitor({
    watcher,
    engine: { pollAll },
    tracker: new StabilityTracker({ threshold: 1, cooldownMs: 0, windowMs: 600_000 }),
    orchestrator,
    confirmer,
    control: new ControlSignals(() => dir),
    statusFile: new StatusFile(statusPath),
    now: () => now,
  });

  const readStatus = async (): Promise<MonitorStatus> => JSON.parse(await readFile(statusPath, 'utf-8'));
  const advance = (ms: number) => {
    now += ms;
  };

  return { monitor, orchestrator, confirmer, live, pollAll, clients, prepare, sinks, log, readStatus, advance };
}

describe('StreamMonitor.runCycle', () => {
  it('starts a recording for a confirmed-live entity and writes the status file', async () => {
    const { monitor, orchestrator, live, readStatus } = await harness(['alice', 'bob']);
    live.add('alice');

    const report = await monitor.runCycle();
    await Promise.all(report.starts);

    expect(report.confirmed).toEqual(['alice']);
    expect([...report.statuses]).toEqual([['alice', true], ['bob', false]]);
    expect(orchestrator.activeKeys()).toEqual(['alice']);

    await monitor.runCycle();
    const status = await readStatus();
    expect(status).toMatchObject({
      state: 'running',
      activeRecordings: 1,
      recordingUsernames: ['@alice'],
      captureLost: [],
      pendingDisconnects: 0,
      pid: process.pid,
      pausedUntil: null,
      cycle: 2,
    });
  });

  it('does not stop a session when polling reads offline', async () => {
    const { monitor, orchestrator, live } = await harness(['alice']);
    live.add('alice');
    await Promise.all((await monitor.runCycle()).starts);

    live.delete('alice');
    for (let i = 0; i < 4; i++) await monitor.runCycle();

    expect(orchestrator.isRecording('alice')).toBe(true);
  });

  it('stops a removed entity and lets a re-added one start fresh', async () => {
    const { monitor, orchestrator, live, log } = await harness(['alice', 'bob']);
    live.add('alice');
    await Promise.all((await monitor.runCycle()).starts);
    const firstSession = orchestrator.getSession('alice')?.id;

    await writeRoster(['bob']);
    await monitor.runCycle();
    expect(orchestrator.has('alice')).toBe(false);
    expect(log.actions()).toContain('recording_stopped_removed_from_config/success');

    await writeRoster(['alice', 'bob']);
    const report = await monitor.runCycle();
    await Promise.all(report.starts);

    expect(report.confirmed).toEqual(['alice']);
    const secondSession = orchestrator.getSession('alice')?.id;
    expect(secondSession).toBeDefined();
    expect(secondSession).not.toBe(firstSession);
  });

  it('cancels the start of an entity removed while its client is still connecting', async () => {
    const { monitor, orchestrator, live, clients, prepare, log } = await harness(['alice', 'bob']);
    const connect = gate();
    prepare.client = (c) => {
      c.connectGate = connect.promise;
    };
    live.add('bob');
    const report = await monitor.runCycle();
    await vi.waitFor(() => expect(clients.get('@bob')?.connectCalls).toBe(1));

    await writeRoster(['alice']);
    await monitor.runCycle();
    connect.open();
    const [outcome] = await Promise.all(report.starts);

    expect(outcome?.ok).toBe(false);
    expect(orchestrator.has('bob')).toBe(false);
    expect(orchestrator.activeKeys()).toEqual([]);
    expect(log.actions()).toEqual(['recording_started/failed']);
  });

  it('leaves unrelated sessions alone on a roster change', async () => {
    const { monitor, orchestrator, live } = await harness(['alice', 'bob']);
    live.add('alice');
    live.add('bob');
    await Promise.all((await monitor.runCycle()).starts);

    await writeRoster(['alice', 'bob', 'carol']);
    await monitor.runCycle();

    expect(orchestrator.activeKeys().sort()).toEqual(['alice', 'bob']);
  });

  it('skips probing while paused, yet an active session keeps persisting events', async () => {
    const { monitor, live, pollAll, clients, sinks, readStatus, advance } = await harness(['alice']);
    live.add('alice');
    await Promise.all((await monitor.runCycle()).starts);

    await writeFile(join(dir, 'PAUSE'), '120', 'utf-8');
    const paused = await monitor.runCycle();

    expect(paused.paused).toBe(true);
    expect(pollAll).toHaveBeenCalledTimes(1);
    expect((await readStatus()).state).toBe('paused');

    clients.get('@alice')?.push(chatEvent('still here'));
    await flushPromises();
    const comments = sinks.find((s) => s.path.endsWith('_comments.csv'));
    expect(comments?.rows.map((r) => r[3])).toEqual(['still here']);

    advance(60_000);
    expect((await monitor.runCycle()).paused).toBe(true);
    expect(pollAll).toHaveBeenCalledTimes(1);

    advance(60_000);
    expect((await monitor.runCycle()).paused).toBe(false);
    expect(pollAll).toHaveBeenCalledTimes(2);
  });

  it('schedules a disconnect confirmation and drops it when the broadcast ends', async () => {
    const { monitor, confirmer, orchestrator, live, clients } = await harness(['alice']);
    live.add('alice');
    await Promise.all((await monitor.runCycle()).starts);
    const client = clients.get('@alice');

    client?.push({ type: 'disconnect', reason: 'socket closed' });
    expect(confirmer.isPending('alice')).toBe(true);

    const stopped = new Promise((resolve) => orchestrator.once('sessionStopped', resolve));
    client?.push({ type: 'streamEnd', action: 3 });
    await stopped;

    expect(confirmer.isPending('alice')).toBe(false);
    expect(orchestrator.has('alice')).toBe(false);
  });

  it('cancels the pending confirmation when the client reconnects', async () => {
    const { monitor, confirmer, live, clients } = await harness(['alice']);
    live.add('alice');
    await Promise.all((await monitor.runCycle()).starts);
    const client = clients.get('@alice');

    client?.push({ type: 'disconnect', reason: 'socket closed' });
    client?.push({ type: 'connect', roomId: '7000' });

    expect(confirmer.pendingCount()).toBe(0);
  });
});

describe('StreamMonitor.run', () => {
  it('consumes a STOP file and shuts down every session with control_stop', async () => {
    const { monitor, orchestrator, live, log, readStatus } = await harness(['alice']);
    live.add('alice');
    await Promise.all((await monitor.runCycle()).starts);
    await writeFile(join(dir, 'STOP'), 'maintenance window', 'utf-8');

    await monitor.run();

    expect(monitor.isStopRequested()).toBe(true);
    expect(orchestrator.activeCount()).toBe(0);
    expect(log.actions()).toContain('recording_stopped_control_stop/success');
    expect((await readStatus()).state).toBe('stopped');
  });

  it('wakes from its sleep when a stop is requested', async () => {
    const { monitor, orchestrator, live, log } = await harness(['alice']);
    live.add('alice');

    const running = monitor.run();
    await vi.waitFor(() => expect(orchestrator.isRecording('alice')).toBe(true));
    monitor.requestStop('SIGTERM', 'shutdown');
    await running;

    expect(log.actions()).toContain('recording_stopped_shutdown/success');
  });
});
