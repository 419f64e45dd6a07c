import { EventEmitter } from 'node:events';
import type { ControlSignals } from '../control/ControlSignals.js';
import type { MonitorState, MonitorStatus, StatusFile } from '../control/StatusFile.js';
import type { DisconnectConfirmer } from '../live/DisconnectConfirmer.js';
import type { PollEngine } from '../live/PollEngine.js';
import type { StabilityTracker } from '../live/StabilityTracker.js';
import { logger } from '../logger.js';
import type { RecordingOrchestrator, StartOutcome } from '../recording/RecordingOrchestrator.js';
import type { StopReason } from '../recording/types.js';
import type { ConfigWatcher } from '../roster/ConfigWatcher.js';
import { enabledStreamers, resolveCredentials } from '../roster/rosterFile.js';
import type { RosterChange, StreamerEntry } from '../roster/types.js';
import { errorMessage } from '../utils/errors.js';
import { sleep } from '../utils/time.js';

const MIN_INTERVAL_MS = 5_000;
const ERROR_BACKOFF_MS = 30_000;
const STATUS_EVERY_N_CYCLES = 5;
const SLOW_CYCLE_RATIO = 0.8;

export interface StreamMonitorDeps {
  watcher: ConfigWatcher;
  engine: Pick<PollEngine, 'pollAll'>;
  tracker: StabilityTracker;
  orchestrator: RecordingOrchestrator;
  confirmer: DisconnectConfirmer;
  control: ControlSignals;
  statusFile: StatusFile;
  now?: () => number;
}

export interface CycleReport {
  cycle: number;
  paused: boolean;
  statuses: Map<string, boolean>;
  confirmed: string[];
  /** Admissions spawned this cycle; the loop itself does not wait on them. */
  starts: Promise<StartOutcome>[];
  durationMs: number;
}

/**
 * The single control loop: reload roster, read control signals, poll, debounce,
 * admit. Termination is event-driven (stream end, confirmed disconnect,
 * roster removal, shutdown); a poll that reads offline never stops a session.
 */
export class StreamMonitor extends EventEmitter {
  private cycle = 0;
  private state: MonitorState = 'starting';
  private pausedUntil: number | null = null;
  private stopReason: string | null = null;
  private stopSessionsAs: StopReason = 'shutdown';
  private wake = new AbortController();
  private inflight = new Set<Promise<StartOutcome>>();
  private now: () => number;

  constructor(private deps: StreamMonitorDeps) {
    super();
    this.now = deps.now ?? Date.now;

    deps.orchestrator.on('clientDisconnected', (key: string) => {
      deps.confirmer.onDisconnect(key);
    });
    deps.orchestrator.on('clientReconnected', (key: string) => {
      if (deps.confirmer.cancel(key, 'cancelled by reconnect')) {
        logger.info(`🔁 ${key} reconnected before the grace period ended`);
      }
    });
    deps.orchestrator.on('sessionStopping', (key: string, reason: StopReason) => {
      deps.confirmer.cancel(key, `cancelled by stop (${reason})`);
    });
  }

  // ─── Loop ───

  async run(): Promise<void> {
    const roster = this.deps.watcher.current();
    logger.info('🔍 Starting TikTok streamer monitor...');
    logger.info(`📋 Monitoring ${enabledStreamers(roster).length} streamers`);
    this.state = 'running';

    while (!this.stopReason) {
      let delayMs: number;
      try {
        const report = await this.runCycle();
        delayMs = this.nextDelay(report.durationMs);
      } catch (err) {
        logger.error({ error: errorMessage(err) }, 'Error in monitoring loop');
        delayMs = ERROR_BACKOFF_MS;
      }
      if (this.stopReason) break;
      await sleep(delayMs, this.wake.signal);
    }

    await this.shutdown();
  }

  /** One pass of the loop; exposed so tests can drive cycles directly. */
  async runCycle(): Promise<CycleReport> {
    this.cycle++;
    if (this.state === 'starting') this.state = 'running';
    const started = this.now();
    const report: CycleReport = {
      cycle: this.cycle,
      paused: false,
      statuses: new Map(),
      confirmed: [],
      starts: [],
      durationMs: 0,
    };

    const change = await this.deps.watcher.checkForChanges();
    if (change) await this.applyRosterChange(change);

    for (const signal of await this.deps.control.poll()) {
      if (signal.type === 'stop') {
        logger.info(`🛑 Stop requested: ${signal.reason}`);
        this.requestStop(signal.reason);
      } else {
        this.pause(signal.seconds);
      }
    }

    if (this.stopReason) {
      report.durationMs = this.now() - started;
      return report;
    }

    if (this.isPaused()) {
      report.paused = true;
      await this.writeStatus();
      report.durationMs = this.now() - started;
      return report;
    }

    const { settings } = this.deps.watcher.current();
    const enabled = enabledStreamers(this.deps.watcher.current());
    logger.debug(`🔄 Check cycle #${this.cycle} - Checking ${enabled.length} streamers in parallel...`);

    const poll = await this.deps.engine.pollAll(
      enabled.map((e) => ({ key: e.key, username: e.username, credentials: resolveCredentials(e, settings) })),
    );
    report.statuses = poll.statuses;

    const observedAt = this.now();
    for (const entry of enabled) {
      const live = poll.statuses.get(entry.key) ?? false;
      const recording = this.deps.orchestrator.has(entry.key);
      const signal = this.deps.tracker.observe(entry.key, live, { now: observedAt, recording });

      if (signal === 'confirmed_live') {
        logger.info(`🟢 ${entry.username} went LIVE!`);
        report.confirmed.push(entry.key);
        report.starts.push(this.spawnStart(entry));
      } else if (signal === 'offline_observed' && recording) {
        logger.debug(`${entry.username} polls offline while recording; waiting for end or disconnect event`);
      }
    }

    report.durationMs = this.now() - started;
    if (this.cycle % STATUS_EVERY_N_CYCLES === 0 || report.confirmed.length) {
      const recording = this.deps.orchestrator.activeUsernames();
      const took = (report.durationMs / 1000).toFixed(1);
      if (recording.length) {
        logger.info(`📺 Currently recording: ${recording.join(', ')} (check took ${took}s)`);
      } else {
        logger.info(`💤 No streamers currently recording (check took ${took}s)`);
      }
    }

    await this.writeStatus();
    return report;
  }

  private spawnStart(entry: StreamerEntry): Promise<StartOutcome> {
    const task = this.deps.orchestrator.start(entry).catch((err): StartOutcome => {
      logger.error({ error: errorMessage(err) }, `Unexpected admission error for ${entry.username}`);
      return { ok: false, reason: 'error', error: errorMessage(err) };
    });
    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
    return task;
  }

  private nextDelay(cycleMs: number): number {
    const intervalMs = this.deps.watcher.current().settings.checkIntervalSeconds * 1000;
    if (cycleMs > intervalMs * SLOW_CYCLE_RATIO) {
      logger.warn(`⚠️  Check cycle took ${(cycleMs / 1000).toFixed(1)}s (target: ${intervalMs / 1000}s)`);
    }
    return Math.max(MIN_INTERVAL_MS, intervalMs - cycleMs);
  }

  // ─── Roster reconciliation ───

  async applyRosterChange(change: RosterChange): Promise<void> {
    const { diff, next } = change;
    this.deps.tracker.configure({
      threshold: next.settings.stabilityThreshold,
      cooldownMs: next.settings.cooldownSeconds * 1000,
      windowMs: next.settings.stabilityWindowSeconds * 1000,
    });

    const gone = [...diff.removed, ...diff.disabled];
    await Promise.all(gone.map(async (key) => {
      this.deps.confirmer.cancel(key, 'cancelled by roster change');
      this.deps.tracker.forget(key);
      if (this.deps.orchestrator.has(key)) {
        logger.info(`${key} was removed from the configuration, stopping its recording`);
        await this.deps.orchestrator.stop(key, 'removed_from_config');
      }
    }));
    if (diff.added.length) logger.info(`➕ Added to roster: ${diff.added.join(', ')}`);
  }

  // ─── Control ───

  pause(seconds: number): void {
    this.pausedUntil = this.now() + seconds * 1000;
    this.state = 'paused';
    logger.info(`⏸️  Polling paused for ${seconds}s`);
  }

  resume(): void {
    if (this.pausedUntil === null) return;
    this.pausedUntil = null;
    if (this.state === 'paused') this.state = 'running';
    logger.info('▶️  Polling resumed');
  }

  isPaused(): boolean {
    if (this.pausedUntil === null) return false;
    if (this.now() < this.pausedUntil) return true;
    this.resume();
    return false;
  }

  /**
   * Ask the loop to exit after the current cycle. Sessions are then stopped
   * with `sessionReason`: control_stop for operator requests, shutdown for
   * process signals.
   */
  requestStop(reason: string, sessionReason: StopReason = 'control_stop'): void {
    if (this.stopReason) return;
    this.stopReason = reason;
    this.stopSessionsAs = sessionReason;
    this.wake.abort();
  }

  isStopRequested(): boolean {
    return this.stopReason !== null;
  }

  /** Stop every session, cancel pending disconnects, write the final status. */
  async shutdown(): Promise<void> {
    if (this.state === 'stopping' || this.state === 'stopped') return;
    this.state = 'stopping';
    const sessionReason = this.stopSessionsAs;

    const cancelled = this.deps.confirmer.cancelAll();
    if (cancelled) logger.info(`Cancelled ${cancelled} pending disconnect confirmation(s)`);
    await Promise.allSettled([...this.inflight]);
    await this.deps.orchestrator.stopAll(sessionReason);

    this.state = 'stopped';
    await this.writeStatus();
    logger.info(`🏁 Monitor shutdown complete (${this.stopReason ?? 'shutdown'})`);
    this.emit('stopped');
  }

  getStatus(): MonitorStatus {
    return {
      timestamp: new Date(this.now()).toISOString(),
      state: this.isPaused() ? 'paused' : this.state,
      activeRecordings: this.deps.orchestrator.activeCount(),
      recordingUsernames: this.deps.orchestrator.activeUsernames(),
      captureLost: this.deps.orchestrator.lostCaptures(),
      pendingDisconnects: this.deps.confirmer.pendingCount(),
      pid: process.pid,
      pausedUntil: this.pausedUntil === null ? null : new Date(this.pausedUntil).toISOString(),
      cycle: this.cycle,
    };
  }

  private async writeStatus(): Promise<void> {
    try {
      await this.deps.statusFile.write(this.getStatus());
    } catch (err) {
      logger.warn({ error: errorMessage(err) }, 'Could not write status file');
    }
  }
}
