import { EventEmitter } from 'node:events';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { v4 as uuid } from 'uuid';
import { logger } from '../logger.js';
import { cleanUsername, resolveCredentials } from '../roster/rosterFile.js';
import type { MonitorSettings, StreamerEntry } from '../roster/types.js';
import type { ControlEvent, LiveClient, LiveClientFactory } from '../tiktok/types.js';
import { AdmissionError, CaptureError, errorMessage, type AdmissionFailure } from '../utils/errors.js';
import { formatFileTimestamp, withTimeout } from '../utils/time.js';
import { EVENT_HEADERS } from './eventRows.js';
import { RecordingSession } from './RecordingSession.js';
import {
  EVENT_KINDS,
  emptyCounts,
  type CaptureFactory,
  type MediaCapture,
  type EventKind,
  type EventSink,
  type SessionLogEntry,
  type SessionSummary,
  type SessionSummaryLog,
  type SinkOpener,
  type StopReason,
} from './types.js';

const DEFAULT_DISCONNECT_TIMEOUT_MS = 10_000;

export interface RecordingOrchestratorDeps {
  settings: () => Readonly<MonitorSettings>;
  clientFactory: LiveClientFactory;
  captureFactory: CaptureFactory;
  openSink: SinkOpener;
  sessionLog: SessionSummaryLog;
  disconnectTimeoutMs?: number;
  now?: () => Date;
}

export type StartOutcome =
  | { ok: true; session: RecordingSession }
  | { ok: false; reason: AdmissionFailure | 'error'; error: string };

/**
 * Admission-controlled lifecycle of recording sessions. The cap is a gate,
 * not a queue: a rejected entity waits for its next confirmed-live signal.
 *
 * Events: 'sessionStarted' (session), 'sessionStopping' (key, reason),
 * 'sessionStopped' (SessionSummary), 'clientDisconnected' (key),
 * 'clientReconnected' (key).
 */
export class RecordingOrchestrator extends EventEmitter {
  private sessions = new Map<string, RecordingSession>();
  // Slots reserved by admissions still connecting; they count toward the cap
  private starting = new Set<string>();
  // Stop requests and stream ends that arrived while an admission was connecting
  private cancelledStarts = new Map<string, StopReason>();
  private endedDuringStart = new Set<string>();
  private now: () => Date;

  constructor(private deps: RecordingOrchestratorDeps) {
    super();
    this.now = deps.now ?? (() => new Date());
  }

  // ─── Queries ───

  /** A session exists or is being admitted. */
  has(key: string): boolean {
    return this.sessions.has(key) || this.starting.has(key);
  }

  /** A session exists and has not begun stopping. */
  isRecording(key: string): boolean {
    return this.sessions.get(key)?.isRecording ?? false;
  }

  getSession(key: string): RecordingSession | undefined {
    return this.sessions.get(key);
  }

  activeCount(): number {
    return this.sessions.size;
  }

  activeKeys(): string[] {
    return [...this.sessions.keys()];
  }

  activeUsernames(): string[] {
    return [...this.sessions.values()].map((s) => s.entry.username);
  }

  /** Usernames of recording sessions whose video capture died on its own. */
  lostCaptures(): string[] {
    return [...this.sessions.values()]
      .filter((s) => s.isRecording && s.capture.failure() !== null)
      .map((s) => s.entry.username);
  }

  // ─── Start ───

  async start(entry: StreamerEntry): Promise<StartOutcome> {
    const { key, username } = entry;

    // Check-and-reserve happens before the first await
    const rejection = this.admissionCheck(key);
    if (rejection) {
      logger.warn(rejection.message);
      await this.logSafe(this.attemptEntry(entry, rejection.message));
      return { ok: false, reason: rejection.reason, error: rejection.message };
    }
    this.starting.add(key);

    const settings = this.deps.settings();
    const startedAt = this.now();
    const base = `${cleanUsername(username)}_${formatFileTimestamp(startedAt)}`;
    const outDir = settings.outputDirectory;
    const sinks = new Map<EventKind, EventSink>();
    let client: LiveClient | null = null;
    let capture: MediaCapture | null = null;
    let session: RecordingSession | null = null;
    let endedEarly = false;

    logger.info(`🔴 Starting recording for ${username}`);
    try {
      await mkdir(outDir, { recursive: true });
      for (const kind of EVENT_KINDS) {
        this.throwIfCancelled(key, username);
        sinks.set(kind, await this.deps.openSink(join(outDir, `${base}_${kind}.csv`), EVENT_HEADERS[kind]));
      }
      this.throwIfCancelled(key, username);

      client = this.deps.clientFactory(username, resolveCredentials(entry, settings));
      capture = this.deps.captureFactory(join(outDir, `${base}.mp4`));
      session = new RecordingSession({
        id: uuid(),
        entry,
        startedAt,
        client,
        capture,
        sinks,
        onControl: (event, s) => this.handleControl(event, s),
        now: this.now,
      });

      const info = await client.connect();
      this.throwIfCancelled(key, username);
      if (!info.streamUrl) throw new CaptureError(`No stream URL in room info for ${username}`);
      await capture.start(info.streamUrl);
      this.throwIfCancelled(key, username);

      this.sessions.set(key, session);
      endedEarly = this.endedDuringStart.has(key);
    } catch (err) {
      const message = errorMessage(err);
      const reason = err instanceof AdmissionError ? err.reason : 'error';
      session?.beginStop();
      await this.rollback(username, sinks, client, capture);
      if (reason === 'cancelled') logger.info(message);
      else logger.error(`❌ Failed to start recording ${username}: ${message}`);
      await this.logSafe({ ...this.baseEntry(entry), action: 'recording_started', status: 'failed', errorMessage: message });
      return { ok: false, reason, error: message };
    } finally {
      this.starting.delete(key);
      this.cancelledStarts.delete(key);
      this.endedDuringStart.delete(key);
    }

    await this.logSafe({ ...this.baseEntry(entry), action: 'recording_started', status: 'success' });
    logger.info(`✅ Successfully started recording ${username}`);
    this.emit('sessionStarted', session);

    if (endedEarly) {
      logger.info(`🏁 ${username} ended the broadcast while the recording was starting`);
      await this.stop(key, 'official_end');
    }
    return { ok: true, session };
  }

  private throwIfCancelled(key: string, username: string): void {
    const reason = this.cancelledStarts.get(key);
    if (reason) throw new AdmissionError('cancelled', `Start of ${username} cancelled (${reason})`);
  }

  private admissionCheck(key: string): AdmissionError | null {
    if (this.has(key)) {
      return new AdmissionError('duplicate', `Already recording ${key}`);
    }
    const cap = this.deps.settings().maxConcurrentRecordings;
    if (this.sessions.size + this.starting.size >= cap) {
      return new AdmissionError('capacity', `Max concurrent recordings reached. Skipping ${key}`);
    }
    return null;
  }

  private async rollback(
    username: string,
    sinks: Map<EventKind, EventSink>,
    client: LiveClient | null,
    capture: MediaCapture | null,
  ): Promise<void> {
    if (capture?.isCapturing()) {
      await capture.stop().catch((err) => {
        logger.warn({ error: errorMessage(err) }, `Rollback: capture stop failed for ${username}`);
      });
    }
    const closing = [...sinks.values()].map((s) => s.close());
    for (const r of await Promise.allSettled(closing)) {
      if (r.status === 'rejected') logger.warn({ error: errorMessage(r.reason) }, `Rollback: sink close failed for ${username}`);
    }
    if (client) {
      client.removeAllListeners('event');
      await client.disconnect().catch((err) => {
        logger.warn({ error: errorMessage(err) }, `Rollback: disconnect failed for ${username}`);
      });
    }
  }

  // ─── Stop ───

  /**
   * Idempotent: an unknown or already-stopping entity is a logged no-op.
   * The session leaves the active set even if teardown fails. An admission
   * still connecting is marked cancelled and rolls itself back; that also
   * returns null.
   */
  async stop(key: string, reason: StopReason): Promise<SessionSummary | null> {
    if (this.starting.has(key) && !this.cancelledStarts.has(key)) {
      logger.info(`Cancelling the recording of ${key} that is still starting (${reason})`);
      this.cancelledStarts.set(key, reason);
      return null;
    }

    const session = this.sessions.get(key);
    if (!session || !session.beginStop()) {
      logger.warn(`No active recording found for ${key}`);
      return null;
    }
    this.emit('sessionStopping', key, reason);

    const { username } = session.entry;
    const stoppedAt = this.now();
    const durationMinutes = session.durationMinutes(stoppedAt);
    const captureError = session.capture.failure();

    try {
      if (session.capture.isCapturing()) {
        await session.capture.stop().catch((err) => {
          logger.error({ error: errorMessage(err) }, `Failed to stop video capture for ${username}`);
        });
      }

      if (session.client.isConnected()) {
        const timeoutMs = this.deps.disconnectTimeoutMs ?? DEFAULT_DISCONNECT_TIMEOUT_MS;
        await withTimeout(session.client.disconnect(), timeoutMs, `Disconnect from ${username}`).catch((err) => {
          logger.warn({ error: errorMessage(err) }, `Disconnect from ${username} did not complete`);
        });
      }
      session.client.removeAllListeners('event');

      await session.closeSinks();

      await this.logSafe({
        ...this.baseEntry(session.entry),
        timestamp: stoppedAt,
        action: `recording_stopped_${reason}`,
        status: 'success',
        durationMinutes,
        counts: { ...session.counts },
        errorMessage: captureError ?? '',
      });
      logger.info(`⏹️  Stopped recording ${username} (${reason}) - Duration: ${durationMinutes.toFixed(1)}m`);
      logger.info({ ...session.counts }, `📊 Stats for ${username}`);
    } catch (err) {
      logger.error({ error: errorMessage(err) }, `Error stopping recording for ${username}`);
    } finally {
      this.sessions.delete(key);
    }

    const summary: SessionSummary = {
      key,
      sessionId: session.id,
      username,
      reason,
      durationMinutes,
      counts: { ...session.counts },
      videoFile: session.capture.filePath,
      captureError,
    };
    this.emit('sessionStopped', summary);
    return summary;
  }

  async stopAll(reason: StopReason): Promise<void> {
    await Promise.allSettled(this.activeKeys().map((key) => this.stop(key, reason)));
    logger.info('All recordings stopped');
  }

  // ─── Reconnect ───

  /**
   * Re-open the protocol connection of a recording session after a drop.
   * False when there is no such session or the connection could not be
   * restored; the caller decides whether the session goes.
   */
  async reconnect(key: string): Promise<boolean> {
    const session = this.sessions.get(key);
    if (!session || !session.isRecording) return false;
    if (session.client.isConnected()) return true;

    const { username } = session.entry;
    try {
      await session.client.reconnect();
    } catch (err) {
      logger.warn({ error: errorMessage(err) }, `Reconnect to ${username} failed`);
      return false;
    }

    // stopped while reconnecting; teardown already skipped the closed client
    if (!session.isRecording) {
      await session.client.disconnect().catch((err) => {
        logger.warn({ error: errorMessage(err) }, `Disconnect from ${username} did not complete`);
      });
      return false;
    }
    logger.info(`🔌 Reconnected to ${username}`);
    return true;
  }

  // ─── Protocol control events ───

  private handleControl(event: ControlEvent, session: RecordingSession): void {
    if (this.sessions.get(session.key) !== session) {
      // still being admitted: start() stops it once it is registered
      if (event.type === 'streamEnd' && this.starting.has(session.key)) this.endedDuringStart.add(session.key);
      return;
    }
    if (!session.isRecording) return;

    switch (event.type) {
      case 'streamEnd':
        logger.info(`🏁 ${session.entry.username} ended the broadcast`);
        this.stop(session.key, 'official_end').catch((err) => {
          logger.error({ error: errorMessage(err) }, `Stop after stream end failed for ${session.key}`);
        });
        break;
      case 'disconnect':
        this.emit('clientDisconnected', session.key);
        break;
      case 'connect':
        this.emit('clientReconnected', session.key);
        break;
    }
  }

  // ─── Summary log ───

  private baseEntry(entry: StreamerEntry): SessionLogEntry {
    return {
      timestamp: this.now(),
      username: entry.username,
      action: 'recording_attempt',
      status: 'success',
      durationMinutes: 0,
      counts: emptyCounts(),
      tags: entry.tags,
      notes: entry.notes,
      errorMessage: '',
    };
  }

  private attemptEntry(entry: StreamerEntry, message: string): SessionLogEntry {
    return { ...this.baseEntry(entry), action: 'recording_attempt', status: 'failed', errorMessage: message };
  }

  private async logSafe(entry: SessionLogEntry): Promise<void> {
    try {
      await this.deps.sessionLog.record(entry);
    } catch (err) {
      logger.warn({ error: errorMessage(err) }, `Could not write session log entry for ${entry.username}`);
    }
  }
}
