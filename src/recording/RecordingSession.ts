import { logger } from '../logger.js';
import type { StreamerEntry } from '../roster/types.js';
import type { ControlEvent, LiveClient, LiveEvent } from '../tiktok/types.js';
import { errorMessage } from '../utils/errors.js';
import { toEventRecord } from './eventRows.js';
import { emptyCounts, type EventCounts, type EventKind, type EventSink, type MediaCapture } from './types.js';

export interface RecordingSessionInit {
  id: string;
  entry: StreamerEntry;
  startedAt: Date;
  client: LiveClient;
  capture: MediaCapture;
  sinks: ReadonlyMap<EventKind, EventSink>;
  onControl: (event: ControlEvent, session: RecordingSession) => void;
  now?: () => Date;
}

/**
 * One active capture. Data events are counted and written only while
 * `recording` is true; `beginStop()` flips it before any teardown so events
 * that arrive mid-teardown never reach a closing sink.
 */
export class RecordingSession {
  readonly id: string;
  readonly entry: StreamerEntry;
  readonly startedAt: Date;
  readonly client: LiveClient;
  readonly capture: MediaCapture;
  readonly counts: EventCounts = emptyCounts();
  private sinks: ReadonlyMap<EventKind, EventSink>;
  private onControl: RecordingSessionInit['onControl'];
  private now: () => Date;
  private recording = true;
  private sinksClosed = false;

  constructor(init: RecordingSessionInit) {
    this.id = init.id;
    this.entry = init.entry;
    this.startedAt = init.startedAt;
    this.client = init.client;
    this.capture = init.capture;
    this.sinks = init.sinks;
    this.onControl = init.onControl;
    this.now = init.now ?? (() => new Date());

    this.client.on('event', (event) => this.dispatch(event));
  }

  get key(): string {
    return this.entry.key;
  }

  get isRecording(): boolean {
    return this.recording;
  }

  sinkPaths(): Record<string, string> {
    return Object.fromEntries([...this.sinks].map(([kind, sink]) => [kind, sink.path]));
  }

  dispatch(event: LiveEvent): void {
    switch (event.type) {
      case 'connect':
      case 'disconnect':
      case 'streamEnd':
        this.onControl(event, this);
        return;
    }

    if (!this.recording) return;

    const { kind, row } = toEventRecord(event, this.now());
    const sink = this.sinks.get(kind);
    if (!sink) return;
    this.counts[kind]++;
    sink.write(row).catch((err) => {
      // failures after stop began are expected teardown noise
      if (this.recording) {
        logger.warn({ error: errorMessage(err) }, `Failed to write ${kind} event for ${this.entry.username}`);
      }
    });
  }

  /** Fence further writes. Returns false if the stop had already begun. */
  beginStop(): boolean {
    if (!this.recording) return false;
    this.recording = false;
    return true;
  }

  /** Close every sink exactly once; individual failures are logged. */
  async closeSinks(): Promise<void> {
    if (this.sinksClosed) return;
    this.sinksClosed = true;
    const results = await Promise.allSettled([...this.sinks.values()].map((s) => s.close()));
    for (const r of results) {
      if (r.status === 'rejected') {
        logger.warn({ error: errorMessage(r.reason) }, `Failed to close a sink for ${this.entry.username}`);
      }
    }
  }

  durationMinutes(at: Date = this.now()): number {
    return (at.getTime() - this.startedAt.getTime()) / 60_000;
  }
}
