import type { CsvValue } from '../utils/csv.js';

export const EVENT_KINDS = ['comments', 'gifts', 'follows', 'shares', 'joins', 'likes'] as const;
export type EventKind = (typeof EVENT_KINDS)[number];
export type EventCounts = Record<EventKind, number>;

export function emptyCounts(): EventCounts {
  return { comments: 0, gifts: 0, follows: 0, shares: 0, joins: 0, likes: 0 };
}

export type StopReason =
  | 'official_end'
  | 'disconnect_confirmed'
  | 'removed_from_config'
  | 'control_stop'
  | 'shutdown'
  | 'manual';

/** Append-only destination for one event kind of one session. */
export interface EventSink {
  readonly path: string;
  write(row: readonly CsvValue[]): Promise<void>;
  close(): Promise<void>;
}

export type SinkOpener = (path: string, header: readonly string[]) => Promise<EventSink>;

/** Writes one media file for a connected session. */
export interface MediaCapture {
  readonly filePath: string;
  start(streamUrl: string): Promise<void>;
  stop(): Promise<void>;
  isCapturing(): boolean;
  /** Why the capture ended without being asked to; null while running or after stop(). */
  failure(): string | null;
}

export type CaptureFactory = (filePath: string) => MediaCapture;

export type SessionAction = 'recording_attempt' | 'recording_started' | `recording_stopped_${StopReason}`;

export interface SessionLogEntry {
  timestamp: Date;
  username: string;
  action: SessionAction;
  status: 'success' | 'failed';
  durationMinutes: number;
  counts: EventCounts;
  tags: readonly string[];
  notes: string;
  errorMessage: string;
}

export interface SessionSummaryLog {
  record(entry: SessionLogEntry): Promise<void>;
}

export interface SessionSummary {
  key: string;
  sessionId: string;
  username: string;
  reason: StopReason;
  durationMinutes: number;
  counts: EventCounts;
  videoFile: string;
  /** Set when the video capture died before the session stopped. */
  captureError: string | null;
}
