import { existsSync } from 'node:fs';
import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { toCsvLine } from '../utils/csv.js';
import { formatDateStamp } from '../utils/time.js';
import type { SessionLogEntry, SessionSummaryLog } from './types.js';

export const SESSION_LOG_HEADER = [
  'timestamp', 'username', 'action', 'status', 'duration_minutes',
  'comments_count', 'gifts_count', 'follows_count', 'shares_count', 'joins_count', 'likes_count',
  'tags', 'notes', 'error_message',
] as const;

export function sessionLogRow(entry: SessionLogEntry): (string | number)[] {
  return [
    entry.timestamp.toISOString(),
    entry.username,
    entry.action,
    entry.status,
    Math.round(entry.durationMinutes * 100) / 100,
    entry.counts.comments,
    entry.counts.gifts,
    entry.counts.follows,
    entry.counts.shares,
    entry.counts.joins,
    entry.counts.likes,
    entry.tags.join(';'),
    entry.notes,
    entry.errorMessage,
  ];
}

/**
 * One `monitoring_sessions_YYYYMMDD.csv` per day in the output directory.
 * The directory is read on every write so a reloaded output directory applies.
 */
export class CsvSessionLog implements SessionSummaryLog {
  private chain: Promise<void> = Promise.resolve();

  constructor(private directory: () => string) {}

  pathFor(date: Date): string {
    return join(this.directory(), `monitoring_sessions_${formatDateStamp(date)}.csv`);
  }

  record(entry: SessionLogEntry): Promise<void> {
    const next = this.chain.then(async () => {
      const path = this.pathFor(entry.timestamp);
      await mkdir(this.directory(), { recursive: true });
      const header = existsSync(path) ? '' : toCsvLine(SESSION_LOG_HEADER);
      await appendFile(path, header + toCsvLine(sessionLogRow(entry)), 'utf-8');
    });
    this.chain = next.catch(() => undefined);
    return next;
  }
}
