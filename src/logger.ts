import { resolve } from 'node:path';
import pino, { destination, multistream, type Level } from 'pino';
import { formatDateStamp } from './utils/time.js';

// Each stream passes everything; the logger's own level does the filtering.
const streams = multistream([{ level: 'trace', stream: process.stdout }]);

export const logger = pino(
  {
    // Vitest sets VITEST; keep test output readable
    level: process.env.VITEST === 'true' ? 'silent' : (process.env.LOG_LEVEL ?? 'info'),
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  },
  streams,
);

/** Adds the daily `monitor_YYYYMMDD.log` file next to console output. */
export function addFileTransport(directory: string, date = new Date()): string {
  const filename = resolve(directory, `monitor_${formatDateStamp(date)}.log`);
  // sync so the last lines survive process.exit on a fatal error
  streams.add({ level: 'trace', stream: destination({ dest: filename, mkdir: true, sync: true }) });
  return filename;
}

export function setLogLevel(level: Level): void {
  logger.level = level;
}
