import { existsSync } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import { toCsvLine, type CsvValue } from '../utils/csv.js';
import type { EventSink } from './types.js';

/**
 * Append-only CSV file. Writes are chained so rows land in call order even
 * when callers do not await each other.
 */
export class CsvSink implements EventSink {
  private chain: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(readonly path: string, private handle: FileHandle) {}

  /** Opens (or creates) the file; the header is written only to a new file. */
  static async open(path: string, header: readonly string[]): Promise<CsvSink> {
    const isNew = !existsSync(path);
    const handle = await open(path, 'a');
    const sink = new CsvSink(path, handle);
    if (isNew) await sink.write(header);
    return sink;
  }

  write(row: readonly CsvValue[]): Promise<void> {
    if (this.closed) return Promise.reject(new Error(`Sink ${this.path} is closed`));
    const line = toCsvLine(row);
    const next = this.chain.then(async () => {
      await this.handle.write(line, null, 'utf-8');
    });
    // keep the chain alive after a failed write; the caller still sees the rejection
    this.chain = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.chain;
    await this.handle.close();
  }
}

export const openCsvSink = (path: string, header: readonly string[]): Promise<EventSink> => CsvSink.open(path, header);
