import { readFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';

export const STOP_FILE = 'STOP';
export const PAUSE_FILE = 'PAUSE';
export const DEFAULT_PAUSE_SECONDS = 60;

export type ControlSignal =
  | { type: 'stop'; reason: string }
  | { type: 'pause'; seconds: number };

/** Integer seconds from the pause file body; anything else means the default. */
export function parsePauseSeconds(text: string): number {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return DEFAULT_PAUSE_SECONDS;
  const seconds = Number.parseInt(trimmed, 10);
  return seconds > 0 ? seconds : DEFAULT_PAUSE_SECONDS;
}

/**
 * Out-of-band requests through sentinel files in one directory. Files are
 * consumed (deleted) as soon as they are seen.
 */
export class ControlSignals {
  constructor(private directory: () => string) {}

  get stopPath(): string {
    return join(this.directory(), STOP_FILE);
  }

  get pausePath(): string {
    return join(this.directory(), PAUSE_FILE);
  }

  /** Stop, if present, comes first so a simultaneous pause never delays shutdown. */
  async poll(): Promise<ControlSignal[]> {
    const signals: ControlSignal[] = [];

    const stopText = await this.consume(this.stopPath);
    if (stopText !== null) {
      signals.push({ type: 'stop', reason: stopText.trim() || 'stop file' });
    }

    const pauseText = await this.consume(this.pausePath);
    if (pauseText !== null) {
      signals.push({ type: 'pause', seconds: parsePauseSeconds(pauseText) });
    }

    return signals;
  }

  /** Read-then-delete. Null when the file does not exist. */
  private async consume(path: string): Promise<string | null> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      logger.warn({ error: errorMessage(err) }, `Could not read control file ${path}`);
      return null;
    }
    try {
      await unlink(path);
    } catch (err) {
      if (!isNotFound(err)) {
        logger.warn({ error: errorMessage(err) }, `Could not remove control file ${path}`);
      }
    }
    return text;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
