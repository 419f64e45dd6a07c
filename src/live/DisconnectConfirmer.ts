import { logger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';

export interface PendingDisconnect {
  since: number;
  timer: ReturnType<typeof setTimeout>;
}

export interface DisconnectConfirmerOptions {
  graceMs: () => number;
  /** Fresh liveness probe; expected not to throw. */
  probe: (key: string) => Promise<boolean>;
  /** True while the entity has a session that is still recording. */
  isActive: (key: string) => boolean;
  /** Re-open the dropped protocol connection; false when that failed. */
  reconnect: (key: string) => Promise<boolean>;
  stop: (key: string, reason: 'disconnect_confirmed') => Promise<unknown>;
  now?: () => number;
}

/**
 * Turns a generic connection drop into a deferred, re-probed termination.
 * At most one pending confirmation per entity; the timer is cleared whenever
 * the confirmation becomes moot.
 */
export class DisconnectConfirmer {
  private pending = new Map<string, PendingDisconnect>();
  private now: () => number;

  constructor(private options: DisconnectConfirmerOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Returns true when a new confirmation was scheduled. */
  onDisconnect(key: string): boolean {
    if (!this.options.isActive(key)) return false;
    if (this.pending.has(key)) {
      logger.debug(`Disconnect for ${key} already pending confirmation`);
      return false;
    }

    const graceMs = this.options.graceMs();
    const record: PendingDisconnect = {
      since: this.now(),
      timer: setTimeout(() => {
        this.confirm(key, record).catch((err) => {
          logger.error({ error: errorMessage(err) }, `Disconnect confirmation for ${key} failed`);
        });
      }, graceMs),
    };
    this.pending.set(key, record);
    logger.warn(`⚡ ${key} disconnected, confirming in ${Math.round(graceMs / 1000)}s`);
    return true;
  }

  /** Drop a pending confirmation. Returns true when one existed. */
  cancel(key: string, why = 'cancelled'): boolean {
    const record = this.pending.get(key);
    if (!record) return false;
    clearTimeout(record.timer);
    this.pending.delete(key);
    logger.debug(`Pending disconnect for ${key} ${why}`);
    return true;
  }

  cancelAll(): number {
    const count = this.pending.size;
    for (const key of [...this.pending.keys()]) this.cancel(key, 'cancelled at shutdown');
    return count;
  }

  isPending(key: string): boolean {
    return this.pending.has(key);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  private async confirm(key: string, record: PendingDisconnect): Promise<void> {
    if (this.pending.get(key) !== record) return;

    const live = await this.options.probe(key);

    // cancelled (official end, manual stop, roster removal) while probing
    if (this.pending.get(key) !== record) return;
    this.pending.delete(key);

    if (!this.options.isActive(key)) return;

    if (live) {
      // a dropped connection stays closed until reopened
      if (await this.options.reconnect(key)) {
        logger.info(`🔁 ${key} is live again, connection restored`);
        return;
      }
      if (!this.options.isActive(key)) return;
      logger.warn(`${key} is live but the connection could not be restored, stopping`);
      await this.options.stop(key, 'disconnect_confirmed');
      return;
    }

    const waited = Math.round((this.now() - record.since) / 1000);
    logger.info(`🔴 ${key} still offline ${waited}s after disconnect, stopping`);
    await this.options.stop(key, 'disconnect_confirmed');
  }
}
