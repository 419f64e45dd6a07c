import { logger } from '../logger.js';
import type { Credentials } from '../roster/types.js';
import type { LiveStatusSource } from '../tiktok/types.js';
import { errorMessage } from '../utils/errors.js';
import { sleep, withTimeout } from '../utils/time.js';

export interface ProbeTarget {
  key: string;
  username: string;
  credentials: Credentials;
}

export interface ProbeOptions {
  timeoutMs: number;
  /** Extra attempts after the first one. */
  retries: number;
  /** Wait before retry n is `backoffMs * n`. */
  backoffMs: number;
}

/**
 * Asks the status source whether one account is on air. Timeouts, transport
 * errors and malformed answers are retried, then collapse to `false`: the
 * prober never throws and never reports "unknown".
 */
export class LivenessProber {
  constructor(
    private source: LiveStatusSource,
    private options: () => ProbeOptions,
  ) {}

  async isLive(target: ProbeTarget): Promise<boolean> {
    const { timeoutMs, retries, backoffMs } = this.options();

    for (let attempt = 0; attempt <= retries; attempt++) {
      if (attempt > 0) await sleep(backoffMs * attempt);

      const controller = new AbortController();
      try {
        return await withTimeout(
          this.source.isLive(target.username, target.credentials, controller.signal),
          timeoutMs,
          `Live check for ${target.username}`,
        );
      } catch (err) {
        controller.abort();
        logger.debug({ error: errorMessage(err) }, `Live check failed for ${target.username} (attempt ${attempt + 1}/${retries + 1})`);
      }
    }
    return false;
  }
}
