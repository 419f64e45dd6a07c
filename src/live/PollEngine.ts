import { logger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';
import type { LivenessProber, ProbeTarget } from './LivenessProber.js';

export interface PollResult {
  /** Every requested key is present; unfinished probes read as offline. */
  statuses: Map<string, boolean>;
  /** Keys whose probe had not settled when the deadline hit. */
  timedOut: string[];
  durationMs: number;
}

/**
 * Fans the prober out over the roster under one engine-wide deadline. A slow
 * or failing entity never delays or cancels another entity's answer.
 */
export class PollEngine {
  constructor(
    private prober: Pick<LivenessProber, 'isLive'>,
    private deadlineMs: () => number,
    private now: () => number = Date.now,
  ) {}

  async pollAll(targets: readonly ProbeTarget[]): Promise<PollResult> {
    const started = this.now();
    const statuses = new Map<string, boolean>();
    const settled = new Set<string>();
    for (const t of targets) statuses.set(t.key, false);

    const probes = targets.map((target) =>
      this.prober.isLive(target).then(
        (live) => {
          statuses.set(target.key, live);
          settled.add(target.key);
        },
        (err: unknown) => {
          // the prober should not reject; count it as offline anyway
          settled.add(target.key);
          logger.debug({ error: errorMessage(err) }, `Probe for ${target.username} rejected`);
        },
      ),
    );

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      timer = setTimeout(() => resolve('deadline'), this.deadlineMs());
    });

    const outcome = await Promise.race([Promise.all(probes).then(() => 'done' as const), deadline]);
    clearTimeout(timer);

    const timedOut = targets.filter((t) => !settled.has(t.key)).map((t) => t.key);
    if (outcome === 'deadline') {
      logger.warn({ timedOut }, `⚠️  Poll deadline reached, ${timedOut.length} check(s) incomplete and treated as offline`);
      // late answers must not leak into this result
      for (const key of timedOut) statuses.set(key, false);
    }

    return { statuses: new Map(statuses), timedOut, durationMs: this.now() - started };
  }
}
