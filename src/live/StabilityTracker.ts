export interface StabilityOptions {
  /** Consecutive live samples needed before confirming. */
  threshold: number;
  /** Minimum time between two confirmed actions for the same entity. */
  cooldownMs: number;
  /** Samples older than this are dropped from the trailing window. */
  windowMs: number;
}

export interface Sample {
  at: number;
  live: boolean;
}

export interface StabilityState {
  samples: Sample[];
  consecutiveLive: number;
  consecutiveOffline: number;
  lastActionAt: number | null;
  lastObserved: boolean | null;
}

/**
 * `confirmed_live`: start recording. `offline_observed`: a full run of offline
 * polls, reported for telemetry only; polling never ends a session.
 */
export type StabilitySignal = 'confirmed_live' | 'offline_observed' | null;

export interface ObserveContext {
  now: number;
  /** A session already exists (or is being admitted) for this entity. */
  recording: boolean;
}

/**
 * Debounces the raw per-poll liveness booleans. Each entity gets its own
 * streak counters and trailing sample window, created on first observation.
 */
export class StabilityTracker {
  private states = new Map<string, StabilityState>();

  constructor(private options: StabilityOptions) {}

  configure(options: StabilityOptions): void {
    this.options = options;
  }

  observe(key: string, live: boolean, ctx: ObserveContext): StabilitySignal {
    const state = this.stateFor(key);
    const { threshold, cooldownMs, windowMs } = this.options;

    state.samples.push({ at: ctx.now, live });
    const cutoff = ctx.now - windowMs;
    while (state.samples.length && state.samples[0].at < cutoff) state.samples.shift();

    if (live) {
      state.consecutiveLive = state.lastObserved === true ? state.consecutiveLive + 1 : 1;
      state.consecutiveOffline = 0;
    } else {
      state.consecutiveOffline = state.lastObserved === false ? state.consecutiveOffline + 1 : 1;
      state.consecutiveLive = 0;
    }
    state.lastObserved = live;

    if (live) {
      if (ctx.recording) return null;
      if (state.consecutiveLive < threshold) return null;
      if (state.lastActionAt !== null && ctx.now - state.lastActionAt < cooldownMs) return null;
      state.lastActionAt = ctx.now;
      return 'confirmed_live';
    }

    // Offline only ever surfaces once per run, at the moment it reaches the threshold
    return state.consecutiveOffline === threshold ? 'offline_observed' : null;
  }

  getState(key: string): Readonly<StabilityState> | undefined {
    return this.states.get(key);
  }

  /** Fraction of live samples in the trailing window; null before any sample. */
  liveRatio(key: string): number | null {
    const samples = this.states.get(key)?.samples;
    if (!samples?.length) return null;
    return samples.filter((s) => s.live).length / samples.length;
  }

  forget(key: string): void {
    this.states.delete(key);
  }

  keys(): string[] {
    return [...this.states.keys()];
  }

  private stateFor(key: string): StabilityState {
    let state = this.states.get(key);
    if (!state) {
      state = { samples: [], consecutiveLive: 0, consecutiveOffline: 0, lastActionAt: null, lastObserved: null };
      this.states.set(key, state);
    }
    return state;
  }
}
