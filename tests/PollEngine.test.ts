import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { ProbeTarget } from '../src/live/LivenessProber.js';
import { PollEngine } from '../src/live/PollEngine.js';

const noCreds = { sessionId: null, targetIdc: null };
const targets: ProbeTarget[] = ['alice', 'bob', 'carol'].map((key) => ({ key, username: `@${key}`, credentials: noCreds }));

function delayed(value: boolean, ms: number): Promise<boolean> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

describe('PollEngine', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports every entity when all probes answer', async () => {
    const answers: Record<string, boolean> = { alice: true, bob: false, carol: true };
    const engine = new PollEngine({ isLive: async (t) => answers[t.key] ?? false }, () => 1000);

    const result = await engine.pollAll(targets);
    expect([...result.statuses]).toEqual([['alice', true], ['bob', false], ['carol', true]]);
    expect(result.timedOut).toEqual([]);
  });

  it('reports unfinished probes as offline at the deadline', async () => {
    const engine = new PollEngine({
      isLive: (t) => (t.key === 'bob' ? new Promise<boolean>(() => undefined) : delayed(true, 200)),
    }, () => 1000);

    const pending = engine.pollAll(targets);
    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;

    expect(result.statuses.get('alice')).toBe(true);
    expect(result.statuses.get('bob')).toBe(false);
    expect(result.statuses.get('carol')).toBe(true);
    expect(result.timedOut).toEqual(['bob']);
    expect(result.durationMs).toBe(1000);
  });

  it('does not let a late answer change a returned result', async () => {
    const engine = new PollEngine({
      isLive: (t) => delayed(true, t.key === 'carol' ? 5000 : 10),
    }, () => 1000);

    const pending = engine.pollAll(targets);
    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;
    await vi.advanceTimersByTimeAsync(5000);

    expect(result.statuses.get('carol')).toBe(false);
    expect(result.timedOut).toEqual(['carol']);
  });

  it('isolates a rejecting probe from the others', async () => {
    const engine = new PollEngine({
      isLive: (t) => (t.key === 'alice' ? Promise.reject(new Error('boom')) : Promise.resolve(true)),
    }, () => 1000);

    const result = await engine.pollAll(targets);
    expect(result.statuses.get('alice')).toBe(false);
    expect(result.statuses.get('bob')).toBe(true);
    expect(result.statuses.get('carol')).toBe(true);
    expect(result.timedOut).toEqual([]);
  });

  it('returns an empty map for an empty roster', async () => {
    const isLive = vi.fn(async () => true);
    const engine = new PollEngine({ isLive }, () => 1000);
    const result = await engine.pollAll([]);
    expect(result.statuses.size).toBe(0);
    expect(isLive).not.toHaveBeenCalled();
  });
});
