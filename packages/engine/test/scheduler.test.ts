import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ConfigError, SourceUnavailableError } from '@quotawatch/core';
import type { KpiSnapshot } from '@quotawatch/core';
import type { RefreshOutcome } from '../src/engine.js';
import { DualCadenceScheduler } from '../src/scheduler.js';

const UNAVAILABLE: RefreshOutcome = {
  status: 'source-unavailable',
  error: new SourceUnavailableError('fake', 'down'),
  snapshot: null,
};

function fakeEngine(refresh: () => Promise<RefreshOutcome> = async () => UNAVAILABLE) {
  return {
    refreshes: 0,
    peek: (): KpiSnapshot | null => null,
    refresh() {
      this.refreshes++;
      return refresh();
    },
  };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('DualCadenceScheduler', () => {
  it('draws on the fast cadence and refreshes on the slow one', async () => {
    const engine = fakeEngine();
    const ticks: Array<KpiSnapshot | null> = [];
    const scheduler = new DualCadenceScheduler({
      engine,
      tickMs: 1000,
      refreshMs: 2000,
      onTick: (snapshot) => ticks.push(snapshot),
    });

    await scheduler.start();
    expect(engine.refreshes).toBe(1);
    expect(ticks).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(4000);
    expect(ticks).toHaveLength(5);
    expect(engine.refreshes).toBe(3);

    scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    await vi.advanceTimersByTimeAsync(4000);
    expect(ticks).toHaveLength(5);
    expect(engine.refreshes).toBe(3);
  });

  it('reports every outcome, failed ones included', async () => {
    const outcomes: RefreshOutcome[] = [];
    const scheduler = new DualCadenceScheduler({
      engine: fakeEngine(),
      tickMs: 1000,
      refreshMs: 60_000,
      onTick: () => undefined,
      onRefresh: (o) => outcomes.push(o),
    });

    await scheduler.start();
    scheduler.stop();
    expect(outcomes).toEqual([UNAVAILABLE]);
  });

  it('keeps running when a refresh throws', async () => {
    const scheduler = new DualCadenceScheduler({
      engine: fakeEngine(async () => {
        throw new Error('unexpected');
      }),
      tickMs: 1000,
      refreshMs: 60_000,
      onTick: () => undefined,
    });

    await expect(scheduler.refreshOnce()).resolves.toBeNull();
    await scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    scheduler.stop();
  });

  it('survives a throwing tick handler', async () => {
    let calls = 0;
    const scheduler = new DualCadenceScheduler({
      engine: fakeEngine(),
      tickMs: 1000,
      refreshMs: 60_000,
      onTick: () => {
        calls++;
        throw new Error('render failed');
      },
    });

    await scheduler.start();
    await vi.advanceTimersByTimeAsync(2000);
    expect(calls).toBe(3);
    scheduler.stop();
  });

  it('rejects a non-positive cadence', () => {
    expect(() => new DualCadenceScheduler({
      engine: fakeEngine(),
      tickMs: 0,
      refreshMs: 1000,
      onTick: () => undefined,
    })).toThrow(ConfigError);
  });
});
