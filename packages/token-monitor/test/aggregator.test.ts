import { describe, it, expect } from 'vitest';
import {
  aggregateAll,
  aggregateWindow,
  countActiveDays,
  dailyCosts,
  hourlyBreakdown,
  rollingWindow,
} from '../src/aggregator.js';
import { rec } from './helpers.js';

describe('aggregateWindow', () => {
  const start = new Date(2026, 1, 14);
  const end = new Date(2026, 1, 15);

  it('is half-open: start included, end excluded', () => {
    const agg = aggregateWindow([rec(start, 1), rec(end, 5)], start, end);
    expect(agg.costUsd).toBe(1);
    expect(agg.recordCount).toBe(1);
  });

  it('returns a zero aggregate for no records', () => {
    expect(aggregateWindow([], start, end)).toEqual({
      start: start.toISOString(),
      end: end.toISOString(),
      costUsd: 0,
      tokens: { input: 0, output: 0, cacheWrite: 0, cacheRead: 0 },
      recordCount: 0,
      byModel: {},
    });
  });

  it('splits cost and tokens by model', () => {
    const agg = aggregateWindow(
      [
        rec(new Date(2026, 1, 14, 9), 2, 'claude-sonnet-4-5'),
        rec(new Date(2026, 1, 14, 10), 3, 'claude-sonnet-4-5'),
        rec(new Date(2026, 1, 14, 11), 1, 'claude-haiku-4-5'),
      ],
      start,
      end,
    );
    expect(agg.costUsd).toBe(6);
    expect(agg.tokens.input).toBe(300);
    expect(agg.byModel).toEqual({
      'claude-sonnet-4-5': { costUsd: 5, recordCount: 2 },
      'claude-haiku-4-5': { costUsd: 1, recordCount: 1 },
    });
  });
});

describe('hourlyBreakdown', () => {
  it('always has 24 zero-filled buckets', () => {
    const hours = hourlyBreakdown([rec(new Date(2026, 1, 14, 13, 20), 4)], new Date(2026, 1, 14, 18));
    expect(hours).toHaveLength(24);
    expect(hours[13]).toEqual({ hour: 13, costUsd: 4, recordCount: 1 });
    expect(hours.filter((h) => h.costUsd === 0)).toHaveLength(23);
  });

  it('ignores other days', () => {
    const hours = hourlyBreakdown([rec(new Date(2026, 1, 13, 13), 4)], new Date(2026, 1, 14));
    expect(hours.every((h) => h.costUsd === 0)).toBe(true);
  });
});

describe('dailyCosts', () => {
  it('zero-fills days without records', () => {
    const days = dailyCosts(
      [rec(new Date(2026, 1, 12, 10), 3), rec(new Date(2026, 1, 14, 10), 5)],
      new Date(2026, 1, 12),
      3,
    );
    expect(days).toEqual([
      { date: '2026-02-12', costUsd: 3, recordCount: 1 },
      { date: '2026-02-13', costUsd: 0, recordCount: 0 },
      { date: '2026-02-14', costUsd: 5, recordCount: 1 },
    ]);
    expect(countActiveDays(days)).toBe(2);
  });
});

describe('rolling windows', () => {
  const now = new Date(2026, 1, 14, 18);

  it('covers N local days ending with today', () => {
    expect(rollingWindow(now, 7)).toEqual({ start: new Date(2026, 1, 8), end: new Date(2026, 1, 15) });
  });

  it('aggregateAll rolls every window from one record set', () => {
    const records = [
      rec(new Date(2026, 1, 7, 23), 100),  // before the 7-day window, inside 30
      rec(new Date(2026, 1, 8, 0), 10),    // first hour of the 7-day window
      rec(new Date(2026, 1, 14, 9), 1),    // today
    ];
    const w = aggregateAll(records, now, { anchorDate: '2026-02-07', resetHour: 0 });
    expect(w.today.costUsd).toBe(1);
    expect(w.rolling7.costUsd).toBe(11);
    expect(w.rolling30.costUsd).toBe(111);
    expect(w.billingWeek.costUsd).toBe(1);
    expect(w.hourly[9].costUsd).toBe(1);
  });
});
