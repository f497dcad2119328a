import { describe, it, expect } from 'vitest';
import { GateEvaluator, InvalidCalibrationError } from '@quotawatch/core';
import type { CapDefinition } from '@quotawatch/core';
import { aggregateWindow } from '@quotawatch/token-monitor';
import {
  calibrateCapFromUsage,
  efficiencyRatio,
  planDailyUsd,
  readCaps,
  selectBindingCap,
  sprintRoom,
  uncappedShare,
  utilization,
} from '../src/quota.js';
import { rec } from './helpers.js';

const ANCHOR = '2026-02-07'; // a Saturday
const NOW = new Date(2026, 1, 14, 18); // Sat 18:00

const ALL: CapDefinition = { name: 'all-models', weeklyLimitUsd: 500, resetHour: 0 };
const SONNET: CapDefinition = { name: 'sonnet', weeklyLimitUsd: 300, resetHour: 0, models: ['claude-sonnet'] };

describe('readCaps', () => {
  const records = [
    rec(new Date(2026, 1, 14, 10), 200, 'claude-sonnet-4-5'),
    rec(new Date(2026, 1, 14, 11), 400, 'claude-opus-4-6'),
    rec(new Date(2026, 1, 13, 11), 999, 'claude-opus-4-6'), // previous week
  ];

  it('counts only the models each cap covers, in its own week', () => {
    const [all, sonnet] = readCaps(records, [ALL, SONNET], NOW, ANCHOR);
    expect(all.costUsd).toBe(600);
    expect(all.utilization).toBeCloseTo(1.2, 10);
    expect(sonnet.costUsd).toBe(200);
    expect(sonnet.utilization).toBeCloseTo(2 / 3, 10);
    expect(all.window.start).toEqual(new Date(2026, 1, 14));
    expect(all.window.end).toEqual(new Date(2026, 1, 21));
  });

  it('binds on the most utilized cap and denies past the abort cutoff', () => {
    const binding = selectBindingCap(readCaps(records, [ALL, SONNET], NOW, ANCHOR));
    expect(binding?.cap.name).toBe('all-models');
    expect(new GateEvaluator({ warn: 0.8, abort: 1.0 }).gate(binding?.utilization ?? 0)).toBe('deny');
  });
});

describe('utilization', () => {
  it('is not clamped', () => {
    expect(utilization(1500, 500)).toBe(3);
  });

  it('rejects a non-positive limit', () => {
    expect(() => utilization(10, 0)).toThrow(RangeError);
  });
});

describe('selectBindingCap', () => {
  it('keeps the first declared cap on a tie', () => {
    const binding = selectBindingCap([
      { name: 'a', utilization: 0.5 },
      { name: 'b', utilization: 0.5 },
    ]);
    expect(binding?.name).toBe('a');
  });

  it('returns null without caps', () => {
    expect(selectBindingCap([])).toBeNull();
  });
});

describe('efficiencyRatio', () => {
  it('divides cost by the plan pro-rated over active days', () => {
    const result = efficiencyRatio(50, 2, 100);
    expect(result.referenceUsd).toBeCloseTo(planDailyUsd(100) * 2, 10);
    expect(result.ratio.status).toBe('ok');
    if (result.ratio.status === 'ok') expect(result.ratio.value).toBeCloseTo(7.5, 10);
  });

  it('has no ratio without active days', () => {
    expect(efficiencyRatio(0, 0, 100).ratio).toEqual({
      status: 'insufficient-data',
      reason: 'no active days in period',
    });
  });
});

describe('sprintRoom', () => {
  it('leaves the reserve below the warn cutoff', () => {
    expect(sprintRoom({ limitUsd: 500, costUsd: 300 }, 0.8, 25)).toBe(75);
  });

  it('takes the reserve in dollars, not as a share of this cap', () => {
    // Sonnet cap at 300 with a reserve sized from a 500 all-models cap.
    expect(sprintRoom({ limitUsd: 300, costUsd: 100 }, 0.8, 25)).toBe(115);
  });

  it('is never negative', () => {
    expect(sprintRoom({ limitUsd: 500, costUsd: 450 }, 0.8, 25)).toBe(0);
  });
});

describe('uncappedShare', () => {
  const week = aggregateWindow(
    [
      rec(new Date(2026, 1, 14, 9), 30, 'claude-sonnet-4-5'),
      rec(new Date(2026, 1, 14, 10), 10, 'claude-haiku-4-5'),
    ],
    new Date(2026, 1, 14),
    new Date(2026, 1, 21),
  );

  it('is the share no subset cap covers', () => {
    expect(uncappedShare(week, [ALL, SONNET])).toEqual({ status: 'ok', value: 0.25 });
  });

  it('needs at least one subset cap', () => {
    expect(uncappedShare(week, [ALL])).toEqual({
      status: 'insufficient-data',
      reason: 'no model-subset caps defined',
    });
  });
});

describe('calibrateCapFromUsage', () => {
  it('backs the limit out of the observed percentage', () => {
    expect(calibrateCapFromUsage(ALL, 123.45, 45)).toEqual({ ...ALL, weeklyLimitUsd: 274.33 });
  });

  it('rejects out-of-range percentages and empty windows', () => {
    expect(() => calibrateCapFromUsage(ALL, 100, 0)).toThrow(InvalidCalibrationError);
    expect(() => calibrateCapFromUsage(ALL, 100, 1001)).toThrow(InvalidCalibrationError);
    expect(() => calibrateCapFromUsage(ALL, 0, 50)).toThrow(InvalidCalibrationError);
  });
});
