import { describe, it, expect } from 'vitest';
import { InvalidCalibrationError } from '@quotawatch/core';
import { buildUpdate, formatCalibration, parseCapSpec, parseObservations } from '../src/calibrate.js';

describe('parseCapSpec', () => {
  it('reads a bare limit', () => {
    expect(parseCapSpec('all-models=500')).toEqual({ name: 'all-models', weeklyLimitUsd: 500, resetHour: 0 });
  });

  it('reads reset hour and model prefixes', () => {
    expect(parseCapSpec('sonnet=300@26:claude-sonnet, claude-3-5-sonnet')).toEqual({
      name: 'sonnet',
      weeklyLimitUsd: 300,
      resetHour: 26,
      models: ['claude-sonnet', 'claude-3-5-sonnet'],
    });
  });

  it('rejects a spec without a name', () => {
    expect(() => parseCapSpec('=500')).toThrow(InvalidCalibrationError);
    expect(() => parseCapSpec('500')).toThrow(InvalidCalibrationError);
  });
});

describe('parseObservations', () => {
  it('pairs --cap with --pct', () => {
    expect(parseObservations(['--cap', 'sonnet', '--pct', '45', '--cap', 'all-models', '--pct', '12.5'])).toEqual([
      { capName: 'sonnet', observedPct: 45 },
      { capName: 'all-models', observedPct: 12.5 },
    ]);
  });

  it('rejects unpaired flags', () => {
    expect(() => parseObservations(['--cap', 'sonnet'])).toThrow(
      'Invalid calibration: every --cap needs a matching --pct (got 1 caps, 0 percentages)',
    );
  });
});

describe('buildUpdate', () => {
  it('is empty without calibration flags', () => {
    expect(buildUpdate(['--show'], null)).toEqual({});
  });

  it('collects caps, anchor and a partial baseline', () => {
    const update = buildUpdate(
      ['--set-cap', 'a=100', '--set-cap', 'b=50@8', '--anchor', '2026-02-07', '--reset-hour', '8', '--floor', '10'],
      null,
    );
    expect(update).toEqual({
      caps: [
        { name: 'a', weeklyLimitUsd: 100, resetHour: 0 },
        { name: 'b', weeklyLimitUsd: 50, resetHour: 8 },
      ],
      anchorDate: '2026-02-07',
      resetHour: 8,
      baseline: { targetRatio: 15.5, floorRatio: 10 },
    });
  });
});

describe('formatCalibration', () => {
  it('shows where a derived limit came from', () => {
    const text = formatCalibration({
      anchorDate: '2026-02-07',
      resetHour: 0,
      caps: [
        { name: 'all-models', weeklyLimitUsd: 500, resetHour: 0 },
        { name: 'sonnet', weeklyLimitUsd: 300, resetHour: 26, models: ['claude-sonnet'] },
      ],
      baseline: { targetRatio: 15.5, floorRatio: 12 },
      calibratedAt: '2026-02-14T10:30:00.000Z',
      provenance: { sonnet: { observedPct: 45, windowCostUsd: 135, calibratedAt: '2026-02-14T10:30:00.000Z' } },
    });

    expect(text.split('\n')).toEqual([
      'Calibrated: 2026-02-14 10:30',
      'Week anchor: 2026-02-07 (weekday), reset hour 0',
      'Baseline: 15.5x | floor 12x',
      'Caps:',
      '  all-models: $500.00/week, reset +0h, all models',
      '  sonnet: $300.00/week, reset +26h, claude-sonnet (from 45% of $135.00)',
    ]);
  });
});
