import { describe, it, expect } from 'vitest';
import { resolveEngineConfig } from '../src/engine.js';
import { formatReport, parseReport, toJSON } from '../src/report.js';
import { buildSnapshot } from '../src/snapshot.js';
import { NOW, WEEK_RECORDS, calibration } from './fakes.js';

const config = resolveEngineConfig();

const calibrated = buildSnapshot({
  records: WEEK_RECORDS,
  calibration: calibration(),
  config,
  now: NOW,
  sourceName: 'fake',
});

describe('formatReport', () => {
  const lines = formatReport(calibrated).split('\n');

  it('opens with the report date', () => {
    expect(lines[0]).toBe('# Usage Report: 2026-02-14');
  });

  it('lists each cap', () => {
    expect(lines).toContain('- Cap all-models: $600.00 of $500.00 (120.0%, critical)');
    expect(lines).toContain('- Cap sonnet: $200.00 of $300.00 (66.7%, nominal)');
  });

  it('raises an alert for a cap past its abort cutoff', () => {
    expect(lines).toContain('CRITICAL: all-models at 120.0% of its weekly cap');
  });

  it('explains metrics it cannot compute', () => {
    const text = formatReport(buildSnapshot({
      records: [],
      calibration: null,
      config,
      now: NOW,
      sourceName: 'fake',
    }));
    const out = text.split('\n');
    expect(out).toContain('- Binding utilization: n/a (uncalibrated)');
    expect(out).toContain('- Efficiency today: n/a (uncalibrated)');
    expect(out).toContain('- Weekly spend pace: n/a (uncalibrated)');
    expect(out).toContain('No alerts');
    expect(parseReport(text).spendPacePct).toBeNull();
  });

  it('shows the spend pace against the weekly baseline', () => {
    expect(lines).toContain('- Weekly spend pace: 1090.9% of $55.00 (critical)');
  });
});

describe('parseReport', () => {
  it('reads back the figures at report precision', () => {
    expect(parseReport(formatReport(calibrated))).toEqual({
      calibrated: true,
      gate: 'deny',
      todayCostUsd: 600,
      rolling7CostUsd: 600,
      rolling30CostUsd: 600,
      weekCostUsd: 600,
      spendPacePct: 1090.9,
      efficiencyToday: 180,
      efficiency7d: 180,
      bindingUtilizationPct: 120,
      sprintRoomUsd: 0,
      uncappedSharePct: 66.7,
      projectedWeekUsd: 4350,
      projectedDayUsd: 800,
      projectedHourUsd: null,
    });
  });

  it('returns nulls for an empty document', () => {
    const fields = parseReport('');
    expect(fields.calibrated).toBe(false);
    expect(fields.gate).toBeNull();
    expect(fields.todayCostUsd).toBeNull();
  });
});

describe('toJSON', () => {
  it('serializes the snapshot', () => {
    const parsed: unknown = JSON.parse(toJSON(calibrated));
    expect(parsed).toMatchObject({ generatedAt: NOW.toISOString(), gate: 'deny', calibrated: true });
  });
});
