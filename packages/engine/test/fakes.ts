import { DEFAULT_BASELINE } from '@quotawatch/core';
import type {
  Calibration,
  CalibrationStore,
  CapDefinition,
  UsageRecord,
  UsageRecordSource,
} from '@quotawatch/core';

export const NOW = new Date(2026, 1, 14, 18); // Sat 18:00

export const ALL: CapDefinition = { name: 'all-models', weeklyLimitUsd: 500, resetHour: 0 };
export const SONNET: CapDefinition = { name: 'sonnet', weeklyLimitUsd: 300, resetHour: 0, models: ['claude-sonnet'] };

export function calibration(caps: CapDefinition[] = [ALL, SONNET]): Calibration {
  return {
    anchorDate: '2026-02-07',
    resetHour: 0,
    caps,
    baseline: DEFAULT_BASELINE,
    calibratedAt: '2026-02-14T08:00:00.000Z',
  };
}

export function rec(at: Date, costUsd: number, model = 'claude-sonnet-4-5'): UsageRecord {
  return {
    timestamp: at.toISOString(),
    model,
    inputTokens: 100,
    outputTokens: 50,
    cacheWriteTokens: 0,
    cacheReadTokens: 0,
    costUsd,
  };
}

/** Sonnet $200 and Opus $400 on the Saturday the billing week starts. */
export const WEEK_RECORDS: UsageRecord[] = [
  rec(new Date(2026, 1, 14, 10), 200, 'claude-sonnet-4-5'),
  rec(new Date(2026, 1, 14, 11), 400, 'claude-opus-4-6'),
];

export class MemoryCalibrationStore implements CalibrationStore {
  saves = 0;
  failOnLoad: Error | null = null;

  constructor(public value: Calibration | null = null) {}

  load(): Calibration | null {
    if (this.failOnLoad) throw this.failOnLoad;
    return this.value;
  }

  save(calibration: Calibration): void {
    this.saves++;
    this.value = calibration;
  }
}

export class FakeSource implements UsageRecordSource {
  readonly name = 'fake';
  calls = 0;
  lastSignal: AbortSignal | undefined;

  constructor(public fetch: () => Promise<UsageRecord[]>) {}

  fetchUsage(_since: Date, signal?: AbortSignal): Promise<UsageRecord[]> {
    this.calls++;
    this.lastSignal = signal;
    return this.fetch();
  }
}
