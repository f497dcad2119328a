import { describe, it, expect } from 'vitest';
import { CcusageUsageSource, formatSinceArg, parseCcusageDaily } from '../src/ccusage-source.js';

const DAILY = JSON.stringify({
  daily: [
    {
      date: '2026-02-13',
      inputTokens: 300,
      outputTokens: 30,
      cacheCreationTokens: 0,
      cacheReadTokens: 0,
      totalCost: 4.5,
      modelBreakdowns: [
        { modelName: 'claude-sonnet-4-5', inputTokens: 200, outputTokens: 20, cacheCreationTokens: 0, cacheReadTokens: 0, cost: 4 },
        { modelName: 'claude-haiku-4-5', inputTokens: 100, outputTokens: 10, cacheCreationTokens: 0, cacheReadTokens: 0, cost: 0.5 },
      ],
    },
    { date: '2026-02-14', inputTokens: 10, outputTokens: 1, cacheCreationTokens: 0, cacheReadTokens: 0, totalCost: 1.25 },
  ],
});

describe('parseCcusageDaily', () => {
  it('emits one record per day and model at local midnight', () => {
    const records = parseCcusageDaily(DAILY);
    expect(records.map((r) => [r.timestamp, r.model, r.costUsd])).toEqual([
      ['2026-02-13T00:00:00.000Z', 'claude-sonnet-4-5', 4],
      ['2026-02-13T00:00:00.000Z', 'claude-haiku-4-5', 0.5],
      ['2026-02-14T00:00:00.000Z', 'unknown', 1.25],
    ]);
  });

  it('throws on malformed output', () => {
    expect(() => parseCcusageDaily('not json')).toThrow('ccusage output is not JSON');
    expect(() => parseCcusageDaily('{"days": []}')).toThrow('Unexpected ccusage output');
  });
});

describe('CcusageUsageSource', () => {
  it('runs the daily report since the given day', async () => {
    const calls: Array<{ command: string; args: string[] }> = [];
    const source = new CcusageUsageSource({ command: 'ccusage-test' }, async (command, args) => {
      calls.push({ command, args });
      return DAILY;
    });

    const records = await source.fetchUsage(new Date(2026, 1, 7, 15));
    expect(calls).toEqual([{ command: 'ccusage-test', args: ['daily', '--json', '--breakdown', '--since', '20260207'] }]);
    expect(records).toHaveLength(3);
    expect(source.name).toBe('ccusage');
  });

  it('formats --since as YYYYMMDD', () => {
    expect(formatSinceArg(new Date(2026, 0, 5))).toBe('20260105');
  });
});
