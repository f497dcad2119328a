import type { UsageRecord } from '@quotawatch/core';

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
