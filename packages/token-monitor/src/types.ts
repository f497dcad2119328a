import type { HourBucket, WindowAggregate } from '@quotawatch/core';

export interface AggregatedWindows {
  today: WindowAggregate;
  hourly: HourBucket[];
  rolling7: WindowAggregate;
  rolling30: WindowAggregate;
  billingWeek: WindowAggregate;
}

// ─── Claude JSONL session files ───────────────────────────────

/** One priced assistant turn, after de-duplicating streamed copies. */
export interface TokenEntry {
  model: string;
  timestamp: string;
  input: number;
  output: number;
  cacheCreate: number;
  cacheRead: number;
}

export interface JsonlFileInfo {
  path: string;
  mtimeMs: number;
}
