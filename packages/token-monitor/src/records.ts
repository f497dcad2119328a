import { startOfHour } from '@quotawatch/core';
import type { UsageRecord } from '@quotawatch/core';

export function recordTime(record: UsageRecord): number {
  return Date.parse(record.timestamp);
}

/** Hour-truncated timestamp + model: one record per model per hour. */
export function recordKey(record: UsageRecord): string {
  return `${startOfHour(new Date(recordTime(record))).toISOString()}|${record.model}`;
}

/**
 * Collapse overlapping fetches. The later occurrence of a key wins, since a
 * source resends an hour when it corrects it. Output is frozen and ordered by
 * time, then model.
 */
export function dedupeRecords(records: readonly UsageRecord[]): UsageRecord[] {
  const byKey = new Map<string, UsageRecord>();
  for (const record of records) {
    byKey.set(recordKey(record), Object.freeze({ ...record }));
  }

  return [...byKey.values()].sort(
    (a, b) => recordTime(a) - recordTime(b) || a.model.localeCompare(b.model),
  );
}

export function matchesModels(model: string, prefixes?: readonly string[]): boolean {
  if (!prefixes || prefixes.length === 0) return true;
  return prefixes.some((p) => model.startsWith(p));
}

export function filterByModels(
  records: readonly UsageRecord[],
  prefixes?: readonly string[],
): UsageRecord[] {
  return records.filter((r) => matchesModels(r.model, prefixes));
}
