/**
 * Usage source that backfills from the efficiency_daily history: any day on
 * or after `since` that the live source returned nothing for, but `track`
 * recorded earlier, comes back as one record carrying that day's totals.
 */

import { formatDate, isLocalDate, parseLocalDate } from '@quotawatch/core';
import type { Logger, UsageRecord, UsageRecordSource } from '@quotawatch/core';
import { listDailyEfficiencySince } from '@quotawatch/db';
import type { DailyEfficiency, Database } from '@quotawatch/db';

/** Model name for a backfilled day that used more than one model. */
export const MIXED_MODELS = 'mixed';

/**
 * Stamped at local midnight, so a backfilled day counts towards its own
 * date in daily and rolling windows.
 */
export function recordFromHistory(day: DailyEfficiency): UsageRecord {
  return {
    timestamp: parseLocalDate(day.date).toISOString(),
    model: day.modelsUsed.length === 1 ? day.modelsUsed[0] : MIXED_MODELS,
    inputTokens: day.inputTokens,
    outputTokens: day.outputTokens,
    cacheWriteTokens: day.cacheWriteTokens,
    cacheReadTokens: day.cacheReadTokens,
    costUsd: day.apiCostUsd,
  };
}

export class HistoryFallbackSource implements UsageRecordSource {
  readonly name: string;

  constructor(
    private inner: UsageRecordSource,
    private db: Database.Database,
    private log: Logger,
  ) {
    this.name = inner.name;
  }

  async fetchUsage(since: Date, signal?: AbortSignal): Promise<UsageRecord[]> {
    const live = await this.inner.fetchUsage(since, signal);

    const covered = new Set(live.map((r) => formatDate(new Date(r.timestamp))));
    const missing = listDailyEfficiencySince(this.db, formatDate(since))
      .filter((day) => isLocalDate(day.date) && !covered.has(day.date) && day.apiCostUsd > 0);

    if (missing.length === 0) return live;

    this.log.debug({ days: missing.map((d) => d.date) }, 'filled days from stored history');
    return [...live, ...missing.map(recordFromHistory)];
  }
}
