/**
 * CLI: quotawatch track: record one efficiency row per day and write the
 * day's usage report into the outbox. Meant for a daily scheduled run.
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigError,
  SourceUnavailableError,
  addDays,
  formatDate,
  metricValue,
  parseUsageRecords,
  startOfDay,
  weekWindowFor,
} from '@quotawatch/core';
import type { EngineConfig, RateTable, UsageRecord, WeekAnchor } from '@quotawatch/core';
import { upsertDailyEfficiency } from '@quotawatch/db';
import type { DailyEfficiency } from '@quotawatch/db';
import { buildSnapshot, deepFreeze, formatReport } from '@quotawatch/engine';
import { efficiencyRatio, planDailyUsd } from '@quotawatch/intelligence';
import { MODEL_PRICING, aggregateWindow, dedupeRecords } from '@quotawatch/token-monitor';
import { getFlag, getNumberFlag } from './args.js';
import { createContext, loadCalibrationSafe } from './context.js';
import { usd } from './render.js';

const DEFAULT_TRACK_DAYS = 8;

/** `--days`, a whole number of days ending today. */
export function parseTrackDays(args: string[]): number {
  const days = getNumberFlag(args, '--days') ?? DEFAULT_TRACK_DAYS;
  if (!Number.isInteger(days) || days < 1) {
    throw new ConfigError(`--days must be a whole number of at least 1, got ${days}`);
  }
  return days;
}

/**
 * One row per local day for the `days` days ending today. Days inside the
 * current billing week carry the week's cost as a fraction of the weekly
 * spend baseline.
 */
export function buildDailyRows(
  records: readonly UsageRecord[],
  now: Date,
  days: number,
  config: Pick<EngineConfig, 'planMonthlyUsd' | 'weeklySpendBaselineUsd'>,
  anchor: WeekAnchor,
  rates: RateTable = MODEL_PRICING,
): DailyEfficiency[] {
  if (!Number.isInteger(days) || days < 1) throw new RangeError(`days must be a positive integer, got ${days}`);

  const week = weekWindowFor(now, anchor.anchorDate, anchor.resetHour);
  const weekCost = aggregateWindow(records, week.start, week.end, rates).costUsd;
  const weekFirstDay = formatDate(week.start);
  const weekBudgetPct = weekCost / config.weeklySpendBaselineUsd;

  const rows: DailyEfficiency[] = [];
  const first = addDays(startOfDay(now), -(days - 1));

  for (let i = 0; i < days; i++) {
    const start = addDays(first, i);
    const day = aggregateWindow(records, start, addDays(start, 1), rates);
    const date = formatDate(start);
    const ratio = efficiencyRatio(day.costUsd, day.costUsd > 0 ? 1 : 0, config.planMonthlyUsd).ratio;

    rows.push({
      date,
      apiCostUsd: day.costUsd,
      planProrataUsd: planDailyUsd(config.planMonthlyUsd),
      efficiencyRatio: metricValue(ratio),
      inputTokens: day.tokens.input,
      outputTokens: day.tokens.output,
      cacheReadTokens: day.tokens.cacheRead,
      cacheWriteTokens: day.tokens.cacheWrite,
      modelsUsed: Object.keys(day.byModel).sort(),
      weekBudgetPct: date >= weekFirstDay ? weekBudgetPct : null,
    });
  }

  return rows;
}

export function reportFileName(now: Date): string {
  return `USAGE_REPORT_${formatDate(now)}.md`;
}

export async function runTrack(args: string[]): Promise<void> {
  const days = parseTrackDays(args);
  const ctx = createContext({ configPath: getFlag(args, '--config') });
  const log = ctx.logger.child({ component: 'track' });

  try {
    const now = new Date();
    const lookback = Math.max(days, ctx.engine.config.lookbackDays);
    const since = addDays(startOfDay(now), -(lookback - 1));

    log.info({ source: ctx.source.name, since: since.toISOString() }, 'tracking started');

    let raw: unknown;
    try {
      raw = await ctx.source.fetchUsage(since, AbortSignal.timeout(ctx.engine.config.sourceTimeoutMs));
    } catch (err) {
      throw new SourceUnavailableError(ctx.source.name, 'fetch failed', { cause: err });
    }
    const parsed = parseUsageRecords(raw);
    if ('issues' in parsed) {
      throw new SourceUnavailableError(ctx.source.name, `returned malformed records: ${parsed.issues.slice(0, 3).join('; ')}`);
    }
    const records = dedupeRecords(parsed.records);

    if (records.length === 0) {
      console.log('Source returned no usage; nothing recorded.');
      return;
    }

    const calibration = loadCalibrationSafe(ctx);
    const anchor = calibration ?? ctx.engine.config.defaultAnchor;
    const rows = buildDailyRows(records, now, days, ctx.engine.config, anchor);

    ctx.db.transaction(() => {
      for (const row of rows) upsertDailyEfficiency(ctx.db, row);
    })();
    console.log(`Wrote ${rows.length} rows to ${ctx.config.paths.db}`);

    const snapshot = deepFreeze(buildSnapshot({
      records,
      calibration,
      config: ctx.engine.config,
      now,
      sourceName: ctx.source.name,
    }));

    fs.mkdirSync(ctx.config.paths.outbox, { recursive: true });
    const outPath = path.join(ctx.config.paths.outbox, reportFileName(now));
    fs.writeFileSync(outPath, formatReport(snapshot), 'utf-8');
    console.log(`Report written: ${outPath}`);

    const today = rows[rows.length - 1];
    const ratio = today.efficiencyRatio === null ? 'n/a' : `${today.efficiencyRatio.toFixed(1)}x`;
    console.log(`Today: ${usd(today.apiCostUsd)} API-equiv | ratio ${ratio}`);
    log.info({ rows: rows.length, report: outPath }, 'tracking done');
  } finally {
    ctx.close();
  }
}
