/**
 * Time window aggregator. Every window is a full recompute over the records
 * handed in; nothing is updated incrementally, so a late or corrected record
 * simply shows up on the next refresh.
 */

import {
  addDays,
  formatDate,
  startOfDay,
  weekWindowFor,
} from '@quotawatch/core';
import type {
  DayCost,
  HourBucket,
  RateTable,
  UsageRecord,
  WeekAnchor,
  WindowAggregate,
} from '@quotawatch/core';
import { MODEL_PRICING, recordCost } from './rates.js';
import { recordTime } from './records.js';
import type { AggregatedWindows } from './types.js';

function emptyAggregate(start: Date, end: Date): WindowAggregate {
  return {
    start: start.toISOString(),
    end: end.toISOString(),
    costUsd: 0,
    tokens: { input: 0, output: 0, cacheWrite: 0, cacheRead: 0 },
    recordCount: 0,
    byModel: {},
  };
}

function inWindow(record: UsageRecord, start: Date, end: Date): boolean {
  const t = recordTime(record);
  return t >= start.getTime() && t < end.getTime();
}

/** Aggregate records falling in [start, end). No records gives a zero aggregate. */
export function aggregateWindow(
  records: readonly UsageRecord[],
  start: Date,
  end: Date,
  rates: RateTable = MODEL_PRICING,
): WindowAggregate {
  const agg = emptyAggregate(start, end);

  for (const r of records) {
    if (!inWindow(r, start, end)) continue;
    const cost = recordCost(r, rates);

    agg.costUsd += cost;
    agg.tokens.input += r.inputTokens;
    agg.tokens.output += r.outputTokens;
    agg.tokens.cacheWrite += r.cacheWriteTokens;
    agg.tokens.cacheRead += r.cacheReadTokens;
    agg.recordCount++;

    const model = agg.byModel[r.model] ?? { costUsd: 0, recordCount: 0 };
    model.costUsd += cost;
    model.recordCount++;
    agg.byModel[r.model] = model;
  }

  return agg;
}

/** 24 contiguous local-hour buckets for the day containing `day`; empty hours are zero. */
export function hourlyBreakdown(
  records: readonly UsageRecord[],
  day: Date,
  rates: RateTable = MODEL_PRICING,
): HourBucket[] {
  const start = startOfDay(day);
  const end = addDays(start, 1);
  const buckets: HourBucket[] = Array.from({ length: 24 }, (_, hour) => ({
    hour,
    costUsd: 0,
    recordCount: 0,
  }));

  for (const r of records) {
    if (!inWindow(r, start, end)) continue;
    const bucket = buckets[new Date(recordTime(r)).getHours()];
    bucket.costUsd += recordCost(r, rates);
    bucket.recordCount++;
  }

  return buckets;
}

/**
 * Cost per local calendar day for `days` days starting at `from`'s day.
 * Days with no records are present with zero cost.
 */
export function dailyCosts(
  records: readonly UsageRecord[],
  from: Date,
  days: number,
  rates: RateTable = MODEL_PRICING,
): DayCost[] {
  const first = startOfDay(from);
  const result: DayCost[] = [];
  const index = new Map<string, DayCost>();

  for (let i = 0; i < days; i++) {
    const entry: DayCost = { date: formatDate(addDays(first, i)), costUsd: 0, recordCount: 0 };
    result.push(entry);
    index.set(entry.date, entry);
  }

  const end = addDays(first, days);
  for (const r of records) {
    if (!inWindow(r, first, end)) continue;
    const entry = index.get(formatDate(new Date(recordTime(r))));
    if (!entry) continue;
    entry.costUsd += recordCost(r, rates);
    entry.recordCount++;
  }

  return result;
}

/** Days with recorded cost. Off days do not count. */
export function countActiveDays(days: readonly DayCost[]): number {
  return days.filter((d) => d.costUsd > 0).length;
}

/** The N local calendar days ending with (and including) today. */
export function rollingWindow(now: Date, days: number): { start: Date; end: Date } {
  const tomorrow = addDays(startOfDay(now), 1);
  return { start: addDays(tomorrow, -days), end: tomorrow };
}

export function aggregateAll(
  records: readonly UsageRecord[],
  now: Date,
  anchor: WeekAnchor,
  rates: RateTable = MODEL_PRICING,
): AggregatedWindows {
  const today = rollingWindow(now, 1);
  const r7 = rollingWindow(now, 7);
  const r30 = rollingWindow(now, 30);
  const week = weekWindowFor(now, anchor.anchorDate, anchor.resetHour);

  return {
    today: aggregateWindow(records, today.start, today.end, rates),
    hourly: hourlyBreakdown(records, now, rates),
    rolling7: aggregateWindow(records, r7.start, r7.end, rates),
    rolling30: aggregateWindow(records, r30.start, r30.end, rates),
    billingWeek: aggregateWindow(records, week.start, week.end, rates),
  };
}
