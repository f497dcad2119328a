/**
 * Quota & efficiency calculator: cost subject to each cap, unclamped
 * utilization, binding-cap selection and value-per-dollar ratios.
 */

import {
  InvalidCalibrationError,
  insufficientData,
  ok,
  weekWindowFor,
} from '@quotawatch/core';
import type {
  CapDefinition,
  Metric,
  RateTable,
  TimeWindow,
  UsageRecord,
  WindowAggregate,
} from '@quotawatch/core';
import {
  MODEL_PRICING,
  aggregateWindow,
  filterByModels,
  matchesModels,
} from '@quotawatch/token-monitor';
import type { CapReading, EfficiencyResult } from './types.js';

const DAYS_PER_PLAN_MONTH = 30;
const MAX_OBSERVED_PCT = 1000;

/** The cap's own billing week: its reset hour counted from the anchor weekday. */
export function capWindow(cap: CapDefinition, now: Date, anchorDate: string): TimeWindow {
  return weekWindowFor(now, anchorDate, cap.resetHour);
}

export function isSubsetCap(cap: CapDefinition): boolean {
  return (cap.models?.length ?? 0) > 0;
}

export function costSubjectToCap(window: WindowAggregate, cap: CapDefinition): number {
  let cost = 0;
  for (const [model, totals] of Object.entries(window.byModel)) {
    if (matchesModels(model, cap.models)) cost += totals.costUsd;
  }
  return cost;
}

/** cost / limit, never clamped: a week at 3x the cap reports 3.0. */
export function utilization(costUsd: number, limitUsd: number): number {
  if (!(limitUsd > 0)) throw new RangeError(`Cap limit must be positive, got ${limitUsd}`);
  return costUsd / limitUsd;
}

export function readCaps(
  records: readonly UsageRecord[],
  caps: readonly CapDefinition[],
  now: Date,
  anchorDate: string,
  rates: RateTable = MODEL_PRICING,
): CapReading[] {
  return caps.map((cap) => {
    const window = capWindow(cap, now, anchorDate);
    const aggregate = aggregateWindow(filterByModels(records, cap.models), window.start, window.end, rates);
    const costUsd = costSubjectToCap(aggregate, cap);
    return { cap, window, aggregate, costUsd, utilization: utilization(costUsd, cap.weeklyLimitUsd) };
  });
}

/** Highest utilization wins; on a tie the cap declared first wins. */
export function selectBindingCap<T extends { utilization: number }>(readings: readonly T[]): T | null {
  let binding: T | null = null;
  for (const r of readings) {
    if (binding === null || r.utilization > binding.utilization) binding = r;
  }
  return binding;
}

export function planDailyUsd(planMonthlyUsd: number): number {
  return planMonthlyUsd / DAYS_PER_PLAN_MONTH;
}

/**
 * Value extracted per subscription dollar: API-equivalent cost over the
 * plan's pro-rated price for the active days in the period.
 */
export function efficiencyRatio(
  costUsd: number,
  activeDays: number,
  planMonthlyUsd: number,
): EfficiencyResult {
  const referenceUsd = planDailyUsd(planMonthlyUsd) * activeDays;
  if (!(referenceUsd > 0)) {
    return {
      costUsd,
      referenceUsd: 0,
      activeDays,
      ratio: insufficientData(activeDays === 0 ? 'no active days in period' : 'plan cost is zero'),
    };
  }
  return { costUsd, referenceUsd, activeDays, ratio: ok(costUsd / referenceUsd) };
}

/**
 * Dollars left on a cap before its warn cutoff, after holding back
 * `reserveUsd` for scheduled jobs. Never negative.
 */
export function sprintRoom(
  cap: { limitUsd: number; costUsd: number },
  warnCutoff: number,
  reserveUsd: number,
): number {
  return Math.max(cap.limitUsd * warnCutoff - cap.costUsd - reserveUsd, 0);
}

/**
 * Share of the week's cost that no subset cap covers (e.g. the Haiku share
 * when the only subset cap is Sonnet-only).
 */
export function uncappedShare(week: WindowAggregate, caps: readonly CapDefinition[]): Metric<number> {
  const subsets = caps.filter(isSubsetCap);
  if (subsets.length === 0) return insufficientData('no model-subset caps defined');
  if (week.costUsd <= 0) return insufficientData('no cost this week');

  let covered = 0;
  for (const [model, totals] of Object.entries(week.byModel)) {
    if (subsets.some((cap) => matchesModels(model, cap.models))) covered += totals.costUsd;
  }
  return ok((week.costUsd - covered) / week.costUsd);
}

/**
 * Back out a cap's weekly limit from the percentage the provider's usage
 * page shows for it: limit = window cost / (pct / 100).
 */
export function calibrateCapFromUsage(
  cap: CapDefinition,
  windowCostUsd: number,
  observedPct: number,
): CapDefinition {
  if (!(observedPct > 0 && observedPct <= MAX_OBSERVED_PCT)) {
    throw new InvalidCalibrationError([`${cap.name}: observed percentage must be in (0, ${MAX_OBSERVED_PCT}], got ${observedPct}`]);
  }
  if (!(windowCostUsd > 0)) {
    throw new InvalidCalibrationError([`${cap.name}: no cost recorded in the current window to calibrate against`]);
  }
  return { ...cap, weeklyLimitUsd: Math.round((windowCostUsd / (observedPct / 100)) * 100) / 100 };
}
