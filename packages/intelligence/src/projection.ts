/**
 * Projection engine: extrapolates a partial period to its end.
 * Week: current cost plus a trailing run-rate over active days.
 * Day / hour: cost so far divided by the elapsed fraction.
 */

import {
  DAY_MS,
  HOUR_MS,
  addDays,
  fractionElapsed,
  insufficientData,
  ok,
  startOfDay,
} from '@quotawatch/core';
import type {
  DayCost,
  Projection,
  ProjectionBasis,
  RateTable,
  RiskBand,
  TimeWindow,
  UsageRecord,
} from '@quotawatch/core';
import { MODEL_PRICING, dailyCosts, recordTime } from '@quotawatch/token-monitor';
import type { BandReference, WeekProjectionInput } from './types.js';

function bandFor(projected: number, reference?: BandReference): RiskBand {
  if (!reference || reference.referenceUsd === null || !(reference.referenceUsd > 0)) return 'unknown';
  return reference.evaluator.band(projected / reference.referenceUsd);
}

/**
 * The trailing run-rate window: the last `runRateDays` local days ending
 * today, clipped to the period start. Records before the period start or
 * after `now` are ignored.
 */
export function trailingDays(
  records: readonly UsageRecord[],
  window: TimeWindow,
  now: Date,
  runRateDays: number,
  rates: RateTable = MODEL_PRICING,
): DayCost[] {
  const today = startOfDay(now);
  const windowDay = startOfDay(window.start);
  let first = addDays(today, -(Math.max(runRateDays, 1) - 1));
  if (first.getTime() < windowDay.getTime()) first = windowDay;

  let count = 0;
  for (let d = first; d.getTime() <= today.getTime(); d = addDays(d, 1)) count++;

  const from = window.start.getTime();
  const to = now.getTime();
  const inPeriod = records.filter((r) => {
    const t = recordTime(r);
    return t >= from && t <= to;
  });

  return dailyCosts(inPeriod, first, count, rates);
}

/** Mean cost per active (non-zero) day; null when there are none. */
export function trailingRunRate(days: readonly DayCost[]): number | null {
  const active = days.filter((d) => d.costUsd > 0);
  if (active.length === 0) return null;
  return active.reduce((s, d) => s + d.costUsd, 0) / active.length;
}

/**
 * projected = cost so far + run-rate x remaining days. Without a run-rate
 * the projection is the current partial total, flagged low-confidence.
 */
export function projectWeek(input: WeekProjectionInput): Projection {
  const { window, costSoFar, now, trailing, reference } = input;
  const runRate = trailingRunRate(trailing);
  const remainingDays = Math.max(window.end.getTime() - now.getTime(), 0) / DAY_MS;
  const projected = runRate === null ? costSoFar : costSoFar + runRate * remainingDays;

  return {
    basis: 'billing-week',
    windowStart: window.start.toISOString(),
    windowEnd: window.end.toISOString(),
    elapsedFraction: fractionElapsed(window, now),
    costSoFar,
    runRatePerDay: runRate,
    projectedTotal: ok(projected),
    confidence: runRate === null ? 'low' : 'normal',
    band: bandFor(projected, reference),
  };
}

/**
 * projected = cost so far / elapsed fraction. Below `minElapsedFraction` the
 * result is insufficient data rather than a spike from a tiny denominator.
 */
export function projectPartial(
  basis: Exclude<ProjectionBasis, 'billing-week'>,
  costSoFar: number,
  window: TimeWindow,
  now: Date,
  minElapsedFraction: number,
  reference?: BandReference,
): Projection {
  const elapsedFraction = fractionElapsed(window, now);
  const base = {
    basis,
    windowStart: window.start.toISOString(),
    windowEnd: window.end.toISOString(),
    elapsedFraction,
    costSoFar,
  };

  if (elapsedFraction < minElapsedFraction) {
    return {
      ...base,
      runRatePerDay: null,
      projectedTotal: insufficientData(`only ${(elapsedFraction * 100).toFixed(1)}% of the ${basis} elapsed`),
      confidence: 'low',
      band: 'unknown',
    };
  }

  const projected = costSoFar / elapsedFraction;
  const elapsedHours = (now.getTime() - window.start.getTime()) / HOUR_MS;

  return {
    ...base,
    runRatePerDay: elapsedHours > 0 ? (costSoFar / elapsedHours) * 24 : null,
    projectedTotal: ok(projected),
    confidence: 'normal',
    band: bandFor(projected, reference),
  };
}
