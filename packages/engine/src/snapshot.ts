/**
 * Snapshot builder. Pure: the same records, calibration, config and clock
 * always produce the same snapshot.
 */

import {
  GateEvaluator,
  HOUR_MS,
  addDays,
  atHour,
  formatResetLabel,
  gateForBand,
  hoursBetween,
  insufficientData,
  ok,
  startOfDay,
  startOfHour,
  uncalibrated,
} from '@quotawatch/core';
import type {
  Baseline,
  Calibration,
  CapDefinition,
  CapUtilization,
  EfficiencyReading,
  EngineConfig,
  KpiSnapshot,
  Metric,
  RateTable,
  ResetSchedule,
  ResetStatus,
  SpendPace,
  TrendDay,
  UsageRecord,
} from '@quotawatch/core';
import {
  efficiencyRatio,
  isSubsetCap,
  projectPartial,
  projectWeek,
  readCaps,
  selectBindingCap,
  sprintRoom,
  trailingDays,
  uncappedShare,
} from '@quotawatch/intelligence';
import type { BandReference, CapReading } from '@quotawatch/intelligence';
import {
  MODEL_PRICING,
  aggregateAll,
  countActiveDays,
  dailyCosts,
  filterByModels,
  rollingWindow,
} from '@quotawatch/token-monitor';

export interface SnapshotInput {
  records: readonly UsageRecord[];
  calibration: Calibration | null;
  config: EngineConfig;
  now: Date;
  sourceName: string;
  rates?: RateTable;
}

const TREND_DAYS = 7;

interface Evaluators {
  quota: GateEvaluator;
  projection: GateEvaluator;
  spend: GateEvaluator;
  efficiency: GateEvaluator | null;
}

function evaluatorsFor(config: EngineConfig, baseline: Baseline | null): Evaluators {
  const { quota, projection, spend } = config.cutoffs;
  return {
    quota: new GateEvaluator({ ...quota, direction: 'ascending' }),
    projection: new GateEvaluator({ ...projection, direction: 'ascending' }),
    spend: new GateEvaluator({ ...spend, direction: 'ascending' }),
    efficiency: baseline
      ? new GateEvaluator({ warn: baseline.targetRatio, abort: baseline.floorRatio, direction: 'descending' })
      : null,
  };
}

function efficiencyReading(
  costUsd: number,
  activeDays: number,
  planMonthlyUsd: number,
  evaluator: GateEvaluator | null,
): EfficiencyReading {
  const result = efficiencyRatio(costUsd, activeDays, planMonthlyUsd);
  if (!evaluator) return { ...result, ratio: uncalibrated(), band: 'unknown' };
  return { ...result, band: evaluator.bandOf(result.ratio) };
}

/**
 * Reserve held back for scheduled jobs: a share of the all-models cap,
 * whichever cap happens to bind.
 */
function scheduledReserveUsd(caps: readonly CapDefinition[], binding: CapUtilization, reservePct: number): number {
  const overall = caps.find((cap) => !isSubsetCap(cap));
  return (overall ? overall.weeklyLimitUsd : binding.limitUsd) * reservePct;
}

/**
 * Next reset per cap, plus the dead zone: the stretch after the earliest
 * cap has reset and before the latest one does.
 */
export function resetSchedule(readings: readonly CapReading[], now: Date): ResetSchedule | null {
  if (readings.length === 0) return null;

  const resets: ResetStatus[] = readings.map((r) => ({
    cap: r.cap.name,
    nextResetAt: r.window.end.toISOString(),
    hoursUntil: hoursBetween(now, r.window.end),
    label: formatResetLabel(r.window.end, now),
  }));

  let earliest = readings[0];
  let latest = readings[0];
  for (const r of readings) {
    if (r.cap.resetHour < earliest.cap.resetHour) earliest = r;
    if (r.cap.resetHour > latest.cap.resetHour) latest = r;
  }

  let deadZone = false;
  if (latest.cap.resetHour > earliest.cap.resetHour) {
    const cycleDay = addDays(startOfDay(earliest.window.start), -Math.floor(earliest.cap.resetHour / 24));
    deadZone = now.getTime() < atHour(cycleDay, latest.cap.resetHour).getTime();
  }

  const pending = resets.find((r) => r.cap === latest.cap.name);
  const soonest = resets.reduce((a, b) => (b.hoursUntil < a.hoursUntil ? b : a));
  const label = deadZone && pending
    ? `dead zone: ${pending.cap} ${pending.label}`
    : `${soonest.cap} ${soonest.label}`;

  return { resets, deadZone, label };
}

export function buildSnapshot(input: SnapshotInput): KpiSnapshot {
  const { records, calibration, config, now, sourceName } = input;
  const rates = input.rates ?? MODEL_PRICING;
  const anchor = calibration ?? config.defaultAnchor;
  const gates = evaluatorsFor(config, calibration?.baseline ?? null);

  const windows = aggregateAll(records, now, anchor, rates);

  // ─── Efficiency & trend ────────────────────────────────────
  const trendCosts = dailyCosts(records, rollingWindow(now, TREND_DAYS).start, TREND_DAYS, rates);
  const trend: TrendDay[] = trendCosts.map((day) => {
    const reading = efficiencyReading(day.costUsd, day.costUsd > 0 ? 1 : 0, config.planMonthlyUsd, gates.efficiency);
    return { ...day, ratio: reading.ratio, band: reading.band };
  });

  const efficiency = {
    today: efficiencyReading(
      windows.today.costUsd,
      windows.today.costUsd > 0 ? 1 : 0,
      config.planMonthlyUsd,
      gates.efficiency,
    ),
    rolling7: efficiencyReading(
      windows.rolling7.costUsd,
      countActiveDays(trendCosts),
      config.planMonthlyUsd,
      gates.efficiency,
    ),
    baseline: calibration?.baseline ?? null,
  };

  // ─── Spend pace ────────────────────────────────────────────
  const baselineUsd = config.weeklySpendBaselineUsd;
  const spendPct: Metric<number> = !calibration
    ? uncalibrated()
    : baselineUsd > 0
      ? ok(windows.billingWeek.costUsd / baselineUsd)
      : insufficientData('weekly spend baseline is zero');
  const spend: SpendPace = {
    weekCostUsd: windows.billingWeek.costUsd,
    baselineUsd,
    pct: spendPct,
    band: gates.spend.bandOf(spendPct),
  };

  // ─── Caps ──────────────────────────────────────────────────
  const readings = calibration
    ? readCaps(records, calibration.caps, now, calibration.anchorDate, rates)
    : [];

  const caps: CapUtilization[] = readings.map((r) => {
    const band = gates.quota.band(r.utilization);
    const projection = projectWeek({
      window: r.window,
      costSoFar: r.costUsd,
      now,
      trailing: trailingDays(filterByModels(records, r.cap.models), r.window, now, config.runRateDays, rates),
      reference: { evaluator: gates.projection, referenceUsd: r.cap.weeklyLimitUsd },
    });
    const projectedUtilization: Metric<number> = projection.projectedTotal.status === 'ok'
      ? ok(projection.projectedTotal.value / r.cap.weeklyLimitUsd)
      : projection.projectedTotal;

    return {
      name: r.cap.name,
      limitUsd: r.cap.weeklyLimitUsd,
      costUsd: r.costUsd,
      utilization: r.utilization,
      windowStart: r.window.start.toISOString(),
      windowEnd: r.window.end.toISOString(),
      band,
      gate: gateForBand(band),
      projection,
      projectedUtilization,
    };
  });

  const bindingCap = selectBindingCap(caps);
  const binding: Metric<CapUtilization> = !calibration
    ? uncalibrated()
    : bindingCap
      ? ok(bindingCap)
      : insufficientData('no caps defined');

  const sprintRoomUsd: Metric<number> = !calibration
    ? uncalibrated()
    : bindingCap
      ? ok(sprintRoom(
        bindingCap,
        config.cutoffs.quota.warn,
        scheduledReserveUsd(calibration.caps, bindingCap, config.scheduledReservePct),
      ))
      : insufficientData('no caps defined');

  // ─── Projections ───────────────────────────────────────────
  const weekWindow = {
    start: new Date(windows.billingWeek.start),
    end: new Date(windows.billingWeek.end),
  };
  const dailyBaselineUsd = baselineUsd / 7;
  const hourStart = startOfHour(now);
  const spendReference = (referenceUsd: number): BandReference | undefined =>
    calibration ? { evaluator: gates.spend, referenceUsd } : undefined;

  const projections = {
    week: projectWeek({
      window: weekWindow,
      costSoFar: windows.billingWeek.costUsd,
      now,
      trailing: trailingDays(records, weekWindow, now, config.runRateDays, rates),
      reference: spendReference(baselineUsd),
    }),
    day: projectPartial(
      'day',
      windows.today.costUsd,
      rollingWindow(now, 1),
      now,
      config.minElapsedFraction,
      spendReference(dailyBaselineUsd),
    ),
    hour: projectPartial(
      'hour',
      windows.hourly[now.getHours()].costUsd,
      { start: hourStart, end: new Date(hourStart.getTime() + HOUR_MS) },
      now,
      config.minElapsedFraction,
      spendReference(dailyBaselineUsd / 24),
    ),
  };

  return {
    generatedAt: now.toISOString(),
    calibrated: calibration !== null,
    calibratedAt: calibration?.calibratedAt ?? null,
    sourceName,
    windows,
    trend,
    modelsToday: Object.keys(windows.today.byModel).sort(),
    caps,
    binding,
    sprintRoomUsd,
    uncappedShare: calibration ? uncappedShare(windows.billingWeek, calibration.caps) : uncalibrated(),
    efficiency,
    spend,
    projections,
    resets: resetSchedule(readings, now),
    gate: bindingCap ? bindingCap.gate : 'warn',
  };
}

/** Freeze an object graph in place. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object') {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
