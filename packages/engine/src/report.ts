/**
 * Markdown usage report. Every numeric line is `- Label: value` so that
 * `parseReport` can read the figures back at the precision they were
 * written with: dollars to 2 dp, percents and ratios to 1 dp.
 */

import { formatDate, metricValue } from '@quotawatch/core';
import type { GateDecision, KpiSnapshot, Metric } from '@quotawatch/core';

export interface ReportFields {
  calibrated: boolean;
  gate: GateDecision | null;
  todayCostUsd: number | null;
  rolling7CostUsd: number | null;
  rolling30CostUsd: number | null;
  weekCostUsd: number | null;
  spendPacePct: number | null;
  efficiencyToday: number | null;
  efficiency7d: number | null;
  bindingUtilizationPct: number | null;
  sprintRoomUsd: number | null;
  uncappedSharePct: number | null;
  projectedWeekUsd: number | null;
  projectedDayUsd: number | null;
  projectedHourUsd: number | null;
}

const LABELS = {
  calibrated: 'Calibrated',
  gate: 'Gate',
  todayCostUsd: 'Today cost',
  rolling7CostUsd: 'Rolling 7-day cost',
  rolling30CostUsd: 'Rolling 30-day cost',
  weekCostUsd: 'Billing week cost',
  spendPacePct: 'Weekly spend pace',
  efficiencyToday: 'Efficiency today',
  efficiency7d: 'Efficiency 7-day',
  bindingUtilizationPct: 'Binding utilization',
  sprintRoomUsd: 'Sprint room',
  uncappedSharePct: 'Uncapped share',
  projectedWeekUsd: 'Projected week',
  projectedDayUsd: 'Projected day',
  projectedHourUsd: 'Projected hour',
} as const satisfies Record<keyof ReportFields, string>;

// ─── Formatting ──────────────────────────────────────────────

function usd(n: number): string {
  return `$${n.toFixed(2)}`;
}

function pct(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function ratio(n: number): string {
  return `${n.toFixed(1)}x`;
}

function notAvailable(metric: Metric<unknown>): string {
  if (metric.status === 'uncalibrated') return 'n/a (uncalibrated)';
  if (metric.status === 'insufficient-data') return `n/a (${metric.reason})`;
  return 'n/a';
}

function show(metric: Metric<number>, render: (n: number) => string): string {
  return metric.status === 'ok' && Number.isFinite(metric.value) ? render(metric.value) : notAvailable(metric);
}

function line(label: string, value: string): string {
  return `- ${label}: ${value}`;
}

function alertsFor(s: KpiSnapshot): string[] {
  const alerts: string[] = [];
  const r7 = metricValue(s.efficiency.rolling7.ratio);

  if (s.efficiency.rolling7.band === 'critical' && r7 !== null && s.efficiency.baseline) {
    alerts.push(`WARNING: 7-day efficiency ${ratio(r7)} below floor (${ratio(s.efficiency.baseline.floorRatio)})`);
  }
  if (s.binding.status === 'ok') {
    const b = s.binding.value;
    if (b.band === 'critical') alerts.push(`CRITICAL: ${b.name} at ${pct(b.utilization)} of its weekly cap`);
    else if (b.band === 'elevated') alerts.push(`WARNING: ${b.name} at ${pct(b.utilization)} of its weekly cap`);
    if (b.projection.band === 'critical') {
      alerts.push(`WARNING: ${b.name} projected to reach ${show(b.projectedUtilization, pct)} by reset`);
    }
  }
  if (s.resets?.deadZone) alerts.push(`NOTE: ${s.resets.label}`);
  return alerts;
}

export function formatReport(s: KpiSnapshot): string {
  const generated = new Date(s.generatedAt);
  const binding = s.binding.status === 'ok' ? s.binding.value : null;
  const out: string[] = [];

  out.push(`# Usage Report: ${formatDate(generated)}`, '');
  out.push(line('Generated', s.generatedAt));
  out.push(line('Source', s.sourceName));
  out.push(line(LABELS.calibrated, s.calibrated ? `yes (${s.calibratedAt ?? 'unknown'})` : 'no'));
  out.push(line(LABELS.gate, s.gate));

  out.push('', '## Spend');
  out.push(line(LABELS.todayCostUsd, usd(s.windows.today.costUsd)));
  out.push(line(LABELS.rolling7CostUsd, usd(s.windows.rolling7.costUsd)));
  out.push(line(LABELS.rolling30CostUsd, usd(s.windows.rolling30.costUsd)));
  out.push(line(LABELS.weekCostUsd, usd(s.windows.billingWeek.costUsd)));
  out.push(line(
    LABELS.spendPacePct,
    s.spend.pct.status === 'ok'
      ? `${show(s.spend.pct, pct)} of ${usd(s.spend.baselineUsd)} (${s.spend.band})`
      : notAvailable(s.spend.pct),
  ));

  out.push('', '## Efficiency');
  out.push(line(LABELS.efficiencyToday, show(s.efficiency.today.ratio, ratio)));
  out.push(line(LABELS.efficiency7d, show(s.efficiency.rolling7.ratio, ratio)));
  if (s.efficiency.baseline) {
    out.push(line('Baseline', `${ratio(s.efficiency.baseline.targetRatio)} | Floor: ${ratio(s.efficiency.baseline.floorRatio)}`));
  }

  out.push('', '## Quota');
  out.push(line('Binding cap', binding ? binding.name : notAvailable(s.binding)));
  out.push(line(LABELS.bindingUtilizationPct, binding ? pct(binding.utilization) : notAvailable(s.binding)));
  out.push(line(LABELS.sprintRoomUsd, show(s.sprintRoomUsd, usd)));
  out.push(line(LABELS.uncappedSharePct, show(s.uncappedShare, pct)));
  for (const cap of s.caps) {
    out.push(`- Cap ${cap.name}: ${usd(cap.costUsd)} of ${usd(cap.limitUsd)} (${pct(cap.utilization)}, ${cap.band})`);
  }

  out.push('', '## Projections');
  out.push(line(LABELS.projectedWeekUsd, show(s.projections.week.projectedTotal, usd)));
  out.push(line(LABELS.projectedDayUsd, show(s.projections.day.projectedTotal, usd)));
  out.push(line(LABELS.projectedHourUsd, show(s.projections.hour.projectedTotal, usd)));

  if (s.resets) {
    out.push('', '## Resets');
    for (const r of s.resets.resets) out.push(`- ${r.cap}: ${r.label}`);
  }

  out.push('', '## Models today');
  if (s.modelsToday.length === 0) out.push('- none');
  for (const m of s.modelsToday) out.push(`- ${m}`);

  out.push('', '## Alerts');
  const alerts = alertsFor(s);
  out.push(...(alerts.length > 0 ? alerts : ['No alerts']));

  return out.join('\n') + '\n';
}

export function toJSON(s: KpiSnapshot): string {
  return JSON.stringify(s, null, 2);
}

// ─── Parsing ─────────────────────────────────────────────────

const LINE = /^- ([^:]+): (.*)$/;
const MONEY = /^\$(-?\d+\.\d{2})\b/;
const PERCENT = /^(-?\d+\.\d)%/;
const RATIO = /^(-?\d+\.\d)x\b/;
const GATES: readonly GateDecision[] = ['permit', 'warn', 'deny'];

function readNumber(value: string | undefined, pattern: RegExp): number | null {
  if (value === undefined) return null;
  const match = pattern.exec(value);
  return match ? Number(match[1]) : null;
}

function readGate(value: string | undefined): GateDecision | null {
  return GATES.find((g) => g === value) ?? null;
}

/** Recover the numeric fields of a report written by `formatReport`. */
export function parseReport(text: string): ReportFields {
  const values = new Map<string, string>();
  for (const raw of text.split('\n')) {
    const match = LINE.exec(raw.trim());
    if (match && !values.has(match[1])) values.set(match[1], match[2].trim());
  }
  const get = (key: keyof ReportFields): string | undefined => values.get(LABELS[key]);

  return {
    calibrated: get('calibrated')?.startsWith('yes') ?? false,
    gate: readGate(get('gate')),
    todayCostUsd: readNumber(get('todayCostUsd'), MONEY),
    rolling7CostUsd: readNumber(get('rolling7CostUsd'), MONEY),
    rolling30CostUsd: readNumber(get('rolling30CostUsd'), MONEY),
    weekCostUsd: readNumber(get('weekCostUsd'), MONEY),
    spendPacePct: readNumber(get('spendPacePct'), PERCENT),
    efficiencyToday: readNumber(get('efficiencyToday'), RATIO),
    efficiency7d: readNumber(get('efficiency7d'), RATIO),
    bindingUtilizationPct: readNumber(get('bindingUtilizationPct'), PERCENT),
    sprintRoomUsd: readNumber(get('sprintRoomUsd'), MONEY),
    uncappedSharePct: readNumber(get('uncappedSharePct'), PERCENT),
    projectedWeekUsd: readNumber(get('projectedWeekUsd'), MONEY),
    projectedDayUsd: readNumber(get('projectedDayUsd'), MONEY),
    projectedHourUsd: readNumber(get('projectedHourUsd'), MONEY),
  };
}
