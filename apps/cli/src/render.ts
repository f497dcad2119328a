/**
 * Plain-text frame for the live view and `once`. Pure: everything it shows
 * comes from the snapshot and the clock passed in.
 */

import { formatDateTime, hoursBetween } from '@quotawatch/core';
import type { KpiSnapshot, Metric, RiskBand } from '@quotawatch/core';
import { shortModelName } from '@quotawatch/token-monitor';

export interface RenderOptions {
  color: boolean;
  width?: number;
}

const BAND_COLORS: Record<RiskBand, string> = {
  nominal: '\x1b[32m',   // green
  elevated: '\x1b[33m',  // yellow
  critical: '\x1b[31m',  // red
  unknown: '\x1b[90m',   // grey
};
const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';

export function usd(n: number): string {
  return `$${n.toFixed(2)}`;
}

export function pct(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function bar(fraction: number, width: number): string {
  const clamped = Math.min(Math.max(fraction, 0), 1);
  const filled = Math.round(clamped * width);
  return '#'.repeat(filled) + '.'.repeat(width - filled);
}

function metric(m: Metric<number>, render: (n: number) => string): string {
  if (m.status === 'ok') return render(m.value);
  return m.status === 'uncalibrated' ? 'uncal' : 'n/a';
}

function ageLabel(generatedAt: string, now: Date): string {
  const seconds = Math.max(Math.round(hoursBetween(new Date(generatedAt), now) * 3600), 0);
  return seconds < 60 ? `${seconds}s ago` : `${Math.floor(seconds / 60)}m ago`;
}

export function renderFrame(snapshot: KpiSnapshot | null, now: Date, options: RenderOptions): string {
  const width = options.width ?? 60;
  const paint = (band: RiskBand, text: string): string =>
    options.color ? `${BAND_COLORS[band]}${text}${RESET}` : text;
  const tag = (band: RiskBand): string => paint(band, `[${band.toUpperCase()}]`);
  const heading = (text: string): string => (options.color ? `${BOLD}${text}${RESET}` : text);
  const rule = '-'.repeat(width);

  const out: string[] = [];
  out.push(heading(`QUOTAWATCH  ${formatDateTime(now)}`));
  out.push(rule);

  if (!snapshot) {
    out.push('Waiting for the first refresh...');
    return out.join('\n');
  }

  out.push(`Source: ${snapshot.sourceName} | updated ${ageLabel(snapshot.generatedAt, now)}`);
  if (!snapshot.calibrated) {
    out.push(paint('unknown', 'Uncalibrated: run `quotawatch calibrate` to set caps and baseline'));
  }
  out.push('');

  // ─── Spend & efficiency ──────────────────────────────────
  const { today, rolling7 } = snapshot.efficiency;
  const { day, week } = snapshot.projections;
  out.push(
    `Today     ${usd(snapshot.windows.today.costUsd).padStart(9)}  eff ${metric(today.ratio, (n) => `${n.toFixed(1)}x`).padStart(6)} ${tag(today.band)}  proj ${metric(day.projectedTotal, usd)}`,
  );
  out.push(
    `7-day     ${usd(snapshot.windows.rolling7.costUsd).padStart(9)}  eff ${metric(rolling7.ratio, (n) => `${n.toFixed(1)}x`).padStart(6)} ${tag(rolling7.band)}`,
  );
  out.push(
    `Week      ${usd(snapshot.spend.weekCostUsd).padStart(9)}  pace ${metric(snapshot.spend.pct, pct)} of ${usd(snapshot.spend.baselineUsd)} ${tag(snapshot.spend.band)}  proj ${metric(week.projectedTotal, usd)}${week.confidence === 'low' ? ' (low confidence)' : ''}`,
  );
  if (snapshot.efficiency.baseline) {
    const b = snapshot.efficiency.baseline;
    out.push(`Baseline  ${b.targetRatio.toFixed(1)}x | floor ${b.floorRatio.toFixed(1)}x`);
  }

  // ─── Quota ───────────────────────────────────────────────
  if (snapshot.caps.length > 0) {
    out.push('', heading('Quota'));
    const resets = new Map((snapshot.resets?.resets ?? []).map((r) => [r.cap, r.label]));
    for (const cap of snapshot.caps) {
      out.push(
        `  ${cap.name.padEnd(12)} ${usd(cap.costUsd)} / ${usd(cap.limitUsd)}  ${paint(cap.band, pct(cap.utilization).padStart(6))} ${bar(cap.utilization, 20)}  proj ${metric(cap.projectedUtilization, pct)}  ${resets.get(cap.name) ?? ''}`.trimEnd(),
      );
    }
    if (snapshot.binding.status === 'ok') {
      out.push(
        `  Binding: ${snapshot.binding.value.name} | sprint room ${metric(snapshot.sprintRoomUsd, usd)} | uncapped ${metric(snapshot.uncappedShare, pct)}`,
      );
    }
    if (snapshot.resets?.deadZone) {
      out.push(paint('elevated', `  ${snapshot.resets.label}`));
    }
  }

  // ─── Trend ───────────────────────────────────────────────
  out.push('', heading('Trend (7 days)'));
  const maxCost = Math.max(...snapshot.trend.map((d) => d.costUsd), 0);
  for (const d of snapshot.trend) {
    const fill = maxCost > 0 ? d.costUsd / maxCost : 0;
    out.push(
      `  ${d.date.slice(5)}  ${usd(d.costUsd).padStart(9)}  ${bar(fill, 20)}  ${paint(d.band, metric(d.ratio, (n) => `${n.toFixed(1)}x`))}`,
    );
  }

  // ─── Hourly ──────────────────────────────────────────────
  const maxHour = Math.max(...snapshot.windows.hourly.map((h) => h.costUsd), 0);
  const spark = snapshot.windows.hourly
    .map((h) => (h.costUsd <= 0 ? '.' : h.costUsd >= maxHour / 2 ? '#' : '+'))
    .join('');
  out.push('', `Hourly    ${spark}`);

  const models = snapshot.modelsToday.map(shortModelName);
  out.push(`Models    ${models.length > 0 ? models.join(', ') : 'none today'}`);

  out.push(rule);
  const gateBand: RiskBand = snapshot.gate === 'permit' ? 'nominal' : snapshot.gate === 'deny' ? 'critical' : 'elevated';
  out.push(`Gate: ${paint(gateBand, snapshot.gate.toUpperCase())}`);

  return out.join('\n');
}
