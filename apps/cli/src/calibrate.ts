/**
 * CLI: quotawatch calibrate: define caps and baseline, or derive cap limits
 * from the percentages the provider's usage page shows.
 */

import { DEFAULT_BASELINE, InvalidCalibrationError, formatDateTime } from '@quotawatch/core';
import type { Baseline, Calibration, CapDefinition } from '@quotawatch/core';
import type { CalibrationUpdate, UsageObservation } from '@quotawatch/engine';
import { getFlag, getFlags, getNumberFlag } from './args.js';
import { createContext, loadCalibrationSafe } from './context.js';
import { usd } from './render.js';

/**
 * `NAME=LIMIT[@RESET_HOUR][:PREFIX,PREFIX]`, e.g. `all-models=500` or
 * `sonnet=300@26:claude-sonnet`. Range checks happen in calibration
 * validation.
 */
export function parseCapSpec(spec: string): CapDefinition {
  const eq = spec.indexOf('=');
  if (eq <= 0) throw new InvalidCalibrationError([`cap spec "${spec}" must look like NAME=LIMIT[@HOUR][:MODELS]`]);

  const name = spec.slice(0, eq);
  const [limitPart, modelPart] = splitOnce(spec.slice(eq + 1), ':');
  const [limit, hour] = splitOnce(limitPart, '@');

  const cap: CapDefinition = {
    name,
    weeklyLimitUsd: Number(limit),
    resetHour: hour === undefined ? 0 : Number(hour),
  };
  const models = (modelPart ?? '').split(',').map((m) => m.trim()).filter((m) => m.length > 0);
  if (models.length > 0) cap.models = models;
  return cap;
}

function splitOnce(s: string, sep: string): [string, string | undefined] {
  const idx = s.indexOf(sep);
  return idx < 0 ? [s, undefined] : [s.slice(0, idx), s.slice(idx + 1)];
}

export function parseObservations(args: string[]): UsageObservation[] {
  const names = getFlags(args, '--cap');
  const pcts = getFlags(args, '--pct');
  if (names.length !== pcts.length) {
    throw new InvalidCalibrationError([`every --cap needs a matching --pct (got ${names.length} caps, ${pcts.length} percentages)`]);
  }
  return names.map((capName, i) => ({ capName, observedPct: Number(pcts[i]) }));
}

export function buildUpdate(args: string[], current: Calibration | null): CalibrationUpdate {
  const update: CalibrationUpdate = {};

  const capSpecs = getFlags(args, '--set-cap');
  if (capSpecs.length > 0) update.caps = capSpecs.map(parseCapSpec);

  const anchor = getFlag(args, '--anchor');
  if (anchor !== undefined) update.anchorDate = anchor;

  const resetHour = getNumberFlag(args, '--reset-hour');
  if (resetHour !== undefined) update.resetHour = resetHour;

  const target = getNumberFlag(args, '--baseline');
  const floor = getNumberFlag(args, '--floor');
  if (target !== undefined || floor !== undefined) {
    const base: Baseline = current?.baseline ?? DEFAULT_BASELINE;
    update.baseline = {
      targetRatio: target ?? base.targetRatio,
      floorRatio: floor ?? base.floorRatio,
    };
  }

  return update;
}

export function formatCalibration(c: Calibration): string {
  const lines = [
    `Calibrated: ${formatDateTime(new Date(c.calibratedAt))}`,
    `Week anchor: ${c.anchorDate} (weekday), reset hour ${c.resetHour}`,
    `Baseline: ${c.baseline.targetRatio}x | floor ${c.baseline.floorRatio}x`,
    'Caps:',
  ];
  for (const cap of c.caps) {
    const models = cap.models?.length ? cap.models.join(', ') : 'all models';
    const prov = c.provenance?.[cap.name];
    const from = prov ? ` (from ${prov.observedPct}% of ${usd(prov.windowCostUsd)})` : '';
    lines.push(`  ${cap.name}: ${usd(cap.weeklyLimitUsd)}/week, reset +${cap.resetHour}h, ${models}${from}`);
  }
  return lines.join('\n');
}

export async function runCalibrate(args: string[]): Promise<void> {
  const ctx = createContext({ configPath: getFlag(args, '--config') });

  try {
    if (args.includes('--show')) {
      const current = loadCalibrationSafe(ctx);
      console.log(current ? formatCalibration(current) : 'Not calibrated yet.');
      return;
    }

    const observations = parseObservations(args);
    const update = buildUpdate(args, loadCalibrationSafe(ctx));

    let result: Calibration | null = null;
    if (Object.keys(update).length > 0) result = await ctx.engine.calibrate(update);
    if (observations.length > 0) result = await ctx.engine.calibrateFromUsage(observations);

    if (!result) {
      console.error('Nothing to calibrate. See `quotawatch help`.');
      process.exitCode = 1;
      return;
    }

    console.log('Calibration saved.\n');
    console.log(formatCalibration(result));
  } catch (err) {
    if (!(err instanceof InvalidCalibrationError)) throw err;
    console.error('Calibration rejected:');
    for (const issue of err.issues) console.error(`  - ${issue}`);
    process.exitCode = 1;
  } finally {
    ctx.close();
  }
}
