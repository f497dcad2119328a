import { z } from 'zod';
import { isLocalDate } from './calendar.js';
import { InvalidCalibrationError } from './errors.js';
import type { Calibration, UsageRecord } from './models.js';

const tokenCount = z.number().int().nonnegative();

export const usageRecordSchema = z.object({
  timestamp: z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'timestamp must be ISO-8601'),
  model: z.string().min(1),
  inputTokens: tokenCount,
  outputTokens: tokenCount,
  cacheWriteTokens: tokenCount,
  cacheReadTokens: tokenCount,
  costUsd: z.number().finite().nonnegative().optional(),
});

export const usageRecordListSchema = z.array(usageRecordSchema);

const localDate = z.string().refine(isLocalDate, 'must be a YYYY-MM-DD calendar date');

export const capSchema = z.object({
  name: z.string().min(1),
  weeklyLimitUsd: z.number().finite().positive('weekly limit must be positive'),
  resetHour: z.number().int().min(0, 'reset hour must be 0-167').max(167, 'reset hour must be 0-167'),
  models: z.array(z.string().min(1)).optional(),
});

export const baselineSchema = z
  .object({
    targetRatio: z.number().finite().positive(),
    floorRatio: z.number().finite().positive(),
  })
  .refine((b) => b.floorRatio <= b.targetRatio, 'floor ratio must not exceed target ratio');

export const calibrationSchema = z.object({
  anchorDate: localDate,
  resetHour: z.number().int().min(0, 'reset hour must be 0-23').max(23, 'reset hour must be 0-23'),
  caps: z
    .array(capSchema)
    .min(1, 'at least one cap is required')
    .refine((caps) => new Set(caps.map((c) => c.name)).size === caps.length, 'cap names must be unique'),
  baseline: baselineSchema,
  calibratedAt: z.string().min(1),
  provenance: z
    .record(
      z.object({
        observedPct: z.number().finite().positive(),
        windowCostUsd: z.number().finite().nonnegative(),
        calibratedAt: z.string().min(1),
      }),
    )
    .optional(),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${where}${issue.message}`;
  });
}

/** Validate a calibration before it is persisted. */
export function parseCalibration(raw: unknown): Calibration {
  const result = calibrationSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidCalibrationError(formatIssues(result.error));
  }
  return result.data;
}

export function parseUsageRecords(raw: unknown): { records: UsageRecord[] } | { issues: string[] } {
  const result = usageRecordListSchema.safeParse(raw);
  if (!result.success) return { issues: formatIssues(result.error) };
  return { records: result.data };
}
