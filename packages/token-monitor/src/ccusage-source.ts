import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { formatIssues, parseLocalDate } from '@quotawatch/core';
import type { UsageRecord, UsageRecordSource } from '@quotawatch/core';

const execFileAsync = promisify(execFile);

export type CommandRunner = (
  command: string,
  args: string[],
  signal?: AbortSignal,
) => Promise<string>;

export interface CcusageOptions {
  command: string;
  timeoutMs: number;
}

const DEFAULT_OPTIONS: CcusageOptions = {
  command: 'ccusage',
  timeoutMs: 30_000,
};

const breakdownSchema = z.object({
  modelName: z.string(),
  inputTokens: z.number().default(0),
  outputTokens: z.number().default(0),
  cacheCreationTokens: z.number().default(0),
  cacheReadTokens: z.number().default(0),
  cost: z.number().default(0),
});

const dailyRowSchema = z.object({
  date: z.string(),
  inputTokens: z.number().default(0),
  outputTokens: z.number().default(0),
  cacheCreationTokens: z.number().default(0),
  cacheReadTokens: z.number().default(0),
  totalCost: z.number().default(0),
  modelBreakdowns: z.array(breakdownSchema).default([]),
});

const dailyReportSchema = z.object({
  daily: z.array(dailyRowSchema),
});

/** "20260214" for `--since` */
export function formatSinceArg(since: Date): string {
  const y = since.getFullYear();
  const m = String(since.getMonth() + 1).padStart(2, '0');
  const d = String(since.getDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

/**
 * Parse `ccusage daily --json --breakdown` output into one record per day and
 * model, stamped at local midnight. A day without a breakdown becomes a single
 * "unknown" record carrying the day total. Throws on malformed output.
 */
export function parseCcusageDaily(stdout: string): UsageRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (err) {
    throw new Error('ccusage output is not JSON', { cause: err });
  }

  const parsed = dailyReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected ccusage output: ${formatIssues(parsed.error).join('; ')}`);
  }

  const records: UsageRecord[] = [];
  for (const row of parsed.data.daily) {
    const timestamp = parseLocalDate(row.date).toISOString();

    if (row.modelBreakdowns.length === 0) {
      if (row.totalCost === 0) continue;
      records.push({
        timestamp,
        model: 'unknown',
        inputTokens: row.inputTokens,
        outputTokens: row.outputTokens,
        cacheWriteTokens: row.cacheCreationTokens,
        cacheReadTokens: row.cacheReadTokens,
        costUsd: row.totalCost,
      });
      continue;
    }

    for (const b of row.modelBreakdowns) {
      records.push({
        timestamp,
        model: b.modelName,
        inputTokens: b.inputTokens,
        outputTokens: b.outputTokens,
        cacheWriteTokens: b.cacheCreationTokens,
        cacheReadTokens: b.cacheReadTokens,
        costUsd: b.cost,
      });
    }
  }
  return records;
}

/**
 * Usage source backed by the ccusage CLI. Day resolution only, so the hourly
 * breakdown shows each day's total at midnight.
 */
export class CcusageUsageSource implements UsageRecordSource {
  readonly name = 'ccusage';
  private options: CcusageOptions;
  private run: CommandRunner;

  constructor(options?: Partial<CcusageOptions>, run?: CommandRunner) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.run = run ?? ((command, args, signal) => this.exec(command, args, signal));
  }

  async fetchUsage(since: Date, signal?: AbortSignal): Promise<UsageRecord[]> {
    const args = ['daily', '--json', '--breakdown', '--since', formatSinceArg(since)];
    const stdout = await this.run(this.options.command, args, signal);
    return parseCcusageDaily(stdout);
  }

  private async exec(command: string, args: string[], signal?: AbortSignal): Promise<string> {
    const { stdout } = await execFileAsync(command, args, {
      signal,
      timeout: this.options.timeoutMs,
      maxBuffer: 32 * 1024 * 1024,
      // ccusage installs as a .cmd shim on Windows
      shell: process.platform === 'win32',
    });
    return stdout;
  }
}
