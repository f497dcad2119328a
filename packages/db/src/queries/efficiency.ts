import type Database from 'better-sqlite3';

export interface DailyEfficiency {
  date: string;                 // YYYY-MM-DD, local
  apiCostUsd: number;
  planProrataUsd: number;
  efficiencyRatio: number | null;
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
  modelsUsed: string[];
  weekBudgetPct: number | null;
  recordedAt?: string;
}

interface EfficiencyRow {
  date: string;
  api_cost_usd: number;
  plan_prorata_usd: number;
  efficiency_ratio: number | null;
  input_tokens: number;
  output_tokens: number;
  cache_read_tokens: number;
  cache_write_tokens: number;
  models_used: string;
  week_budget_pct: number | null;
  recorded_at: string;
}

/** Insert or overwrite the row for `entry.date`; re-tracking a day replaces it. */
export function upsertDailyEfficiency(db: Database.Database, entry: DailyEfficiency): DailyEfficiency {
  const recordedAt = entry.recordedAt ?? new Date().toISOString();

  db.prepare(`
    INSERT INTO efficiency_daily (
      date, api_cost_usd, plan_prorata_usd, efficiency_ratio,
      input_tokens, output_tokens, cache_read_tokens, cache_write_tokens,
      models_used, week_budget_pct, recorded_at
    )
    VALUES (
      @date, @apiCostUsd, @planProrataUsd, @efficiencyRatio,
      @inputTokens, @outputTokens, @cacheReadTokens, @cacheWriteTokens,
      @modelsUsed, @weekBudgetPct, @recordedAt
    )
    ON CONFLICT(date) DO UPDATE SET
      api_cost_usd = excluded.api_cost_usd,
      plan_prorata_usd = excluded.plan_prorata_usd,
      efficiency_ratio = excluded.efficiency_ratio,
      input_tokens = excluded.input_tokens,
      output_tokens = excluded.output_tokens,
      cache_read_tokens = excluded.cache_read_tokens,
      cache_write_tokens = excluded.cache_write_tokens,
      models_used = excluded.models_used,
      week_budget_pct = excluded.week_budget_pct,
      recorded_at = excluded.recorded_at
  `).run({
    date: entry.date,
    apiCostUsd: entry.apiCostUsd,
    planProrataUsd: entry.planProrataUsd,
    efficiencyRatio: entry.efficiencyRatio,
    inputTokens: entry.inputTokens,
    outputTokens: entry.outputTokens,
    cacheReadTokens: entry.cacheReadTokens,
    cacheWriteTokens: entry.cacheWriteTokens,
    modelsUsed: entry.modelsUsed.join(','),
    weekBudgetPct: entry.weekBudgetPct,
    recordedAt,
  });

  return { ...entry, recordedAt };
}

/** Days on or after `fromDate` (YYYY-MM-DD), oldest first. */
export function listDailyEfficiencySince(db: Database.Database, fromDate: string): DailyEfficiency[] {
  const rows = db.prepare<[string], EfficiencyRow>(
    'SELECT * FROM efficiency_daily WHERE date >= ? ORDER BY date ASC',
  ).all(fromDate);
  return rows.map(mapEfficiency);
}

function mapEfficiency(row: EfficiencyRow): DailyEfficiency {
  return {
    date: row.date,
    apiCostUsd: row.api_cost_usd,
    planProrataUsd: row.plan_prorata_usd,
    efficiencyRatio: row.efficiency_ratio,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    cacheReadTokens: row.cache_read_tokens,
    cacheWriteTokens: row.cache_write_tokens,
    modelsUsed: row.models_used ? row.models_used.split(',') : [],
    weekBudgetPct: row.week_budget_pct,
    recordedAt: row.recorded_at,
  };
}
