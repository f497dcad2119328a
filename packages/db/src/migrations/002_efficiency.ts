import type Database from 'better-sqlite3';

export function up(db: Database.Database): void {
  db.exec(`
    -- One row per local day, written by \`quotawatch track\`
    CREATE TABLE IF NOT EXISTS efficiency_daily (
      date TEXT PRIMARY KEY,
      api_cost_usd REAL NOT NULL DEFAULT 0,
      plan_prorata_usd REAL NOT NULL DEFAULT 0,
      efficiency_ratio REAL,
      input_tokens INTEGER NOT NULL DEFAULT 0,
      output_tokens INTEGER NOT NULL DEFAULT 0,
      cache_read_tokens INTEGER NOT NULL DEFAULT 0,
      cache_write_tokens INTEGER NOT NULL DEFAULT 0,
      models_used TEXT NOT NULL DEFAULT '',
      week_budget_pct REAL,
      recorded_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_efficiency_recorded ON efficiency_daily(recorded_at);

    INSERT OR IGNORE INTO schema_version (version) VALUES (2);
  `);
}
