import type Database from 'better-sqlite3';

export function up(db: Database.Database): void {
  db.exec(`
    -- Calibration is a handful of scalar settings, stored one row per key
    CREATE TABLE IF NOT EXISTS calibration (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT (datetime('now'))
    );

    INSERT OR IGNORE INTO schema_version (version) VALUES (1);
  `);
}
