import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import { up as migration001 } from './migrations/001_initial.js';
import { up as migration002 } from './migrations/002_efficiency.js';

export type { Database };

const MIGRATIONS = [migration001, migration002];

/** A fresh, migrated connection. ':memory:' gives a private in-memory database. */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  runMigrations(db);
  return db;
}

export function schemaVersion(db: Database.Database): number {
  const tableExists = db.prepare<[], { name: string }>(
    "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
  ).get();
  if (!tableExists) return 0;

  const row = db.prepare<[], { version: number | null }>(
    'SELECT MAX(version) as version FROM schema_version',
  ).get();
  return row?.version ?? 0;
}

function runMigrations(db: Database.Database): void {
  const currentVersion = schemaVersion(db);

  for (let i = currentVersion; i < MIGRATIONS.length; i++) {
    const migrate = MIGRATIONS[i];
    db.transaction(() => {
      migrate(db);
    })();
  }
}

export { SqliteCalibrationStore, CALIBRATION_KEYS } from './queries/calibration.js';
export * from './queries/efficiency.js';
