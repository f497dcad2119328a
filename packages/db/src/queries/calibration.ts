import type Database from 'better-sqlite3';
import { InvalidCalibrationError, parseCalibration } from '@quotawatch/core';
import type { Calibration, CalibrationStore } from '@quotawatch/core';

export const CALIBRATION_KEYS = [
  'anchor_date',
  'reset_hour',
  'caps',
  'baseline',
  'calibrated_at',
  'provenance',
] as const;

type CalibrationKey = (typeof CALIBRATION_KEYS)[number];

interface CalibrationRow {
  key: string;
  value: string;
}

function decodeJson(key: CalibrationKey, value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    throw new InvalidCalibrationError([`${key}: stored value is not valid JSON (${String(err)})`]);
  }
}

/**
 * Calibration persisted as key/value rows. Every value is JSON so numbers
 * and nested cap lists survive the round trip; the whole set is validated on
 * the way in and on the way out.
 */
export class SqliteCalibrationStore implements CalibrationStore {
  constructor(private readonly db: Database.Database) {}

  load(): Calibration | null {
    const rows = this.db.prepare<[], CalibrationRow>('SELECT key, value FROM calibration').all();
    if (rows.length === 0) return null;

    const values = new Map<string, string>(rows.map((r) => [r.key, r.value]));
    const read = (key: CalibrationKey): unknown => {
      const value = values.get(key);
      return value === undefined ? undefined : decodeJson(key, value);
    };

    return parseCalibration({
      anchorDate: read('anchor_date'),
      resetHour: read('reset_hour'),
      caps: read('caps'),
      baseline: read('baseline'),
      calibratedAt: read('calibrated_at'),
      provenance: read('provenance'),
    });
  }

  /** Replaces the stored calibration atomically. Invalid input leaves it untouched. */
  save(calibration: Calibration): void {
    const valid = parseCalibration(calibration);
    const entries: Array<[CalibrationKey, unknown]> = [
      ['anchor_date', valid.anchorDate],
      ['reset_hour', valid.resetHour],
      ['caps', valid.caps],
      ['baseline', valid.baseline],
      ['calibrated_at', valid.calibratedAt],
      ['provenance', valid.provenance],
    ];

    const clear = this.db.prepare('DELETE FROM calibration');
    const insert = this.db.prepare(`
      INSERT INTO calibration (key, value, updated_at)
      VALUES (?, ?, datetime('now'))
    `);

    this.db.transaction(() => {
      clear.run();
      for (const [key, value] of entries) {
        if (value === undefined) continue;
        insert.run(key, JSON.stringify(value));
      }
    })();
  }

  clear(): void {
    this.db.prepare('DELETE FROM calibration').run();
  }
}
