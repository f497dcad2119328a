import path from 'node:path';
import { createLogger, isQuotawatchError } from '@quotawatch/core';
import type { Calibration, Logger, UsageRecordSource } from '@quotawatch/core';
import { SqliteCalibrationStore, openDb } from '@quotawatch/db';
import type { Database } from '@quotawatch/db';
import { KpiEngine } from '@quotawatch/engine';
import { CcusageUsageSource, JsonlUsageSource } from '@quotawatch/token-monitor';
import { loadConfig } from './config.js';
import type { QuotawatchConfig } from './config.js';
import { HistoryFallbackSource } from './history.js';

export interface CliContext {
  config: QuotawatchConfig;
  logger: Logger;
  db: Database.Database;
  store: SqliteCalibrationStore;
  source: UsageRecordSource;
  engine: KpiEngine;
  close(): void;
}

export function createSource(config: QuotawatchConfig): UsageRecordSource {
  if (config.source.kind === 'ccusage') {
    return new CcusageUsageSource({
      command: config.source.ccusageCommand,
      timeoutMs: config.engine.sourceTimeoutMs,
    });
  }
  return new JsonlUsageSource({ projectsDir: config.source.projectsDir });
}

export interface ContextOptions {
  configPath?: string;
  /** Send logs to a file even when none is configured, so they do not tear a full-screen frame. */
  logToFile?: boolean;
}

/**
 * Wire config, logger, database, calibration store, source and engine for one
 * command run.
 */
export function createContext(options?: ContextOptions): CliContext {
  const config = loadConfig(options?.configPath);
  const logFile = config.logging.file
    ?? (options?.logToFile ? path.join(config.paths.home, 'quotawatch.log') : undefined);
  const logger = createLogger({ ...config.logging, file: logFile });
  const db = openDb(config.paths.db);
  const store = new SqliteCalibrationStore(db);
  const source = createSource(config);

  // The engine backfills from tracked history; `track` reads the live source only.
  const engine = new KpiEngine({
    source: new HistoryFallbackSource(source, db, logger.child({ component: 'history' })),
    store,
    config: config.engine,
    logger,
  });

  return {
    config,
    logger,
    db,
    store,
    source,
    engine,
    close: () => db.close(),
  };
}

/** The stored calibration, or null when there is none or it fails validation. */
export function loadCalibrationSafe(ctx: Pick<CliContext, 'store' | 'logger'>): Calibration | null {
  try {
    return ctx.store.load();
  } catch (err) {
    if (!isQuotawatchError(err)) throw err;
    ctx.logger.warn({ err }, 'stored calibration is invalid; ignoring it');
    return null;
  }
}
