import {
  DEFAULT_BASELINE,
  DEFAULT_ENGINE_CONFIG,
  InvalidCalibrationError,
  SourceUnavailableError,
  addDays,
  errorMessage,
  isQuotawatchError,
  parseCalibration,
  parseUsageRecords,
  silentLogger,
  startOfDay,
} from '@quotawatch/core';
import type {
  Baseline,
  Calibration,
  CalibrationStore,
  CapDefinition,
  CapProvenance,
  EngineConfig,
  EngineCutoffs,
  KpiSnapshot,
  Logger,
  RateTable,
  UsageRecord,
  UsageRecordSource,
} from '@quotawatch/core';
import { calibrateCapFromUsage, capWindow, costSubjectToCap } from '@quotawatch/intelligence';
import { MODEL_PRICING, aggregateWindow, dedupeRecords, filterByModels } from '@quotawatch/token-monitor';
import { buildSnapshot, deepFreeze } from './snapshot.js';

export type RefreshOutcome =
  | { status: 'fresh'; snapshot: KpiSnapshot }
  | { status: 'source-unavailable'; error: SourceUnavailableError; snapshot: KpiSnapshot | null };

export interface CalibrationUpdate {
  anchorDate?: string;
  resetHour?: number;
  caps?: CapDefinition[];
  baseline?: Baseline;
}

export interface UsageObservation {
  capName: string;
  observedPct: number;
}

export interface EngineConfigOverrides extends Partial<Omit<EngineConfig, 'cutoffs'>> {
  cutoffs?: Partial<EngineCutoffs>;
}

export interface KpiEngineOptions {
  source: UsageRecordSource;
  store: CalibrationStore;
  config?: EngineConfigOverrides;
  rates?: RateTable;
  logger?: Logger;
  clock?: () => Date;
}

const MIN_LOOKBACK_DAYS = 8;

export function resolveEngineConfig(overrides?: EngineConfigOverrides): EngineConfig {
  return {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    cutoffs: { ...DEFAULT_ENGINE_CONFIG.cutoffs, ...overrides?.cutoffs },
    defaultAnchor: { ...DEFAULT_ENGINE_CONFIG.defaultAnchor, ...overrides?.defaultAnchor },
  };
}

/**
 * KPI engine: owns the last good snapshot and the only path that replaces it.
 *
 * - `peek()` never does I/O.
 * - `refresh()` calls are coalesced while one is in flight.
 * - Refreshes and calibrations run one at a time through a single queue, so
 *   a refresh never sees half a calibration.
 */
export class KpiEngine {
  readonly config: Readonly<EngineConfig>;

  private source: UsageRecordSource;
  private store: CalibrationStore;
  private rates: RateTable;
  private log: Logger;
  private clock: () => Date;

  private snapshot: KpiSnapshot | null = null;
  private inflight: Promise<RefreshOutcome> | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: KpiEngineOptions) {
    this.config = Object.freeze(resolveEngineConfig(options.config));
    this.source = options.source;
    this.store = options.store;
    this.rates = options.rates ?? MODEL_PRICING;
    this.log = (options.logger ?? silentLogger()).child({ component: 'engine' });
    this.clock = options.clock ?? (() => new Date());
  }

  /** Last complete snapshot, or null before the first successful refresh. */
  peek(): KpiSnapshot | null {
    return this.snapshot;
  }

  refresh(): Promise<RefreshOutcome> {
    if (this.inflight) return this.inflight;

    this.inflight = this.exclusive(() => this.runRefresh()).finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  /**
   * Merge `update` into the stored calibration and persist it. Validation
   * happens first; an invalid update throws InvalidCalibrationError and
   * nothing is written.
   */
  calibrate(update: CalibrationUpdate): Promise<Calibration> {
    return this.exclusive(async () => {
      const current = this.loadCalibration();
      const next = parseCalibration({
        ...this.baseCalibration(current),
        ...update,
        calibratedAt: this.clock().toISOString(),
      });

      this.store.save(next);
      this.log.info({ caps: next.caps.map((c) => c.name) }, 'calibration saved');
      return next;
    });
  }

  /**
   * Back out cap limits from the percentages the provider's usage page shows,
   * using the cost this engine sees in each cap's current window.
   */
  calibrateFromUsage(observations: readonly UsageObservation[]): Promise<Calibration> {
    return this.exclusive(async () => {
      const current = this.loadCalibration();
      if (!current) {
        throw new InvalidCalibrationError(['no caps defined yet; run a full calibration first']);
      }

      const now = this.clock();
      const records = dedupeRecords(await this.fetchRecords(now));
      const caps = [...current.caps];
      const provenance: Record<string, CapProvenance> = { ...current.provenance };

      for (const obs of observations) {
        const index = caps.findIndex((c) => c.name === obs.capName);
        if (index < 0) {
          throw new InvalidCalibrationError([`unknown cap: ${obs.capName}`]);
        }

        const cap = caps[index];
        const window = capWindow(cap, now, current.anchorDate);
        const aggregate = aggregateWindow(filterByModels(records, cap.models), window.start, window.end, this.rates);
        const windowCostUsd = costSubjectToCap(aggregate, cap);

        caps[index] = calibrateCapFromUsage(cap, windowCostUsd, obs.observedPct);
        provenance[cap.name] = {
          observedPct: obs.observedPct,
          windowCostUsd,
          calibratedAt: now.toISOString(),
        };
      }

      const next = parseCalibration({ ...current, caps, provenance, calibratedAt: now.toISOString() });
      this.store.save(next);
      this.log.info({ observations }, 'calibration derived from observed usage');
      return next;
    });
  }

  // ─── Internals ─────────────────────────────────────────────

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The queue only orders work; each caller sees its own outcome through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runRefresh(): Promise<RefreshOutcome> {
    const now = this.clock();
    const calibration = this.loadCalibration();

    let records: UsageRecord[];
    try {
      records = await this.fetchRecords(now);
    } catch (err) {
      const error = err instanceof SourceUnavailableError
        ? err
        : new SourceUnavailableError(this.source.name, errorMessage(err), { cause: err });
      this.log.warn({ err: error }, 'usage source unavailable; keeping previous snapshot');
      return { status: 'source-unavailable', error, snapshot: this.snapshot };
    }

    const snapshot = deepFreeze(buildSnapshot({
      records: dedupeRecords(records),
      calibration,
      config: this.config,
      now,
      sourceName: this.source.name,
      rates: this.rates,
    }));

    this.snapshot = snapshot;
    this.log.debug({ records: records.length, gate: snapshot.gate }, 'snapshot refreshed');
    return { status: 'fresh', snapshot };
  }

  /** Fetch, bounded by the source timeout, and validate. */
  private async fetchRecords(now: Date): Promise<UsageRecord[]> {
    const lookback = Math.max(this.config.lookbackDays - 1, MIN_LOOKBACK_DAYS);
    const since = addDays(startOfDay(now), -lookback);
    const timeoutMs = this.config.sourceTimeoutMs;
    const controller = new AbortController();

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new SourceUnavailableError(this.source.name, `timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    let raw: unknown;
    try {
      raw = await Promise.race([this.source.fetchUsage(since, controller.signal), timeout]);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }

    const parsed = parseUsageRecords(raw);
    if ('issues' in parsed) {
      throw new SourceUnavailableError(
        this.source.name,
        `returned malformed records: ${parsed.issues.slice(0, 3).join('; ')}`,
      );
    }
    return parsed.records;
  }

  /**
   * Loaded once per operation and frozen. A corrupt stored calibration reads
   * as uncalibrated, so refreshes keep working and a new calibration can
   * replace it.
   */
  private loadCalibration(): Calibration | null {
    try {
      const stored = this.store.load();
      return stored ? Object.freeze(stored) : null;
    } catch (err) {
      if (!isQuotawatchError(err)) throw err;
      this.log.error({ err }, 'stored calibration is invalid; reporting uncalibrated');
      return null;
    }
  }

  private baseCalibration(current: Calibration | null): Omit<Calibration, 'calibratedAt'> {
    if (current) return current;
    return {
      anchorDate: this.config.defaultAnchor.anchorDate,
      resetHour: this.config.defaultAnchor.resetHour,
      caps: [],
      baseline: DEFAULT_BASELINE,
    };
  }
}
