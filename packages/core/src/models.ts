// ─── Usage Records ─────────────────────────────────────────────

export interface UsageRecord {
  readonly timestamp: string;   // ISO-8601, hour resolution
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cacheWriteTokens: number;
  readonly cacheReadTokens: number;
  readonly costUsd?: number;    // absent: priced from the rate table
}

export interface TokenCounts {
  input: number;
  output: number;
  cacheWrite: number;
  cacheRead: number;
}

/** USD per million tokens. */
export interface TokenPricing {
  input: number;
  output: number;
  cacheWrite: number;
  cacheRead: number;
}

export type RateTable = Readonly<Record<string, TokenPricing>>;

/**
 * Anything that can hand the engine usage records. Must be idempotent:
 * overlapping `since` ranges are expected and de-duplicated downstream.
 */
export interface UsageRecordSource {
  readonly name: string;
  fetchUsage(since: Date, signal?: AbortSignal): Promise<UsageRecord[]>;
}

// ─── Calibration ───────────────────────────────────────────────

export interface CapDefinition {
  name: string;
  weeklyLimitUsd: number;
  resetHour: number;          // hours after midnight of the anchor weekday, 0-167
  models?: string[];          // model id prefixes; empty = every model
}

export interface Baseline {
  targetRatio: number;
  floorRatio: number;
}

export interface WeekAnchor {
  anchorDate: string;         // YYYY-MM-DD, only its weekday matters
  resetHour: number;          // 0-23
}

export interface CapProvenance {
  observedPct: number;
  windowCostUsd: number;
  calibratedAt: string;
}

export interface Calibration extends WeekAnchor {
  caps: CapDefinition[];
  baseline: Baseline;
  calibratedAt: string;
  provenance?: Record<string, CapProvenance>;
}

export interface CalibrationStore {
  load(): Calibration | null;
  save(calibration: Calibration): void;
}

// ─── Windows ───────────────────────────────────────────────────

export interface ModelTotals {
  costUsd: number;
  recordCount: number;
}

export interface WindowAggregate {
  start: string;
  end: string;
  costUsd: number;
  tokens: TokenCounts;
  recordCount: number;
  byModel: Record<string, ModelTotals>;
}

export interface HourBucket {
  hour: number;               // 0-23, local
  costUsd: number;
  recordCount: number;
}

export interface DayCost {
  date: string;               // YYYY-MM-DD, local
  costUsd: number;
  recordCount: number;
}

// ─── Metrics ───────────────────────────────────────────────────

export type Metric<T> =
  | { status: 'ok'; value: T }
  | { status: 'uncalibrated' }
  | { status: 'insufficient-data'; reason: string };

export function ok<T>(value: T): Metric<T> {
  return { status: 'ok', value };
}

export function uncalibrated<T>(): Metric<T> {
  return { status: 'uncalibrated' };
}

export function insufficientData<T>(reason: string): Metric<T> {
  return { status: 'insufficient-data', reason };
}

export function metricValue<T>(metric: Metric<T>): T | null {
  return metric.status === 'ok' ? metric.value : null;
}

export type RiskBand = 'nominal' | 'elevated' | 'critical' | 'unknown';
export type GateDecision = 'permit' | 'warn' | 'deny';
export type CutoffDirection = 'ascending' | 'descending';

export interface Cutoffs {
  warn: number;
  abort: number;
}

// ─── Projection ────────────────────────────────────────────────

export type ProjectionBasis = 'billing-week' | 'day' | 'hour';
export type ProjectionConfidence = 'normal' | 'low';

export interface Projection {
  basis: ProjectionBasis;
  windowStart: string;
  windowEnd: string;
  elapsedFraction: number;
  costSoFar: number;
  runRatePerDay: number | null;
  projectedTotal: Metric<number>;
  confidence: ProjectionConfidence;
  band: RiskBand;
}

// ─── Quota & Efficiency ────────────────────────────────────────

export interface CapUtilization {
  name: string;
  limitUsd: number;
  costUsd: number;
  utilization: number;        // unclamped: 3x the cap is 3.0
  windowStart: string;
  windowEnd: string;
  band: RiskBand;
  gate: GateDecision;
  projection: Projection;
  projectedUtilization: Metric<number>;
}

export interface EfficiencyReading {
  costUsd: number;
  referenceUsd: number;
  activeDays: number;
  ratio: Metric<number>;
  band: RiskBand;
}

export interface SpendPace {
  weekCostUsd: number;
  baselineUsd: number;
  pct: Metric<number>;
  band: RiskBand;
}

export interface TrendDay extends DayCost {
  ratio: Metric<number>;
  band: RiskBand;
}

export interface ResetStatus {
  cap: string;
  nextResetAt: string;
  hoursUntil: number;
  label: string;
}

export interface ResetSchedule {
  resets: ResetStatus[];
  deadZone: boolean;
  label: string;
}

// ─── Snapshot ──────────────────────────────────────────────────

export interface KpiWindows {
  readonly today: WindowAggregate;
  readonly hourly: readonly HourBucket[];
  readonly rolling7: WindowAggregate;
  readonly rolling30: WindowAggregate;
  readonly billingWeek: WindowAggregate;
}

export interface KpiSnapshot {
  readonly generatedAt: string;
  readonly calibrated: boolean;
  readonly calibratedAt: string | null;
  readonly sourceName: string;
  readonly windows: KpiWindows;
  readonly trend: readonly TrendDay[];
  readonly modelsToday: readonly string[];
  readonly caps: readonly CapUtilization[];
  readonly binding: Metric<CapUtilization>;
  readonly sprintRoomUsd: Metric<number>;
  readonly uncappedShare: Metric<number>;
  readonly efficiency: {
    readonly today: EfficiencyReading;
    readonly rolling7: EfficiencyReading;
    readonly baseline: Baseline | null;
  };
  readonly spend: SpendPace;
  readonly projections: {
    readonly week: Projection;
    readonly day: Projection;
    readonly hour: Projection;
  };
  readonly resets: ResetSchedule | null;
  readonly gate: GateDecision;
}

// ─── Engine Config ─────────────────────────────────────────────

export interface EngineCutoffs {
  quota: Cutoffs;
  projection: Cutoffs;
  spend: Cutoffs;
}

export interface EngineConfig {
  planMonthlyUsd: number;
  weeklySpendBaselineUsd: number;
  runRateDays: number;
  lookbackDays: number;
  sourceTimeoutMs: number;
  minElapsedFraction: number;
  scheduledReservePct: number;
  cutoffs: EngineCutoffs;
  defaultAnchor: WeekAnchor;
}

/**
 * Value-per-dollar target and floor that seed the first calibrate() call.
 * Uncalibrated snapshots never band against it.
 */
export const DEFAULT_BASELINE: Baseline = { targetRatio: 15.5, floorRatio: 12 };

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  planMonthlyUsd: 100,
  weeklySpendBaselineUsd: 55,
  runRateDays: 3,
  lookbackDays: 30,
  sourceTimeoutMs: 30_000,
  minElapsedFraction: 0.02,
  scheduledReservePct: 0.05,
  cutoffs: {
    quota: { warn: 0.8, abort: 0.9 },
    projection: { warn: 0.65, abort: 0.85 },
    spend: { warn: 0.75, abort: 1.3 },
  },
  defaultAnchor: { anchorDate: '2026-02-07', resetHour: 0 },
};
