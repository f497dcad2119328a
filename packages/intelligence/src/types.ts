import type {
  CapDefinition,
  DayCost,
  GateEvaluator,
  Metric,
  TimeWindow,
  WindowAggregate,
} from '@quotawatch/core';

// ─── Quota Types ──────────────────────────────────────────────

export interface CapReading {
  cap: CapDefinition;
  window: TimeWindow;
  aggregate: WindowAggregate;
  costUsd: number;
  utilization: number;   // unclamped
}

export interface EfficiencyResult {
  costUsd: number;
  referenceUsd: number;  // plan cost pro-rated over the active days
  activeDays: number;
  ratio: Metric<number>;
}

// ─── Projection Types ─────────────────────────────────────────

export interface BandReference {
  evaluator: GateEvaluator;
  /** Projected cost is divided by this before banding; null or zero gives 'unknown'. */
  referenceUsd: number | null;
}

export interface WeekProjectionInput {
  window: TimeWindow;
  costSoFar: number;
  now: Date;
  trailing: readonly DayCost[];
  reference?: BandReference;
}
