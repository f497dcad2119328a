export { KpiEngine, resolveEngineConfig } from './engine.js';
export type {
  RefreshOutcome,
  CalibrationUpdate,
  UsageObservation,
  EngineConfigOverrides,
  KpiEngineOptions,
} from './engine.js';
export { buildSnapshot, deepFreeze, resetSchedule } from './snapshot.js';
export type { SnapshotInput } from './snapshot.js';
export { formatReport, parseReport, toJSON } from './report.js';
export type { ReportFields } from './report.js';
export { DualCadenceScheduler } from './scheduler.js';
export type { SchedulerOptions } from './scheduler.js';
