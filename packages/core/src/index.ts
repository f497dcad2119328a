export * from './models.js';
export * from './errors.js';
export * from './calendar.js';
export { GateEvaluator, gateForBand } from './gate.js';
export type { GateConfig } from './gate.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggingConfig, LogLevel } from './logger.js';
export {
  usageRecordSchema,
  calibrationSchema,
  capSchema,
  parseCalibration,
  parseUsageRecords,
  formatIssues,
} from './schema.js';
