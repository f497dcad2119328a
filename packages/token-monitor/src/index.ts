export {
  MODEL_PRICING,
  DEFAULT_PRICING,
  resolvePricing,
  priceTokens,
  recordCost,
  shortModelName,
} from './rates.js';
export { dedupeRecords, recordKey, recordTime, matchesModels, filterByModels } from './records.js';
export {
  aggregateWindow,
  aggregateAll,
  hourlyBreakdown,
  dailyCosts,
  countActiveDays,
  rollingWindow,
} from './aggregator.js';
export {
  JsonlUsageSource,
  parseJsonlContent,
  bucketEntries,
  findJsonlFiles,
  defaultProjectsDir,
} from './jsonl-source.js';
export type { JsonlSourceOptions } from './jsonl-source.js';
export { CcusageUsageSource, parseCcusageDaily, formatSinceArg } from './ccusage-source.js';
export type { CcusageOptions, CommandRunner } from './ccusage-source.js';
export type { AggregatedWindows, TokenEntry, JsonlFileInfo } from './types.js';
