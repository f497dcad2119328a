export * from './types.js';
export {
  capWindow,
  isSubsetCap,
  costSubjectToCap,
  utilization,
  readCaps,
  selectBindingCap,
  planDailyUsd,
  efficiencyRatio,
  sprintRoom,
  uncappedShare,
  calibrateCapFromUsage,
} from './quota.js';
export { trailingDays, trailingRunRate, projectWeek, projectPartial } from './projection.js';
