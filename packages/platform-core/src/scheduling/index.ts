/**
 * Scheduling Module
 */

export { BaseScheduler } from './BaseScheduler.js';
export { SchedulerRegistry } from './SchedulerRegistry.js';
export { intervalToCron, isExactCronInterval } from './cron.js';
export type {
  SchedulerStatus,
  SchedulerInfo,
  SchedulerExecutionResult,
  SchedulerHealthReport,
  SchedulerConfig,
} from './types.js';
