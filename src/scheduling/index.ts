/**
 * Scheduling module exports
 */

export { MlfqScheduler, DEFAULT_BOOST_INTERVAL } from './MlfqScheduler.js';
export {
  SchedulerMetrics,
  type TurnaroundRecord,
  type BoostStats,
  type SchedulerMetricsSnapshot,
} from './SchedulerMetrics.js';
