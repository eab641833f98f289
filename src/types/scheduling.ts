/**
 * Scheduling types for the multi-level feedback queue
 *
 * Defines process records, scheduler configuration, execution records
 * and the event map emitted while the scheduler runs.
 */

import type { Logger } from 'pino';

/**
 * Opaque process identifier assigned by the caller
 */
export type ProcessId = number | string;

/**
 * Process record tracked by the scheduler
 *
 * The scheduler mutates the record in place while it moves between tiers.
 */
export interface Process {
  /**
   * Caller-assigned identifier (never validated for uniqueness)
   */
  id: ProcessId;

  /**
   * Tier the process currently belongs to, or most recently belonged to.
   * Membership itself is positional.
   */
  priority: number;

  /**
   * Work units left to complete
   */
  remainingTime: number;

  /**
   * Work units consumed so far
   */
  totalExecutedTime: number;
}

/**
 * Selection order within a tier
 *
 * - `lifo`: most recently queued process runs next (default)
 * - `fifo`: oldest queued process runs next
 */
export type DispatchOrder = 'lifo' | 'fifo';

/**
 * What happens to an unfinished process that exhausts its quantum
 * at the lowest tier
 *
 * - `drop`: removed from tracking (default)
 * - `requeue`: appended back to the lowest tier
 */
export type LowestTierPolicy = 'drop' | 'requeue';

/**
 * Scheduler configuration
 */
export interface MlfqSchedulerConfig {
  /**
   * Number of priority tiers (index 0 is highest)
   */
  numLevels: number;

  /**
   * Maximum work per dispatch, one entry per tier
   */
  timeQuanta: readonly number[];

  /**
   * Clock period that triggers a priority boost
   * @default 100
   */
  boostInterval?: number;

  /**
   * @default 'lifo'
   */
  dispatchOrder?: DispatchOrder;

  /**
   * @default 'drop'
   */
  lowestTierPolicy?: LowestTierPolicy;

  /**
   * Enable metrics collection
   * @default true
   */
  enableMetrics?: boolean;

  /**
   * Logger instance (optional)
   */
  logger?: Logger;
}

/**
 * Outcome of a single dispatch
 */
export type DispatchOutcome = 'completed' | 'demoted' | 'dropped' | 'requeued';

/**
 * Execution record emitted for every dispatch
 */
export interface ExecutionRecord {
  processId: ProcessId;
  tier: number;
  executed: number;
  remaining: number;
  outcome: DispatchOutcome;
  /**
   * Clock value after the dispatch
   */
  time: number;
}

/**
 * Read-only copy of a process, used for snapshots
 */
export type ProcessSnapshot = Readonly<Process>;

/**
 * Queue statistics
 */
export interface QueueStats {
  /**
   * Processes held per tier
   */
  queueDepth: number[];

  /**
   * Processes held across all tiers
   */
  totalQueueSize: number;

  /**
   * Remaining work across all tiers
   */
  pendingWork: number;

  currentTime: number;
}

/**
 * Scheduler events
 */
export interface MlfqSchedulerEvents {
  added: (process: ProcessSnapshot, tier: number) => void;
  execute: (record: ExecutionRecord) => void;
  demote: (process: ProcessSnapshot, fromTier: number, toTier: number) => void;
  complete: (process: ProcessSnapshot, time: number) => void;
  drop: (process: ProcessSnapshot, tier: number) => void;
  boost: (moved: number, time: number) => void;
  tick: (elapsed: number, time: number) => void;
}
