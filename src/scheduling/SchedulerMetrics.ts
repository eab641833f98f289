/**
 * Scheduler Metrics for the MLFQ scheduler
 *
 * Tracks dispatches, work executed, demotions, drops, boosts and
 * per-process turnaround on the scheduler clock.
 */

import type { DispatchOutcome, ExecutionRecord, Process, ProcessId } from '../types/scheduling.js';

/**
 * Turnaround of a finished process
 */
export interface TurnaroundRecord {
  processId: ProcessId;

  /**
   * Clock value when the process was added
   */
  arrivedAt: number;

  /**
   * Clock value after its final dispatch
   */
  completedAt: number;

  turnaround: number;
}

/**
 * Boost statistics
 */
export interface BoostStats {
  /**
   * Number of boosts performed
   */
  boosts: number;

  /**
   * Processes moved back to tier 0 across all boosts
   */
  processesBoosted: number;

  /**
   * Average processes moved per boost
   */
  avgMovedPerBoost: number;
}

/**
 * Complete scheduler metrics
 */
export interface SchedulerMetricsSnapshot {
  /**
   * Dispatches that ran a process (empty-tier no-ops excluded)
   */
  dispatches: number;

  dispatchesByTier: number[];

  /**
   * Work units consumed across all dispatches
   */
  workExecuted: number;

  /**
   * Dispatch count per outcome
   */
  outcomes: Record<DispatchOutcome, number>;

  boosts: BoostStats;

  turnarounds: TurnaroundRecord[];

  avgTurnaround: number;

  avgWorkPerDispatch: number;
}

const emptyOutcomes = (): Record<DispatchOutcome, number> => ({
  completed: 0,
  demoted: 0,
  dropped: 0,
  requeued: 0,
});

/**
 * Scheduler Metrics Collector
 */
export class SchedulerMetrics {
  private dispatchesByTier: number[];
  private outcomes = emptyOutcomes();
  private workExecuted = 0;
  private boostCount = 0;
  private boostedCount = 0;
  /**
   * Keyed by record identity: ids are caller-assigned and may repeat
   */
  private arrivals: WeakMap<Process, number> = new WeakMap();
  private turnarounds: TurnaroundRecord[] = [];

  constructor(private readonly numLevels: number) {
    this.dispatchesByTier = new Array<number>(numLevels).fill(0);
  }

  /**
   * Record a process entering the scheduler
   */
  public recordArrival(process: Process, time: number): void {
    this.arrivals.set(process, time);
  }

  /**
   * Record one dispatch of `process`
   */
  public recordDispatch(record: ExecutionRecord, process: Process): void {
    this.dispatchesByTier[record.tier] = (this.dispatchesByTier[record.tier] ?? 0) + 1;
    this.outcomes[record.outcome]++;
    this.workExecuted += record.executed;

    if (record.outcome === 'completed') {
      const arrivedAt = this.arrivals.get(process) ?? 0;
      this.arrivals.delete(process);
      this.turnarounds.push({
        processId: record.processId,
        arrivedAt,
        completedAt: record.time,
        turnaround: record.time - arrivedAt,
      });
    } else if (record.outcome === 'dropped') {
      this.arrivals.delete(process);
    }
  }

  /**
   * Record a priority boost
   */
  public recordBoost(moved: number): void {
    this.boostCount++;
    this.boostedCount += moved;
  }

  /**
   * Get complete metrics snapshot
   */
  public getSnapshot(): SchedulerMetricsSnapshot {
    const dispatches = this.dispatchesByTier.reduce((sum, count) => sum + count, 0);
    const totalTurnaround = this.turnarounds.reduce((sum, record) => sum + record.turnaround, 0);

    return {
      dispatches,
      dispatchesByTier: [...this.dispatchesByTier],
      workExecuted: this.workExecuted,
      outcomes: { ...this.outcomes },
      boosts: {
        boosts: this.boostCount,
        processesBoosted: this.boostedCount,
        avgMovedPerBoost: this.boostCount === 0 ? 0 : this.boostedCount / this.boostCount,
      },
      turnarounds: this.turnarounds.map((record) => ({ ...record })),
      avgTurnaround: this.turnarounds.length === 0 ? 0 : totalTurnaround / this.turnarounds.length,
      avgWorkPerDispatch: dispatches === 0 ? 0 : this.workExecuted / dispatches,
    };
  }

  /**
   * Reset all metrics
   */
  public reset(): void {
    this.dispatchesByTier = new Array<number>(this.numLevels).fill(0);
    this.outcomes = emptyOutcomes();
    this.workExecuted = 0;
    this.boostCount = 0;
    this.boostedCount = 0;
    this.arrivals = new WeakMap();
    this.turnarounds = [];
  }
}
