/**
 * Multi-Level Feedback Queue Scheduler
 *
 * Implements the classic MLFQ policy:
 * - N priority tiers, index 0 highest
 * - Bounded time quantum per tier and dispatch
 * - Demotion of unfinished work to the next-lower tier
 * - Periodic priority boost driven by the scheduler clock
 *
 * Architecture:
 * - Each tier is a plain array; moving a process between tiers removes it
 *   from one array and pushes it onto another
 * - Dispatch pops from the tail (LIFO) unless `dispatchOrder: 'fifo'`
 * - Unfinished work at the lowest tier is dropped unless
 *   `lowestTierPolicy: 'requeue'`
 * - Every operation is synchronous; events fire before the call returns
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { SchedulerError, createInvalidTierError, zodErrorToSchedulerError } from '../api/errors.js';
import { ProcessSchema } from '../types/schemas/scheduling.js';
import type {
  DispatchOrder,
  DispatchOutcome,
  ExecutionRecord,
  LowestTierPolicy,
  MlfqSchedulerConfig,
  MlfqSchedulerEvents,
  Process,
  ProcessSnapshot,
  QueueStats,
} from '../types/scheduling.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { SchedulerMetrics, type SchedulerMetricsSnapshot } from './SchedulerMetrics.js';

/**
 * Clock period between priority boosts
 */
export const DEFAULT_BOOST_INTERVAL = 100;

const isNonNegativeInteger = (value: number): boolean => Number.isInteger(value) && value >= 0;

const snapshotOf = (process: Process): ProcessSnapshot => ({ ...process });

/**
 * MLFQ Scheduler
 *
 * Owns the tiers and the clock. The caller drives it by adding processes,
 * dispatching tiers and advancing time.
 */
export class MlfqScheduler extends EventEmitter<MlfqSchedulerEvents> {
  private readonly levels: Process[][];
  private readonly queued: WeakSet<Process> = new WeakSet();
  private readonly quanta: readonly number[];
  private readonly interval: number;
  private readonly dispatchOrder: DispatchOrder;
  private readonly lowestTierPolicy: LowestTierPolicy;
  private readonly metrics?: SchedulerMetrics;
  private readonly logger?: Logger;

  private clock = 0;

  constructor(config: MlfqSchedulerConfig) {
    super();

    const { numLevels, timeQuanta } = config;

    if (!Number.isInteger(numLevels) || numLevels < 1) {
      throw new SchedulerError(
        'ConfigurationError',
        `numLevels must be a positive integer, got ${numLevels}`,
        { numLevels }
      );
    }

    if (timeQuanta.length !== numLevels) {
      throw new SchedulerError(
        'ConfigurationError',
        `timeQuanta must have ${numLevels} entries, got ${timeQuanta.length}`,
        { numLevels, timeQuanta: [...timeQuanta] }
      );
    }

    const badQuantum = timeQuanta.findIndex((quantum) => !isNonNegativeInteger(quantum));
    if (badQuantum !== -1) {
      throw new SchedulerError(
        'ConfigurationError',
        `timeQuanta[${badQuantum}] must be a non-negative integer, got ${timeQuanta[badQuantum]}`,
        { tier: badQuantum }
      );
    }

    const boostInterval = config.boostInterval ?? DEFAULT_BOOST_INTERVAL;
    if (!Number.isInteger(boostInterval) || boostInterval < 1) {
      throw new SchedulerError(
        'ConfigurationError',
        `boostInterval must be a positive integer, got ${boostInterval}`,
        { boostInterval }
      );
    }

    this.levels = Array.from({ length: numLevels }, () => []);
    this.quanta = Object.freeze([...timeQuanta]);
    this.interval = boostInterval;
    this.dispatchOrder = config.dispatchOrder ?? 'lifo';
    this.lowestTierPolicy = config.lowestTierPolicy ?? 'drop';
    this.logger = config.logger;

    if (config.enableMetrics ?? true) {
      this.metrics = new SchedulerMetrics(numLevels);
    }

    this.logger?.info(
      {
        numLevels,
        timeQuanta: this.quanta,
        boostInterval: this.interval,
        dispatchOrder: this.dispatchOrder,
        lowestTierPolicy: this.lowestTierPolicy,
      },
      'MlfqScheduler initialized'
    );
  }

  public get numLevels(): number {
    return this.levels.length;
  }

  public get timeQuanta(): readonly number[] {
    return this.quanta;
  }

  public get currentTime(): number {
    return this.clock;
  }

  public get boostInterval(): number {
    return this.interval;
  }

  /**
   * Live read-only view of every tier, highest priority first
   */
  public get tiers(): ReadonlyArray<ReadonlyArray<ProcessSnapshot>> {
    return this.levels;
  }

  /**
   * Classify a process into a tier
   *
   * Priorities at or beyond `numLevels` are clamped to the lowest tier.
   * The record is stored as-is and mutated in place from here on.
   *
   * @returns The tier the process was placed in
   * @throws {SchedulerError} ValidationError when the record is malformed
   * or already queued
   */
  public addProcess(process: Process): number {
    const parsed = ProcessSchema.safeParse(process);
    if (!parsed.success) {
      throw zodErrorToSchedulerError(parsed.error);
    }

    if (this.queued.has(process)) {
      throw new SchedulerError(
        'ValidationError',
        `Process ${process.id} is already queued`,
        { processId: process.id, tier: process.priority }
      );
    }

    const tier = Math.min(process.priority, this.levels.length - 1);
    process.priority = tier;
    this.tierAt(tier).push(process);
    this.queued.add(process);

    this.metrics?.recordArrival(process, this.clock);

    lazyLog(
      this.logger,
      'debug',
      () => ({ processId: process.id, tier, queueSize: this.tierAt(tier).length }),
      'Process added'
    );

    this.emit('added', snapshotOf(process), tier);
    return tier;
  }

  /**
   * Run the next process of a tier for at most one quantum
   *
   * @returns The execution record, or null when the tier is empty
   * @throws {SchedulerError} InvalidTier when `tierIndex` is out of range
   */
  public executeProcess(tierIndex: number): ExecutionRecord | null {
    const queue = this.tierAt(tierIndex);

    const process = this.dispatchOrder === 'lifo' ? queue.pop() : queue.shift();
    if (!process) {
      return null;
    }

    const quantum = this.quanta[tierIndex] ?? 0;
    const executed = Math.min(process.remainingTime, quantum);

    process.remainingTime -= executed;
    process.totalExecutedTime += executed;
    this.clock += executed;

    const outcome = this.settle(process, tierIndex);
    if (outcome === 'completed' || outcome === 'dropped') {
      this.queued.delete(process);
    }

    const record: ExecutionRecord = {
      processId: process.id,
      tier: tierIndex,
      executed,
      remaining: process.remainingTime,
      outcome,
      time: this.clock,
    };

    this.metrics?.recordDispatch(record, process);

    lazyLog(this.logger, 'debug', () => ({ ...record }), 'Process dispatched');

    this.emit('execute', record);
    this.emitOutcome(process, tierIndex, outcome);

    return record;
  }

  /**
   * Move every process in tiers 1..N-1 to the tail of tier 0
   *
   * @returns Number of processes moved
   */
  public priorityBoost(): number {
    const top = this.tierAt(0);
    let moved = 0;

    for (let tier = 1; tier < this.levels.length; tier++) {
      const queue = this.tierAt(tier);
      let process = queue.pop();
      while (process) {
        process.priority = 0;
        top.push(process);
        moved++;
        process = queue.pop();
      }
    }

    this.metrics?.recordBoost(moved);

    lazyLog(
      this.logger,
      'debug',
      () => ({ moved, currentTime: this.clock, topTierSize: top.length }),
      'Priority boost'
    );

    this.emit('boost', moved, this.clock);
    return moved;
  }

  /**
   * Advance the clock and boost when it lands on a multiple of the
   * boost interval. Checked on every call, including `elapsed === 0`.
   *
   * @returns Whether a boost fired
   * @throws {SchedulerError} InvalidArgument when `elapsed` is negative or fractional
   */
  public updateTime(elapsed: number): boolean {
    if (!isNonNegativeInteger(elapsed)) {
      throw new SchedulerError(
        'InvalidArgument',
        `elapsed must be a non-negative integer, got ${elapsed}`,
        { elapsed }
      );
    }

    this.clock += elapsed;
    this.emit('tick', elapsed, this.clock);

    if (this.clock % this.interval === 0) {
      this.priorityBoost();
      return true;
    }

    return false;
  }

  /**
   * Number of processes held by a tier
   */
  public getTierSize(tierIndex: number): number {
    return this.tierAt(tierIndex).length;
  }

  /**
   * True when no tier holds a process
   */
  public isIdle(): boolean {
    return this.levels.every((queue) => queue.length === 0);
  }

  /**
   * Copy of every tier, safe to keep after further dispatches
   */
  public snapshot(): ProcessSnapshot[][] {
    return this.levels.map((queue) => queue.map(snapshotOf));
  }

  /**
   * Get current queue statistics
   */
  public getQueueStats(): QueueStats {
    const queueDepth = this.levels.map((queue) => queue.length);
    let pendingWork = 0;
    for (const queue of this.levels) {
      for (const process of queue) {
        pendingWork += process.remainingTime;
      }
    }

    return {
      queueDepth,
      totalQueueSize: queueDepth.reduce((sum, depth) => sum + depth, 0),
      pendingWork,
      currentTime: this.clock,
    };
  }

  /**
   * Get metrics snapshot
   */
  public getMetrics(): SchedulerMetricsSnapshot {
    if (!this.metrics) {
      throw new SchedulerError('ConfigurationError', 'Metrics collection is disabled');
    }

    return this.metrics.getSnapshot();
  }

  private tierAt(tierIndex: number): Process[] {
    const queue = Number.isInteger(tierIndex) ? this.levels[tierIndex] : undefined;
    if (!queue) {
      throw createInvalidTierError(tierIndex, this.levels.length);
    }
    return queue;
  }

  /**
   * Decide where a just-dispatched process goes next
   */
  private settle(process: Process, tierIndex: number): DispatchOutcome {
    if (process.remainingTime === 0) {
      return 'completed';
    }

    const lower = tierIndex + 1;
    if (lower < this.levels.length) {
      process.priority = lower;
      this.tierAt(lower).push(process);
      return 'demoted';
    }

    if (this.lowestTierPolicy === 'requeue') {
      this.tierAt(tierIndex).push(process);
      return 'requeued';
    }

    return 'dropped';
  }

  private emitOutcome(process: Process, tierIndex: number, outcome: DispatchOutcome): void {
    switch (outcome) {
      case 'completed':
        lazyLog(
          this.logger,
          'debug',
          () => ({ processId: process.id, totalExecutedTime: process.totalExecutedTime, currentTime: this.clock }),
          'Process completed'
        );
        this.emit('complete', snapshotOf(process), this.clock);
        break;
      case 'demoted':
        lazyLog(
          this.logger,
          'debug',
          () => ({ processId: process.id, fromTier: tierIndex, toTier: tierIndex + 1 }),
          'Process demoted'
        );
        this.emit('demote', snapshotOf(process), tierIndex, tierIndex + 1);
        break;
      case 'dropped':
        this.logger?.warn(
          { processId: process.id, tier: tierIndex, remainingTime: process.remainingTime },
          'Unfinished process dropped at lowest tier'
        );
        this.emit('drop', snapshotOf(process), tierIndex);
        break;
      case 'requeued':
        break;
    }
  }
}
