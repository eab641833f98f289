import { describe, it, expect, beforeEach } from 'vitest';
import { SchedulerMetrics } from '../../../src/scheduling/SchedulerMetrics.js';
import { MlfqScheduler } from '../../../src/scheduling/MlfqScheduler.js';
import type { ExecutionRecord, Process } from '../../../src/types/scheduling.js';
import { makeProcess } from '../../helpers/fixtures.js';

const dispatch = (
  process: Process,
  overrides: Partial<ExecutionRecord> & Pick<ExecutionRecord, 'outcome'>
): ExecutionRecord => ({
  processId: process.id,
  tier: 0,
  executed: 0,
  remaining: 0,
  time: 0,
  ...overrides,
});

describe('SchedulerMetrics', () => {
  let metrics: SchedulerMetrics;

  beforeEach(() => {
    metrics = new SchedulerMetrics(3);
  });

  it('should start empty', () => {
    expect(metrics.getSnapshot()).toEqual({
      dispatches: 0,
      dispatchesByTier: [0, 0, 0],
      workExecuted: 0,
      outcomes: { completed: 0, demoted: 0, dropped: 0, requeued: 0 },
      boosts: { boosts: 0, processesBoosted: 0, avgMovedPerBoost: 0 },
      turnarounds: [],
      avgTurnaround: 0,
      avgWorkPerDispatch: 0,
    });
  });

  it('should aggregate dispatches, outcomes and boosts', () => {
    const process = makeProcess(1, 0, 5);
    metrics.recordArrival(process, 0);
    metrics.recordDispatch(dispatch(process, { tier: 0, executed: 2, remaining: 3, outcome: 'demoted', time: 2 }), process);
    metrics.recordDispatch(dispatch(process, { tier: 1, executed: 3, remaining: 0, outcome: 'completed', time: 5 }), process);
    metrics.recordBoost(2);
    metrics.recordBoost(0);

    expect(metrics.getSnapshot()).toEqual({
      dispatches: 2,
      dispatchesByTier: [1, 1, 0],
      workExecuted: 5,
      outcomes: { completed: 1, demoted: 1, dropped: 0, requeued: 0 },
      boosts: { boosts: 2, processesBoosted: 2, avgMovedPerBoost: 1 },
      turnarounds: [{ processId: 1, arrivedAt: 0, completedAt: 5, turnaround: 5 }],
      avgTurnaround: 5,
      avgWorkPerDispatch: 2.5,
    });
  });

  it('should measure turnaround from the arrival time', () => {
    const late = makeProcess('late', 0, 8);
    const early = makeProcess('early', 0, 2);
    metrics.recordArrival(late, 10);
    metrics.recordArrival(early, 0);
    metrics.recordDispatch(dispatch(late, { executed: 8, outcome: 'completed', time: 18 }), late);
    metrics.recordDispatch(dispatch(early, { executed: 2, outcome: 'completed', time: 20 }), early);

    const snapshot = metrics.getSnapshot();
    expect(snapshot.turnarounds.map((record) => record.turnaround)).toEqual([8, 20]);
    expect(snapshot.avgTurnaround).toBe(14);
  });

  it('should keep separate arrivals for records sharing an id', () => {
    const first = makeProcess(1, 0, 5);
    const second = makeProcess(1, 0, 5);
    metrics.recordArrival(first, 0);
    metrics.recordArrival(second, 5);
    metrics.recordDispatch(dispatch(first, { executed: 5, outcome: 'completed', time: 5 }), first);
    metrics.recordDispatch(dispatch(second, { executed: 5, outcome: 'completed', time: 10 }), second);

    expect(metrics.getSnapshot().turnarounds.map((record) => record.arrivedAt)).toEqual([0, 5]);
  });

  it('should not record turnaround for dropped work', () => {
    const process = makeProcess(4, 2, 9);
    metrics.recordArrival(process, 0);
    metrics.recordDispatch(
      dispatch(process, { tier: 2, executed: 8, remaining: 1, outcome: 'dropped', time: 8 }),
      process
    );

    const snapshot = metrics.getSnapshot();
    expect(snapshot.outcomes.dropped).toBe(1);
    expect(snapshot.turnarounds).toEqual([]);
  });

  it('should return copies that later records do not change', () => {
    const process = makeProcess(1, 0, 1);
    metrics.recordDispatch(dispatch(process, { executed: 1, outcome: 'completed', time: 1 }), process);
    const snapshot = metrics.getSnapshot();

    metrics.recordDispatch(dispatch(process, { tier: 2, executed: 1, outcome: 'requeued', time: 2 }), process);

    expect(snapshot.dispatchesByTier).toEqual([1, 0, 0]);
    expect(snapshot.turnarounds).toHaveLength(1);
  });

  it('should reset all counters', () => {
    const process = makeProcess(1, 0, 2);
    metrics.recordArrival(process, 0);
    metrics.recordDispatch(dispatch(process, { executed: 2, outcome: 'completed', time: 2 }), process);
    metrics.recordBoost(3);

    metrics.reset();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.dispatches).toBe(0);
    expect(snapshot.dispatchesByTier).toEqual([0, 0, 0]);
    expect(snapshot.boosts.boosts).toBe(0);
    expect(snapshot.turnarounds).toEqual([]);
  });

  it('should compute turnaround per record when the scheduler sees repeated ids', () => {
    const scheduler = new MlfqScheduler({ numLevels: 1, timeQuanta: [10] });

    scheduler.addProcess(makeProcess(1, 0, 5));
    scheduler.executeProcess(0);
    scheduler.addProcess(makeProcess(1, 0, 5));
    scheduler.addProcess(makeProcess(1, 0, 5));
    scheduler.executeProcess(0);
    scheduler.executeProcess(0);

    const { turnarounds } = scheduler.getMetrics();
    expect(turnarounds.map((record) => [record.arrivedAt, record.completedAt, record.turnaround])).toEqual([
      [0, 5, 5],
      [5, 10, 5],
      [5, 15, 10],
    ]);
  });
});
