/**
 * Simulation runner
 *
 * Builds a scheduler for a scenario, injects its processes and drives the
 * dispatch loop, then applies the final clock advance.
 */

import type { Logger } from 'pino';
import { SchedulerError } from '../api/errors.js';
import { getConfig, getSchedulerConfig, type Config } from '../config/loader.js';
import { MlfqScheduler } from '../scheduling/MlfqScheduler.js';
import type { SchedulerMetricsSnapshot } from '../scheduling/SchedulerMetrics.js';
import type { Scenario } from '../types/schemas/scheduling.js';
import type { ExecutionRecord, MlfqSchedulerConfig, ProcessSnapshot } from '../types/scheduling.js';

/**
 * Simulation options
 */
export interface SimulationOptions {
  /**
   * Resolved configuration (defaults to the global config)
   */
  config?: Config;

  logger?: Logger;

  /**
   * Called synchronously for every dispatch, in order
   */
  onRecord?: (record: ExecutionRecord) => void;
}

/**
 * Result of a simulation run
 */
export interface SimulationResult {
  name?: string;
  records: ExecutionRecord[];

  /**
   * Number of priority boosts during the whole run
   */
  boosts: number;

  /**
   * Whether the final clock advance triggered a boost
   */
  finalBoost: boolean;

  finalTiers: ProcessSnapshot[][];
  currentTime: number;
  metrics: SchedulerMetricsSnapshot;
}

/**
 * Merge scenario scheduler overrides over the configured scheduler
 */
export function resolveSchedulerConfig(
  config: Config,
  scenario: Scenario,
  logger?: Logger
): MlfqSchedulerConfig {
  const base = getSchedulerConfig(config);
  const overrides = scenario.scheduler ?? {};

  return {
    numLevels: overrides.num_levels ?? base.numLevels,
    timeQuanta: overrides.time_quanta ?? base.timeQuanta,
    boostInterval: overrides.boost_interval ?? base.boostInterval,
    dispatchOrder: overrides.dispatch_order ?? base.dispatchOrder,
    lowestTierPolicy: overrides.lowest_tier_policy ?? base.lowestTierPolicy,
    logger,
  };
}

/**
 * Run a scenario to completion
 *
 * `drain` visits tiers top to bottom and dispatches each until it reports
 * empty. `highest-first` always dispatches the highest non-empty tier and
 * checks the boost trigger after every dispatch.
 *
 * @throws {SchedulerError} DispatchLimitExceeded when the run exceeds
 * `simulation.max_dispatches`
 */
export function runScenario(scenario: Scenario, options: SimulationOptions = {}): SimulationResult {
  const config = options.config ?? getConfig();
  const maxDispatches = config.simulation.max_dispatches;

  const scheduler = new MlfqScheduler(resolveSchedulerConfig(config, scenario, options.logger));

  const records: ExecutionRecord[] = [];
  let boosts = 0;

  scheduler.on('execute', (record) => {
    records.push(record);
    options.onRecord?.(record);
  });
  scheduler.on('boost', () => {
    boosts++;
  });

  for (const process of scenario.processes) {
    scheduler.addProcess({ ...process });
  }

  const dispatch = (tier: number): void => {
    if (records.length >= maxDispatches) {
      throw new SchedulerError(
        'DispatchLimitExceeded',
        `Simulation exceeded ${maxDispatches} dispatches`,
        { maxDispatches, currentTime: scheduler.currentTime }
      );
    }
    scheduler.executeProcess(tier);
  };

  if (scenario.strategy === 'highest-first') {
    let tier = scheduler.tiers.findIndex((queue) => queue.length > 0);
    while (tier !== -1) {
      dispatch(tier);
      scheduler.updateTime(0);
      tier = scheduler.tiers.findIndex((queue) => queue.length > 0);
    }
  } else {
    for (let tier = 0; tier < scheduler.numLevels; tier++) {
      while (scheduler.getTierSize(tier) > 0) {
        dispatch(tier);
      }
    }
  }

  const finalBoost = scheduler.updateTime(scenario.final_elapsed ?? config.simulation.final_elapsed);

  options.logger?.info(
    { scenario: scenario.name, dispatches: records.length, boosts, currentTime: scheduler.currentTime },
    'Simulation finished'
  );

  return {
    name: scenario.name,
    records,
    boosts,
    finalBoost,
    finalTiers: scheduler.snapshot(),
    currentTime: scheduler.currentTime,
    metrics: scheduler.getMetrics(),
  };
}
