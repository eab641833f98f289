/**
 * Shared fixtures for scheduler tests
 */

import { pino } from 'pino';
import type { Config } from '../../src/config/loader.js';
import type { Process, ProcessId } from '../../src/types/scheduling.js';

export const silentLogger = pino({ level: 'silent' });

export function makeProcess(
  id: ProcessId,
  priority: number,
  remainingTime: number,
  totalExecutedTime = 0
): Process {
  return { id, priority, remainingTime, totalExecutedTime };
}

/**
 * Run `fn` and return what it threw (undefined when it returned normally)
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export function makeConfig(overrides: Partial<Config['scheduler']> = {}, maxDispatches = 1000): Config {
  return {
    scheduler: {
      num_levels: 3,
      time_quanta: [2, 4, 8],
      boost_interval: 100,
      dispatch_order: 'lifo',
      lowest_tier_policy: 'drop',
      ...overrides,
    },
    simulation: {
      max_dispatches: maxDispatches,
      final_elapsed: 100,
    },
    logging: {
      level: 'silent',
    },
  };
}
