/**
 * mlfq-sim - Multi-level feedback queue scheduler simulator
 *
 * Public entry point: the scheduler core, its configuration loader,
 * the simulation driver and the shared types.
 */

// Scheduler core
export * from './scheduling/index.js';

// Errors
export {
  SchedulerError,
  toSchedulerError,
  createInvalidTierError,
  zodErrorToSchedulerError,
  type SchedulerErrorCode,
  type SchedulerErrorShape,
} from './api/errors.js';

// Configuration
export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getSchedulerConfig,
  defaultConfigPath,
  type Config,
  type Environment,
} from './config/loader.js';

// Simulation driver
export * from './simulation/index.js';

// Logging
export { createLogger, lazyLog } from './utils/logger-helpers.js';

// Types and schemas
export * from './types/index.js';
export * from './types/schemas/index.js';
