/**
 * Simulation driver exports
 */

export {
  runScenario,
  resolveSchedulerConfig,
  type SimulationOptions,
  type SimulationResult,
} from './runner.js';
export { loadScenario, parseScenario, defaultScenarioPath } from './scenario.js';
export { formatExecutionRecord, formatProcess, formatTiers } from './format.js';
