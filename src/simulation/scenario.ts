/**
 * Scenario loading
 *
 * A scenario is a YAML file naming the processes to inject and, optionally,
 * scheduler overrides applied on top of runtime.yaml.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { SchedulerError, zodErrorToSchedulerError } from '../api/errors.js';
import { findPackageRoot } from '../config/loader.js';
import { ScenarioSchema, type Scenario } from '../types/schemas/scheduling.js';

/**
 * Location of the bundled default scenario
 */
export function defaultScenarioPath(): string {
  return join(findPackageRoot(), 'config', 'scenarios', 'default.yaml');
}

/**
 * Validate an already-parsed scenario document
 *
 * @throws {SchedulerError} ScenarioError naming the first failing field
 */
export function parseScenario(raw: unknown): Scenario {
  const result = ScenarioSchema.safeParse(raw);
  if (!result.success) {
    throw zodErrorToSchedulerError(result.error, 'ScenarioError');
  }
  return result.data;
}

/**
 * Read and validate a scenario file
 */
export function loadScenario(scenarioPath: string = defaultScenarioPath()): Scenario {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(scenarioPath, 'utf8'));
  } catch (error) {
    throw new SchedulerError(
      'ScenarioError',
      `Failed to read scenario ${scenarioPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: scenarioPath }
    );
  }

  return parseScenario(raw);
}
