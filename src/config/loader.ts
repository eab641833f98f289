/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { SchedulerError } from '../api/errors.js';
import type { MlfqSchedulerConfig } from '../types/scheduling.js';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';

export type Config = Omit<RuntimeConfig, 'environments'>;
export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Deep merge two objects (arrays and scalars from `source` replace `target`)
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Default location of runtime.yaml inside the package
 */
export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: string): Environment {
  const env = environment ?? process.env.NODE_ENV;
  if (env === 'production' || env === 'test') {
    return env;
  }
  return 'development';
}

/**
 * Validate configuration values
 *
 * @throws {SchedulerError} ConfigurationError listing every failing field
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new SchedulerError(
      'ConfigurationError',
      `Configuration validation failed:\n${errors.join('\n')}`,
      { errors }
    );
  }

  const { environments: _environments, ...resolved } = parseResult.data;
  return resolved;
}

/**
 * Load configuration from YAML file
 *
 * Applies the `environments.<env>` overrides for the selected environment
 * (argument, then NODE_ENV, then development) before validating.
 */
export function loadConfig(configPath?: string, environment?: Environment): Config {
  const finalPath = configPath ?? defaultConfigPath();

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new SchedulerError(
        'ConfigurationError',
        `Configuration file not found: ${finalPath}`,
        { path: finalPath }
      );
    }
    throw new SchedulerError(
      'ConfigurationError',
      `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
      { path: finalPath }
    );
  }

  if (!isPlainObject(raw)) {
    throw new SchedulerError(
      'ConfigurationError',
      `Configuration file must contain a mapping: ${finalPath}`,
      { path: finalPath }
    );
  }

  const env = resolveEnvironment(environment);
  const { environments, ...base } = raw;
  const overrides = isPlainObject(environments) ? environments[env] : undefined;

  return validateConfig(isPlainObject(overrides) ? deepMerge(base, overrides) : base);
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML scheduler config (snake_case) to MlfqSchedulerConfig (camelCase)
 */
export function getSchedulerConfig(config: Config = getConfig()): MlfqSchedulerConfig {
  return {
    numLevels: config.scheduler.num_levels,
    timeQuanta: [...config.scheduler.time_quanta],
    boostInterval: config.scheduler.boost_interval,
    dispatchOrder: config.scheduler.dispatch_order,
    lowestTierPolicy: config.scheduler.lowest_tier_policy,
  };
}
