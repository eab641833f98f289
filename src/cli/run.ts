/**
 * CLI entry logic for mlfq-sim
 *
 * Kept apart from the executable so it can be driven from tests with
 * captured output.
 */

import type { Logger } from 'pino';
import { SchedulerError, toSchedulerError } from '../api/errors.js';
import { loadConfig, type Environment } from '../config/loader.js';
import { LogLevelSchema } from '../types/schemas/common.js';
import { createLogger } from '../utils/logger-helpers.js';
import { formatExecutionRecord, formatTiers } from '../simulation/format.js';
import { runScenario } from '../simulation/runner.js';
import { loadScenario } from '../simulation/scenario.js';

export interface CLIArgs {
  _: string[];
  scenario?: string;
  config?: string;
  env?: Environment;
  logLevel?: string;
  json: boolean;
  help: boolean;
}

export interface CLIOutput {
  out(line: string): void;
  err(line: string): void;
}

const VALUE_FLAGS = new Set(['scenario', 'config', 'env', 'log-level']);

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [], json: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }

    if (arg === '--json') {
      result.json = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const value = args[i + 1];

      if (!VALUE_FLAGS.has(key)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Option ${arg} requires a value`);
      }
      i++;

      switch (key) {
        case 'scenario':
          result.scenario = value;
          break;
        case 'config':
          result.config = value;
          break;
        case 'env':
          if (value !== 'production' && value !== 'development' && value !== 'test') {
            throw new Error(`Invalid environment: ${value}`);
          }
          result.env = value;
          break;
        case 'log-level':
          result.logLevel = value;
          break;
      }
    } else {
      result._.push(arg);
    }
  }

  return result;
}

export const HELP_TEXT = `
mlfq-sim - Multi-level feedback queue scheduler simulator

USAGE:
  mlfq-sim [options]

OPTIONS:
  --scenario <path>       Scenario YAML file (default: config/scenarios/default.yaml)
  --config <path>         Runtime configuration (default: config/runtime.yaml)
  --env <name>            production | development | test (default: NODE_ENV)
  --log-level <level>     Override logging.level (fatal|error|warn|info|debug|trace|silent)
  --json                  Print the simulation result as JSON
  --help, -h              Show this help
`;

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export function run(argv: readonly string[], output: CLIOutput, logger?: Logger): number {
  let args: CLIArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    output.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    output.err(HELP_TEXT);
    return 1;
  }

  if (args.help) {
    output.out(HELP_TEXT);
    return 0;
  }

  try {
    const config = loadConfig(args.config, args.env);
    const level = LogLevelSchema.safeParse(args.logLevel ?? config.logging.level);
    if (!level.success) {
      throw new SchedulerError('InvalidArgument', `Invalid log level: ${args.logLevel}`);
    }
    const log = logger ?? createLogger(level.data);

    const scenario = loadScenario(args.scenario);
    const result = runScenario(scenario, {
      config,
      logger: log,
      onRecord: args.json ? undefined : (record) => output.out(formatExecutionRecord(record)),
    });

    if (args.json) {
      output.out(JSON.stringify(result, null, 2));
      return 0;
    }

    for (const line of formatTiers(result.finalTiers)) {
      output.out(line);
    }
    output.out(`Current time: ${result.currentTime}`);

    return 0;
  } catch (error) {
    const schedulerError = toSchedulerError(error);
    output.err(`Error [${schedulerError.code}]: ${schedulerError.message}`);
    return 1;
  }
}
