/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects: the context is only built when
 * the log level is enabled, so per-dispatch debug logging costs nothing
 * at the default level.
 */

import { pino, destination, type Logger } from 'pino';
import type { LogLevel } from '../types/schemas/common.js';

type EnabledLevel = Exclude<LogLevel, 'silent'>;
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param contextBuilder - Function that builds the context object (only called if logging)
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ processId, tier }), 'Process dispatched');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: EnabledLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}

/**
 * Create the process-wide logger
 *
 * Writes to stderr so stdout stays reserved for simulation output.
 */
export function createLogger(level: LogLevel, name = 'mlfq-sim'): Logger {
  return pino({ name, level }, destination(2));
}
