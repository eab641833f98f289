/**
 * Scheduler error utilities.
 *
 * Provides a consistent error type for all public API surfaces and
 * helpers to convert lower-level failures into SchedulerError instances
 * that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Scheduler error codes surfaced to API consumers.
 */
export type SchedulerErrorCode =
  | 'InvalidTier'
  | 'InvalidArgument'
  | 'ValidationError'
  | 'ConfigurationError'
  | 'ScenarioError'
  | 'DispatchLimitExceeded'
  | 'UnknownError';

/**
 * Plain error shape (for JSON output)
 */
export interface SchedulerErrorShape {
  code: SchedulerErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error implementation thrown by the scheduler and its loaders.
 */
export class SchedulerError extends Error implements SchedulerErrorShape {
  public readonly code: SchedulerErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SchedulerErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SchedulerError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses).
   */
  public toObject(): SchedulerErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into SchedulerError instances.
 *
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toSchedulerError(
  error: unknown,
  fallbackCode: SchedulerErrorCode = 'UnknownError'
): SchedulerError {
  if (error instanceof SchedulerError) {
    return error;
  }

  if (error instanceof RangeError) {
    return new SchedulerError('InvalidArgument', error.message);
  }

  if (error instanceof Error) {
    return new SchedulerError(fallbackCode, error.message);
  }

  return new SchedulerError(fallbackCode, 'Unknown scheduler error');
}

/**
 * Convenience helper to create tier index errors
 */
export function createInvalidTierError(tierIndex: number, numLevels: number): SchedulerError {
  return new SchedulerError(
    'InvalidTier',
    `Tier index ${tierIndex} out of range [0, ${numLevels})`,
    { tierIndex, numLevels }
  );
}

/**
 * Convert Zod validation error to SchedulerError
 *
 * @example
 * ```typescript
 * const result = ProcessSchema.safeParse({ id: 1, priority: -1 });
 * if (!result.success) {
 *   throw zodErrorToSchedulerError(result.error);
 * }
 * // Throws: "Validation error on field 'priority': Priority must be >= 0"
 * ```
 */
export function zodErrorToSchedulerError(
  error: ZodError,
  code: SchedulerErrorCode = 'ValidationError'
): SchedulerError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new SchedulerError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
