/**
 * Zod schema exports
 *
 * These schemas provide runtime validation for configuration files,
 * scenario files and process records handed to the scheduler.
 *
 * @example
 * ```typescript
 * import { ProcessSchema } from 'mlfq-sim';
 *
 * const result = ProcessSchema.safeParse({ id: 1, priority: 0, remainingTime: 5, totalExecutedTime: 0 });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Configuration schemas
export * from './config.js';

// Process and scenario schemas
export * from './scheduling.js';
