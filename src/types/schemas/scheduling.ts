/**
 * Process and scenario schemas
 *
 * @module schemas/scheduling
 */

import { z } from 'zod';
import { NonNegativeInteger, ProcessIdSchema } from './common.js';
import { SchedulerSectionBaseSchema } from './config.js';

/**
 * Process record accepted by MlfqScheduler.addProcess
 */
export const ProcessSchema = z.object({
  id: ProcessIdSchema,
  priority: NonNegativeInteger,
  remainingTime: NonNegativeInteger,
  totalExecutedTime: NonNegativeInteger,
});

/**
 * Process entry in a scenario file (snake_case, like runtime.yaml)
 */
export const ScenarioProcessSchema = z
  .object({
    id: ProcessIdSchema,
    priority: NonNegativeInteger.default(0),
    remaining_time: NonNegativeInteger,
    total_executed_time: NonNegativeInteger.default(0),
  })
  .transform((entry) => ({
    id: entry.id,
    priority: entry.priority,
    remainingTime: entry.remaining_time,
    totalExecutedTime: entry.total_executed_time,
  }));

/**
 * Scenario file
 */
export const ScenarioSchema = z.object({
  name: z.string().optional(),
  scheduler: SchedulerSectionBaseSchema.partial().optional(),
  processes: z.array(ScenarioProcessSchema),
  strategy: z.enum(['drain', 'highest-first']).default('drain'),
  final_elapsed: NonNegativeInteger.optional(),
});

export type ScenarioInput = z.input<typeof ScenarioSchema>;
export type Scenario = z.output<typeof ScenarioSchema>;
