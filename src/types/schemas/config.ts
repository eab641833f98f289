/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { LogLevelSchema, NonNegativeInteger, PositiveInteger } from './common.js';

/**
 * Scheduler Configuration (fields only, no cross-field rules)
 */
export const SchedulerSectionBaseSchema = z.object({
  num_levels: PositiveInteger,
  time_quanta: z.array(NonNegativeInteger).min(1, 'At least one quantum is required'),
  boost_interval: PositiveInteger,
  dispatch_order: z.enum(['lifo', 'fifo']),
  lowest_tier_policy: z.enum(['drop', 'requeue']),
});

/**
 * Scheduler Configuration
 */
export const SchedulerSectionSchema = SchedulerSectionBaseSchema.refine(
  (data) => data.time_quanta.length === data.num_levels,
  {
    message: 'must have exactly num_levels entries',
    path: ['time_quanta'],
  }
);

/**
 * Simulation Driver Configuration
 */
export const SimulationSectionSchema = z.object({
  max_dispatches: PositiveInteger,
  final_elapsed: NonNegativeInteger,
});

/**
 * Logging Configuration
 */
export const LoggingSectionSchema = z.object({
  level: LogLevelSchema,
});

const RuntimeConfigSchemaBase = z.object({
  scheduler: SchedulerSectionSchema,
  simulation: SimulationSectionSchema,
  logging: LoggingSectionSchema,
});

/**
 * Per-environment overrides (every field optional)
 */
export const ConfigOverridesSchema = z
  .object({
    scheduler: SchedulerSectionBaseSchema.partial(),
    simulation: SimulationSectionSchema.partial(),
    logging: LoggingSectionSchema.partial(),
  })
  .partial();

/**
 * Runtime Configuration Schema with Environments
 */
export const RuntimeConfigSchema = RuntimeConfigSchemaBase.extend({
  environments: z
    .object({
      production: ConfigOverridesSchema.optional(),
      development: ConfigOverridesSchema.optional(),
      test: ConfigOverridesSchema.optional(),
    })
    .optional(),
});

/**
 * Type inference for RuntimeConfig
 */
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;
export type SchedulerSection = z.infer<typeof SchedulerSectionSchema>;
