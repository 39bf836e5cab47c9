import { z } from 'zod';

// ===== Configuration =====

export const SchedulerConfigSchema = z.object({
  scheduler: z.object({
    /** A running task times out once elapsed >= executionTime * timeoutMultiplier */
    timeoutMultiplier: z.number().positive().default(1.2),
    /**
     * Clock used for the sweep that follows a timeout.
     * - 'elapsed': current time advanced by the elapsed duration (default).
     * - 'scheduler': the scheduler's own current time.
     */
    timeoutClock: z.enum(['elapsed', 'scheduler']).default('elapsed'),
  }).default({}),
  autoScale: z.object({
    idPrefix: z.string().min(1).default('W'),
    cpu: z.number().int().positive().default(2),
    memory: z.number().int().positive().default(4),
    speed: z.number().int().positive().default(10),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type SchedulerConfigInput = z.input<typeof SchedulerConfigSchema>;
