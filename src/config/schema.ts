/**
 * Configuration schema with validation
 */

import { z } from 'zod';

export const ConfigSchema = z.object({
  wait: z.object({
    pollIntervalMs: z.number().int().min(0).default(500),
    maxPolls: z.number().int().positive().default(600),
  }),

  retry: z.object({
    maxAttempts: z.number().int().positive().default(3),
    baseDelayMs: z.number().int().min(0).default(250),
    maxDelayMs: z.number().int().min(0).default(5000),
  }),

  simulator: z.object({
    numQubits: z.number().int().positive().default(5),
    queueMs: z.number().int().min(0).default(500),
    runMs: z.number().int().min(0).default(500),
  }),

  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    pretty: z.boolean().default(true),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
