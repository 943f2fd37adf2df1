/**
 * Zod schema for bellman.config.yml
 */

import { z } from 'zod';
import { DEFAULT_ITERATIONS, DEFAULT_PRECISION } from './constants.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const BellmanConfigSchema = z
  .object({
    iterations: z.number().int().positive().default(DEFAULT_ITERATIONS),
    precision: z.number().int().min(0).max(10).default(DEFAULT_PRECISION),
    logLevel: LogLevelSchema.default('warn'),
  })
  .strict();

export type BellmanConfig = z.infer<typeof BellmanConfigSchema>;

/**
 * Parse configuration, throwing ZodError on invalid input
 */
export function parseBellmanConfig(data: unknown): BellmanConfig {
  return BellmanConfigSchema.parse(data ?? {});
}

/**
 * Validate configuration without throwing
 */
export function validateBellmanConfig(data: unknown): {
  success: boolean;
  data?: BellmanConfig;
  error?: z.ZodError;
} {
  const result = BellmanConfigSchema.safeParse(data ?? {});
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
