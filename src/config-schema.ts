/**
 * Config Schema Validation
 *
 * Zod schema for the daemon's YAML config.
 */

import { z } from 'zod';
import { DEFAULT_DEBOUNCE_WINDOW_MS } from './reconnect/types';

export const MIN_DEBOUNCE_WINDOW_MS = 100;
export const MAX_DEBOUNCE_WINDOW_MS = 60000;

export const debounceWindowSchema = z.number()
  .int()
  .min(MIN_DEBOUNCE_WINDOW_MS)
  .max(MAX_DEBOUNCE_WINDOW_MS);

const busTypeSchema = z.enum(['system', 'session']);

const loggingConfigSchema = z.object({
  verbose: z.boolean().default(false),
  pretty: z.boolean().default(true),
}).strict();

export const daemonConfigSchema = z.object({
  bus: busTypeSchema.default('system'),
  debounceWindowMs: debounceWindowSchema.default(DEFAULT_DEBOUNCE_WINDOW_MS),
  logging: loggingConfigSchema.default({}),
}).strict();

export type BusType = z.infer<typeof busTypeSchema>;
export type DaemonConfigOutput = z.output<typeof daemonConfigSchema>;

/**
 * Validate a parsed config document. An empty YAML file parses to null
 * and is treated as "all defaults".
 */
export function validateDaemonConfig(data: unknown): DaemonConfigOutput {
  return daemonConfigSchema.parse(data ?? {});
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
