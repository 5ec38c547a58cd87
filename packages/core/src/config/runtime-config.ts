/**
 * Runtime configuration read from the process environment
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUTS, POOL_LIMITS, RETRY_DEFAULTS } from '../constants.js';
import { Errors } from '../errors.js';
import { describeValidationErrors, formatValidationErrors } from '../utils/schema.js';

export const RuntimeConfigSchema = z.object({
  /** Per-call platform deadline */
  queryTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.PLATFORM_QUERY),
  /** Retries after a retryable platform failure */
  maxRetries: z.coerce.number().int().min(0).max(10).default(RETRY_DEFAULTS.MAX_RETRIES),
  /** Base backoff delay between retries */
  retryDelayMs: z.coerce.number().int().min(0).default(RETRY_DEFAULTS.BASE_DELAY_MS),
  /** Cap on concurrent platform queries */
  maxWorkers: z.coerce.number().int().min(1).max(100).default(POOL_LIMITS.MAX_QUERY_WORKERS),
  logLevel: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/**
 * Environment variables read by `loadRuntimeConfig`
 */
export const RUNTIME_ENV_KEYS: Record<keyof RuntimeConfig, string> = {
  queryTimeoutMs: 'LUMORA_QUERY_TIMEOUT_MS',
  maxRetries: 'LUMORA_MAX_RETRIES',
  retryDelayMs: 'LUMORA_RETRY_DELAY_MS',
  maxWorkers: 'LUMORA_MAX_WORKERS',
  logLevel: 'LUMORA_LOG_LEVEL',
};

/**
 * Load runtime configuration. Unset or empty variables take their defaults.
 *
 * @throws LumoraError with code CONFIGURATION_ERROR
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const read = (key: keyof RuntimeConfig): string | undefined => {
    const value = env[RUNTIME_ENV_KEYS[key]]?.trim();
    return value ? value : undefined;
  };

  const result = RuntimeConfigSchema.safeParse({
    queryTimeoutMs: read('queryTimeoutMs'),
    maxRetries: read('maxRetries'),
    retryDelayMs: read('retryDelayMs'),
    maxWorkers: read('maxWorkers'),
    logLevel: read('logLevel')?.toLowerCase(),
  });

  if (!result.success) {
    const errors = formatValidationErrors(result.error);
    throw Errors.configurationError(`Invalid runtime configuration: ${describeValidationErrors(errors)}`, {
      errors,
    });
  }
  return result.data;
}
