/**
 * Constants for the Lumora system
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Deadline for a single platform query */
  PLATFORM_QUERY: 30_000, // 30 seconds

  /** Deadline for a connectivity probe */
  CONNECTIVITY_PROBE: 15_000, // 15 seconds
} as const;

/**
 * Retry defaults for platform calls
 */
export const RETRY_DEFAULTS = {
  /** Attempts after the first one */
  MAX_RETRIES: 2,

  /** Base delay, doubled on each attempt */
  BASE_DELAY_MS: 1_000,
} as const;

/**
 * Worker pool limits
 */
export const POOL_LIMITS = {
  /** Query workers allotted per selected platform */
  QUERY_WORKERS_PER_PLATFORM: 5,

  /** Hard cap on concurrent platform queries */
  MAX_QUERY_WORKERS: 20,

  /** Hard cap on concurrent competitor analyses */
  MAX_COMPETITOR_WORKERS: 5,
} as const;

/**
 * Brand profile limits
 */
export const PROFILE_LIMITS = {
  MIN_COMPETITORS: 1,
  MAX_COMPETITORS: 10,
  MIN_PROMPTS: 10,
  MAX_PROMPTS: 50,
  DEFAULT_PROMPTS: 20,
} as const;

/**
 * Prefix that marks a response string as a captured platform failure
 */
export const ERROR_RESPONSE_PREFIX = '[ERROR] ';

/**
 * Prompt sent when probing platform connectivity
 */
export const CONNECTIVITY_TEST_PROMPT = 'Hello, this is a test message.';
