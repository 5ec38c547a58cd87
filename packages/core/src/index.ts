/**
 * @lumora/core
 *
 * Domain types, errors, schemas, industry catalog and logging shared by every
 * Lumora package.
 */

// Types
export * from './types/index.js';

// Schemas
export * from './schemas/index.js';

// Errors
export {
  LumoraError,
  Errors,
  isLumoraError,
  toLumoraError,
  RETRYABLE_ERROR_CODES,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Utilities
export * from './utils/index.js';

// Constants
export {
  DEFAULT_TIMEOUTS,
  RETRY_DEFAULTS,
  POOL_LIMITS,
  PROFILE_LIMITS,
  ERROR_RESPONSE_PREFIX,
  CONNECTIVITY_TEST_PROMPT,
} from './constants.js';

// Configuration
export {
  RuntimeConfigSchema,
  RUNTIME_ENV_KEYS,
  loadRuntimeConfig,
  type RuntimeConfig,
} from './config/runtime-config.js';

// Industry catalog
export {
  INDUSTRY_CATALOG,
  loadIndustryCatalog,
  getIndustryProfile,
  listIndustries,
} from './catalog/industry-catalog.js';

// Logging
export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  createSilentLogger,
  createTestLogger,
} from './logging/logger.js';
export { LOG_LEVELS } from './logging/types.js';
export type { LogLevel, LogEntry, LogTransport, LoggerConfig } from './logging/types.js';
