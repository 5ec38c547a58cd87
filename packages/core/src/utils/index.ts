/**
 * Utility exports for @lumora/core
 */

// Schema validation utilities
export {
  validateSchema,
  formatValidationErrors,
  describeValidationErrors,
  z,
  nonEmptyString,
} from './schema.js';
export type { ValidationResult, ValidationError } from './schema.js';

// Error utilities
export {
  formatError,
  formatErrorDetails,
  getUserFriendlyMessage,
  errorMessage,
} from './error-helpers.js';

// Concurrency utilities
export { sleep, withTimeout, runPool } from './async.js';
export { AsyncChannel } from './channel.js';
