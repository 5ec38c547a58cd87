/**
 * Error codes and custom error classes for Lumora
 */

/**
 * All error codes used in the Lumora system
 */
export type ErrorCode =
  // Validation errors
  | 'VALIDATION_FAILED'
  | 'UNSUPPORTED_INDUSTRY'
  | 'UNKNOWN_PLATFORM'

  // Platform errors
  | 'PLATFORM_QUERY_FAILED'
  | 'RATE_LIMITED'
  | 'AUTH_FAILED'
  | 'QUOTA_EXCEEDED'
  | 'SERVICE_UNAVAILABLE'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE'
  | 'TIMEOUT'

  // Analysis errors
  | 'COMPETITOR_ANALYSIS_FAILED'
  | 'PIPELINE_FAILED'

  // System errors
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Error codes whose operation may succeed when attempted again
 */
export const RETRYABLE_ERROR_CODES: readonly ErrorCode[] = [
  'RATE_LIMITED',
  'SERVICE_UNAVAILABLE',
  'NETWORK_ERROR',
  'TIMEOUT',
];

/**
 * Custom error class for Lumora errors
 */
export class LumoraError extends Error {
  /** Error code */
  readonly code: ErrorCode;

  /** Whether this error is retryable */
  readonly retryable: boolean;

  /** User-friendly message (safe to show to end users) */
  readonly userMessage?: string;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      retryable?: boolean;
      userMessage?: string;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'LumoraError';
    this.code = code;
    this.retryable = options?.retryable ?? RETRYABLE_ERROR_CODES.includes(code);
    this.userMessage = options?.userMessage;
    this.details = options?.details;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LumoraError);
    }
  }

  /**
   * Create a JSON representation of the error
   */
  toJSON(): {
    code: ErrorCode;
    message: string;
    retryable: boolean;
    userMessage?: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      userMessage: this.userMessage,
      details: this.details,
    };
  }
}

/**
 * Error factory functions for common error types
 */
export const Errors = {
  validationFailed: (message: string, details?: Record<string, unknown>) =>
    new LumoraError('VALIDATION_FAILED', message, {
      details,
      userMessage: 'The analysis request is invalid. Check the brand profile and try again.',
    }),

  unsupportedIndustry: (industry: string) =>
    new LumoraError('UNSUPPORTED_INDUSTRY', `Industry ${industry} not supported`, {
      details: { industry },
      userMessage: `"${industry}" is not a predefined industry. Mark it as a custom industry instead.`,
    }),

  unknownPlatform: (platformId: string) =>
    new LumoraError('UNKNOWN_PLATFORM', `No adapter registered for platform: ${platformId}`, {
      details: { platformId },
    }),

  platformQueryFailed: (platformId: string, message: string, cause?: Error) =>
    new LumoraError('PLATFORM_QUERY_FAILED', `Error querying ${platformId}: ${message}`, {
      details: { platformId },
      cause,
    }),

  timeout: (operation: string, timeoutMs: number) =>
    new LumoraError('TIMEOUT', `Operation timed out: ${operation}`, {
      details: { operation, timeoutMs },
    }),

  competitorAnalysisFailed: (competitor: string, cause?: Error) =>
    new LumoraError(
      'COMPETITOR_ANALYSIS_FAILED',
      `Error analyzing competitor ${competitor}: ${cause?.message ?? 'unknown error'}`,
      { details: { competitor }, cause }
    ),

  pipelineFailed: (stage: string, cause?: Error) =>
    new LumoraError('PIPELINE_FAILED', `Analysis failed during ${stage}: ${cause?.message ?? 'unknown error'}`, {
      details: { stage },
      cause,
      userMessage: 'The analysis could not be completed. No results were saved; it is safe to retry.',
    }),

  configurationError: (message: string, details?: Record<string, unknown>) =>
    new LumoraError('CONFIGURATION_ERROR', message, { details }),

  internalError: (message: string, cause?: Error) =>
    new LumoraError('INTERNAL_ERROR', message, {
      cause,
      userMessage: 'An unexpected error occurred. Please try again.',
    }),
};

/**
 * Type guard to check if an error is a LumoraError
 */
export function isLumoraError(error: unknown): error is LumoraError {
  return error instanceof LumoraError;
}

/**
 * Convert any error to a LumoraError
 */
export function toLumoraError(error: unknown): LumoraError {
  if (error instanceof LumoraError) {
    return error;
  }

  if (error instanceof Error) {
    return new LumoraError('INTERNAL_ERROR', error.message, {
      cause: error,
    });
  }

  return new LumoraError('INTERNAL_ERROR', String(error));
}
