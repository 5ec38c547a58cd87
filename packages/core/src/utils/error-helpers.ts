/**
 * Error handling utilities
 */

import { isLumoraError } from '../errors.js';

/**
 * Format an error for logging or display
 */
export function formatError(error: unknown): string {
  if (isLumoraError(error)) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return `[${error.name}] ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  return String(error);
}

/**
 * Format an error with full details for debugging
 */
export function formatErrorDetails(error: unknown): {
  message: string;
  code?: string;
  stack?: string;
  details?: Record<string, unknown>;
  cause?: string;
} {
  if (isLumoraError(error)) {
    return {
      message: error.message,
      code: error.code,
      stack: error.stack,
      details: error.details,
      cause: error.cause?.message,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

/**
 * Extract a user-friendly message from an error
 */
export function getUserFriendlyMessage(error: unknown): string {
  if (isLumoraError(error)) {
    return error.userMessage || error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return 'An unexpected error occurred';
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
