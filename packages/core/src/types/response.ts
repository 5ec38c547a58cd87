/**
 * Platform response types
 */

import type { ErrorCode } from '../errors.js';
import type { PlatformId } from './profile.js';

/**
 * Failure captured at the platform boundary
 */
export interface PlatformFailure {
  code: ErrorCode;
  message: string;
}

/**
 * Result of one (platform, prompt) query.
 *
 * When `error` is set, `response` holds the error-marked string; analysis
 * counts the response but never scans it for mentions.
 */
export interface PromptResponse {
  prompt: string;
  response: string;
  error?: PlatformFailure;
}

/**
 * Responses per platform, each list in canonical prompt order
 */
export type PlatformResponses = Record<PlatformId, PromptResponse[]>;
