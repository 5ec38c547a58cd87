/**
 * @lumora/platform-gateway
 *
 * Types and interfaces for AI platform adapters.
 */

import type { ErrorCode, PlatformFailure, PlatformId } from '@lumora/core';

/**
 * Platform authentication requirements
 */
export type AuthRequirement = 'none' | 'api_key';

/**
 * Platform metadata
 */
export interface PlatformMetadata {
  /** Registry identifier (e.g. "openai") */
  id: PlatformId;
  /** Human-readable name */
  name: string;
  /** Authentication requirement */
  authRequirement: AuthRequirement;
  /** Base URL for the API */
  baseUrl: string;
  /** Model used when the request names none */
  defaultModel: string;
}

/**
 * Query request to a platform
 */
export interface PlatformQueryRequest {
  /** Prompt text */
  prompt: string;
  /** Optional model override */
  model?: string;
  /** Optional temperature setting */
  temperature?: number;
  /** Completion length cap */
  maxTokens?: number;
}

/**
 * Response timing information
 */
export interface ResponseTiming {
  /** Total duration including retries, in ms */
  totalMs: number;
  /** Number of attempts made */
  attempts: number;
}

/**
 * Token usage reported by the platform
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  /** Estimated cost in USD */
  estimatedCostUsd?: number;
}

/**
 * Platform error codes
 */
export type PlatformErrorCode = Extract<
  ErrorCode,
  | 'RATE_LIMITED'
  | 'AUTH_FAILED'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE'
  | 'SERVICE_UNAVAILABLE'
  | 'QUOTA_EXCEEDED'
  | 'PLATFORM_QUERY_FAILED'
>;

/**
 * Platform error information
 */
export interface PlatformError {
  code: PlatformErrorCode;
  message: string;
  retryable: boolean;
  /** Suggested retry delay in ms */
  retryDelayMs?: number;
}

/**
 * Response from a platform query
 */
export interface PlatformQueryResponse {
  success: boolean;
  responseText?: string;
  /** Model that produced the response */
  model?: string;
  timing: ResponseTiming;
  tokenUsage?: TokenUsage;
  error?: PlatformError;
}

/**
 * Completion produced by one attempt of a concrete adapter
 */
export interface PlatformCompletion {
  responseText: string;
  model: string;
  tokenUsage?: TokenUsage;
}

/**
 * API configuration for API platforms
 */
export interface ApiConfig {
  /** API key */
  apiKey: string;
  /** Organization ID (OpenAI only) */
  organizationId?: string;
  /** Default model to use */
  defaultModel?: string;
  /** Base URL override */
  baseUrl?: string;
}

/**
 * Health check result
 */
export interface HealthCheckResult {
  healthy: boolean;
  latencyMs?: number;
  error?: string;
  lastSuccessAt?: Date;
  /** Consecutive failure count */
  failureCount: number;
}

/**
 * Adapter statistics
 */
export interface AdapterStats {
  totalQueries: number;
  successfulQueries: number;
  failedQueries: number;
  avgResponseTimeMs: number;
  totalTokensUsed: number;
  totalCostUsd: number;
  errorsByCode: Partial<Record<PlatformErrorCode, number>>;
  lastQueryAt?: Date;
}

/**
 * Platform adapter interface. New platforms are added by implementing this
 * and registering the adapter; nothing else sees request or response shapes.
 */
export interface PlatformAdapter {
  readonly metadata: PlatformMetadata;

  /**
   * Execute a query. Failures are returned, not thrown.
   */
  query(request: PlatformQueryRequest): Promise<PlatformQueryResponse>;

  /**
   * Check if the platform is reachable
   */
  healthCheck(): Promise<HealthCheckResult>;

  getStats(): AdapterStats;

  close(): Promise<void>;
}

/**
 * Outcome of a gateway query
 */
export type PlatformResult =
  | { ok: true; responseText: string }
  | { ok: false; error: PlatformFailure };
