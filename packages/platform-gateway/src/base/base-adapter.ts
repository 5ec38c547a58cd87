/**
 * Base Platform Adapter
 *
 * Abstract base class for all platform adapters with common functionality:
 * - Per-attempt deadline
 * - Retry with exponential backoff
 * - Error classification
 * - Health tracking and statistics
 */

import {
  CONNECTIVITY_TEST_PROMPT,
  DEFAULT_TIMEOUTS,
  RETRY_DEFAULTS,
  errorMessage,
  isLumoraError,
  sleep,
  withTimeout,
} from '@lumora/core';
import type {
  AdapterStats,
  HealthCheckResult,
  PlatformAdapter,
  PlatformCompletion,
  PlatformError,
  PlatformErrorCode,
  PlatformMetadata,
  PlatformQueryRequest,
  PlatformQueryResponse,
} from '../types.js';

/**
 * Base adapter configuration
 */
export interface BaseAdapterConfig {
  /** Deadline for one attempt, in ms */
  timeoutMs: number;
  /** Attempts after the first */
  maxRetries: number;
  /** Base retry delay in ms, doubled per attempt */
  retryDelayMs: number;
  /** Base retry delay after a rate limit response */
  rateLimitDelayMs: number;
  /** Consecutive platform-wide failures after which queries short-circuit */
  unhealthyThreshold: number;
}

/**
 * Default base adapter configuration
 */
export const DEFAULT_BASE_CONFIG: BaseAdapterConfig = {
  timeoutMs: DEFAULT_TIMEOUTS.PLATFORM_QUERY,
  maxRetries: RETRY_DEFAULTS.MAX_RETRIES,
  retryDelayMs: RETRY_DEFAULTS.BASE_DELAY_MS,
  rateLimitDelayMs: 10_000,
  unhealthyThreshold: 5,
};

/**
 * Error classification for retry decisions
 */
export interface ErrorClassification {
  code: PlatformErrorCode;
  retryable: boolean;
  /** Suggested delay before retry */
  retryDelayMs: number;
  /** Whether this indicates a platform-wide issue */
  platformWide: boolean;
}

/**
 * Abstract base class for platform adapters
 */
export abstract class BasePlatformAdapter implements PlatformAdapter {
  protected config: BaseAdapterConfig;
  protected stats: AdapterStats;
  protected healthState: HealthCheckResult;

  constructor(
    public readonly metadata: PlatformMetadata,
    config: Partial<BaseAdapterConfig> = {}
  ) {
    this.config = { ...DEFAULT_BASE_CONFIG, ...config };
    this.stats = {
      totalQueries: 0,
      successfulQueries: 0,
      failedQueries: 0,
      avgResponseTimeMs: 0,
      totalTokensUsed: 0,
      totalCostUsd: 0,
      errorsByCode: {},
    };
    this.healthState = { healthy: true, failureCount: 0 };
  }

  /**
   * Execute a query with deadline, retries and stats collection
   */
  async query(request: PlatformQueryRequest): Promise<PlatformQueryResponse> {
    const startTime = Date.now();

    if (!this.healthState.healthy && this.healthState.failureCount > this.config.unhealthyThreshold) {
      return this.fail(
        {
          code: 'SERVICE_UNAVAILABLE',
          message: `Platform unhealthy: ${this.healthState.error ?? 'repeated failures'}`,
          retryable: true,
        },
        startTime,
        0
      );
    }

    let lastError: PlatformError | undefined;
    let attempts = 0;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      attempts++;
      try {
        const completion = await this.attempt(request, this.config.timeoutMs);
        return this.succeed(completion, startTime, attempts);
      } catch (error) {
        const classification = this.classifyError(error);
        lastError = {
          code: classification.code,
          message: errorMessage(error),
          retryable: classification.retryable,
          retryDelayMs: classification.retryDelayMs,
        };

        if (classification.platformWide) {
          this.healthState.healthy = false;
          this.healthState.error = lastError.message;
          this.healthState.failureCount++;
        }

        if (!classification.retryable || attempt >= this.config.maxRetries) {
          break;
        }

        await sleep(classification.retryDelayMs * Math.pow(2, attempt));
      }
    }

    return this.fail(
      lastError ?? { code: 'PLATFORM_QUERY_FAILED', message: 'Unknown error', retryable: false },
      startTime,
      attempts
    );
  }

  /**
   * Run one attempt under the deadline, aborting the request when it passes
   */
  private async attempt(request: PlatformQueryRequest, timeoutMs: number): Promise<PlatformCompletion> {
    const controller = new AbortController();
    try {
      return await withTimeout(
        this.executeQuery(request, controller.signal),
        timeoutMs,
        `${this.metadata.id} query`
      );
    } finally {
      controller.abort();
    }
  }

  /**
   * Execute the actual query - implemented by subclasses.
   * Throw on failure; the base class classifies and retries.
   */
  protected abstract executeQuery(
    request: PlatformQueryRequest,
    signal: AbortSignal
  ): Promise<PlatformCompletion>;

  /**
   * Send one probe query without retries
   */
  async healthCheck(): Promise<HealthCheckResult> {
    const startTime = Date.now();

    try {
      await this.attempt(
        { prompt: CONNECTIVITY_TEST_PROMPT, maxTokens: 16 },
        Math.min(this.config.timeoutMs, DEFAULT_TIMEOUTS.CONNECTIVITY_PROBE)
      );
      this.healthState = {
        healthy: true,
        latencyMs: Date.now() - startTime,
        lastSuccessAt: new Date(),
        failureCount: 0,
      };
    } catch (error) {
      this.healthState = {
        ...this.healthState,
        healthy: false,
        latencyMs: Date.now() - startTime,
        error: errorMessage(error),
        failureCount: this.healthState.failureCount + 1,
      };
    }

    return { ...this.healthState };
  }

  getStats(): AdapterStats {
    return { ...this.stats, errorsByCode: { ...this.stats.errorsByCode } };
  }

  /**
   * Close/cleanup the adapter
   */
  abstract close(): Promise<void>;

  /**
   * Classify an error for retry/handling decisions
   */
  protected classifyError(error: unknown): ErrorClassification {
    if (isLumoraError(error) && error.code === 'TIMEOUT') {
      return { code: 'TIMEOUT', retryable: true, retryDelayMs: this.config.retryDelayMs, platformWide: false };
    }

    const message = errorMessage(error).toLowerCase();

    // Rate limiting
    if (message.includes('rate limit') || message.includes('429') || message.includes('too many requests')) {
      return {
        code: 'RATE_LIMITED',
        retryable: true,
        retryDelayMs: this.config.rateLimitDelayMs,
        platformWide: true,
      };
    }

    // Authentication
    if (
      message.includes('unauthorized') ||
      message.includes('401') ||
      message.includes('forbidden') ||
      message.includes('403') ||
      message.includes('api key')
    ) {
      return { code: 'AUTH_FAILED', retryable: false, retryDelayMs: 0, platformWide: true };
    }

    // Timeout
    if (message.includes('timeout') || message.includes('timed out') || message.includes('etimedout')) {
      return { code: 'TIMEOUT', retryable: true, retryDelayMs: this.config.retryDelayMs, platformWide: false };
    }

    // Network errors
    if (
      message.includes('network') ||
      message.includes('fetch failed') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('enotfound')
    ) {
      return {
        code: 'NETWORK_ERROR',
        retryable: true,
        retryDelayMs: this.config.retryDelayMs * 2,
        platformWide: false,
      };
    }

    // Service unavailable
    if (
      message.includes('503') ||
      message.includes('502') ||
      message.includes('500') ||
      message.includes('service unavailable') ||
      message.includes('overloaded')
    ) {
      return {
        code: 'SERVICE_UNAVAILABLE',
        retryable: true,
        retryDelayMs: this.config.retryDelayMs * 3,
        platformWide: true,
      };
    }

    // Quota exceeded
    if (message.includes('quota') || message.includes('limit exceeded') || message.includes('billing')) {
      return { code: 'QUOTA_EXCEEDED', retryable: false, retryDelayMs: 0, platformWide: true };
    }

    // Invalid response
    if (message.includes('invalid') || message.includes('parse') || message.includes('json')) {
      return {
        code: 'INVALID_RESPONSE',
        retryable: true,
        retryDelayMs: this.config.retryDelayMs,
        platformWide: false,
      };
    }

    return {
      code: 'PLATFORM_QUERY_FAILED',
      retryable: true,
      retryDelayMs: this.config.retryDelayMs,
      platformWide: false,
    };
  }

  /**
   * Record a successful query and build its response
   */
  protected succeed(
    completion: PlatformCompletion,
    startTime: number,
    attempts: number
  ): PlatformQueryResponse {
    const totalMs = Date.now() - startTime;

    this.stats.totalQueries++;
    this.stats.successfulQueries++;
    this.stats.lastQueryAt = new Date();
    this.stats.avgResponseTimeMs =
      (this.stats.avgResponseTimeMs * (this.stats.successfulQueries - 1) + totalMs) /
      this.stats.successfulQueries;

    if (completion.tokenUsage) {
      this.stats.totalTokensUsed += completion.tokenUsage.totalTokens;
      this.stats.totalCostUsd += completion.tokenUsage.estimatedCostUsd ?? 0;
    }

    this.healthState.healthy = true;
    this.healthState.lastSuccessAt = new Date();
    this.healthState.failureCount = 0;
    this.healthState.error = undefined;

    return {
      success: true,
      responseText: completion.responseText,
      model: completion.model,
      tokenUsage: completion.tokenUsage,
      timing: { totalMs, attempts },
    };
  }

  /**
   * Record a failed query and build its error response
   */
  protected fail(error: PlatformError, startTime: number, attempts: number): PlatformQueryResponse {
    this.stats.totalQueries++;
    this.stats.failedQueries++;
    this.stats.errorsByCode[error.code] = (this.stats.errorsByCode[error.code] ?? 0) + 1;
    this.stats.lastQueryAt = new Date();

    return {
      success: false,
      timing: { totalMs: Date.now() - startTime, attempts },
      error,
    };
  }
}
