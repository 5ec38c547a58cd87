/**
 * Platform Gateway
 *
 * Single entry point the executor uses to query AI platforms. Every failure,
 * including an unregistered platform or an adapter that throws, comes back as
 * a typed result; nothing is thrown past this boundary.
 */

import {
  CONNECTIVITY_TEST_PROMPT,
  ERROR_RESPONSE_PREFIX,
  Errors,
  createSilentLogger,
  errorMessage,
  type Logger,
  type PlatformFailure,
  type PlatformId,
} from '@lumora/core';
import type { PlatformRegistry } from './registry.js';
import type { AdapterStats, PlatformQueryRequest, PlatformResult } from './types.js';

/**
 * Request settings applied to every prompt
 */
export type RequestDefaults = Omit<PlatformQueryRequest, 'prompt'>;

export const DEFAULT_REQUEST: RequestDefaults = {
  maxTokens: 500,
  temperature: 0.7,
};

export interface PlatformGatewayOptions {
  logger?: Logger;
  requestDefaults?: RequestDefaults;
}

export class PlatformGateway {
  private readonly logger: Logger;
  private readonly requestDefaults: RequestDefaults;

  constructor(
    private readonly registry: PlatformRegistry,
    options: PlatformGatewayOptions = {}
  ) {
    this.logger = (options.logger ?? createSilentLogger()).child('platform-gateway');
    this.requestDefaults = { ...DEFAULT_REQUEST, ...options.requestDefaults };
  }

  /**
   * Ids of every registered platform
   */
  platforms(): PlatformId[] {
    return this.registry.ids();
  }

  async query(platformId: PlatformId, prompt: string): Promise<PlatformResult> {
    const adapter = this.registry.get(platformId);
    if (!adapter) {
      const error = Errors.unknownPlatform(platformId);
      this.logger.warning(error.message);
      return { ok: false, error: { code: error.code, message: error.message } };
    }

    try {
      const response = await adapter.query({ ...this.requestDefaults, prompt });
      if (response.success && response.responseText !== undefined) {
        return { ok: true, responseText: response.responseText };
      }

      const failure: PlatformFailure = {
        code: response.error?.code ?? 'PLATFORM_QUERY_FAILED',
        message: response.error?.message ?? 'Empty response',
      };
      this.logger.warning(`Query to ${platformId} failed`, {
        code: failure.code,
        error: failure.message,
        attempts: response.timing.attempts,
      });
      return { ok: false, error: failure };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warning(`Adapter for ${platformId} threw`, { error: message });
      return { ok: false, error: { code: 'PLATFORM_QUERY_FAILED', message } };
    }
  }

  /**
   * Probe each platform once with a short test prompt. Unregistered ids
   * report false.
   */
  async checkConnectivity(platformIds: PlatformId[] = this.registry.ids()): Promise<Record<PlatformId, boolean>> {
    const results: Record<PlatformId, boolean> = {};

    await Promise.all(
      platformIds.map(async (platformId) => {
        const adapter = this.registry.get(platformId);
        if (!adapter) {
          results[platformId] = false;
          return;
        }
        try {
          const health = await adapter.healthCheck();
          results[platformId] = health.healthy;
          if (!health.healthy) {
            this.logger.warning(`Connectivity check failed for ${platformId}`, { error: health.error });
          }
        } catch (error) {
          this.logger.warning(`Connectivity check threw for ${platformId}`, { error: errorMessage(error) });
          results[platformId] = false;
        }
      })
    );

    this.logger.debug('Connectivity checked', { prompt: CONNECTIVITY_TEST_PROMPT, results });
    return results;
  }

  getStats(): Record<PlatformId, AdapterStats> {
    const stats: Record<PlatformId, AdapterStats> = {};
    for (const platformId of this.registry.ids()) {
      const adapter = this.registry.get(platformId);
      if (adapter) {
        stats[platformId] = adapter.getStats();
      }
    }
    return stats;
  }

  async close(): Promise<void> {
    await this.registry.closeAll();
  }
}

/**
 * Text stored for a query outcome. Failures become error-marked text that
 * analysis counts as a response but never scans for mentions.
 */
export function toResponseText(platformId: PlatformId, result: PlatformResult): string {
  if (result.ok) {
    return result.responseText;
  }
  return `${ERROR_RESPONSE_PREFIX}${Errors.platformQueryFailed(platformId, result.error.message).message}`;
}

export function isErrorResponse(text: string): boolean {
  return text.startsWith(ERROR_RESPONSE_PREFIX);
}

export function createPlatformGateway(
  registry: PlatformRegistry,
  options: PlatformGatewayOptions = {}
): PlatformGateway {
  return new PlatformGateway(registry, options);
}
