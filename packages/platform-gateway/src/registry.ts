/**
 * Platform registry
 *
 * Maps platform ids to adapters. Populated once at start-up; lookups never
 * branch on the platform id.
 */

import { Errors } from '@lumora/core';
import type { BaseAdapterConfig } from './base/base-adapter.js';
import { createAnthropicAdapter } from './api-platforms/anthropic-adapter.js';
import { createGeminiAdapter } from './api-platforms/gemini-adapter.js';
import { createOpenAIAdapter } from './api-platforms/openai-adapter.js';
import { createPerplexityAdapter } from './api-platforms/perplexity-adapter.js';
import { API_PLATFORM_IDS, type ApiPlatformId, type PlatformCredentials } from './credentials.js';
import type { ApiConfig, PlatformAdapter, PlatformMetadata } from './types.js';

type AdapterFactory = (config: Partial<BaseAdapterConfig> & { apiConfig: ApiConfig }) => PlatformAdapter;

/**
 * HTTP binding per platform id
 */
export const API_ADAPTER_FACTORIES: Record<ApiPlatformId, AdapterFactory> = {
  openai: createOpenAIAdapter,
  gemini: createGeminiAdapter,
  perplexity: createPerplexityAdapter,
  anthropic: createAnthropicAdapter,
};

export class PlatformRegistry {
  private adapters = new Map<string, PlatformAdapter>();

  /**
   * Register an adapter under its metadata id, replacing any previous one
   */
  register(adapter: PlatformAdapter): this {
    this.adapters.set(adapter.metadata.id, adapter);
    return this;
  }

  has(platformId: string): boolean {
    return this.adapters.has(platformId);
  }

  get(platformId: string): PlatformAdapter | undefined {
    return this.adapters.get(platformId);
  }

  /**
   * @throws LumoraError UNKNOWN_PLATFORM when nothing is registered under the id
   */
  require(platformId: string): PlatformAdapter {
    const adapter = this.adapters.get(platformId);
    if (!adapter) {
      throw Errors.unknownPlatform(platformId);
    }
    return adapter;
  }

  ids(): string[] {
    return [...this.adapters.keys()];
  }

  list(): PlatformMetadata[] {
    return [...this.adapters.values()].map((adapter) => adapter.metadata);
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.adapters.values()].map((adapter) => adapter.close()));
    this.adapters.clear();
  }
}

/**
 * Registry holding an HTTP adapter for every platform with credentials
 */
export function createDefaultRegistry(
  credentials: PlatformCredentials,
  options: Partial<BaseAdapterConfig> = {}
): PlatformRegistry {
  const registry = new PlatformRegistry();

  for (const platform of API_PLATFORM_IDS) {
    const apiConfig = credentials[platform];
    if (apiConfig) {
      registry.register(API_ADAPTER_FACTORIES[platform]({ ...options, apiConfig }));
    }
  }

  return registry;
}
