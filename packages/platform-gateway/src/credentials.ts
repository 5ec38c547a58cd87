/**
 * Resolve per-platform API configuration from the process environment
 */

import type { ApiConfig } from './types.js';

/**
 * Platforms with an HTTP binding
 */
export type ApiPlatformId = 'openai' | 'gemini' | 'perplexity' | 'anthropic';

export const API_PLATFORM_IDS: readonly ApiPlatformId[] = ['openai', 'gemini', 'perplexity', 'anthropic'];

export type PlatformCredentials = Partial<Record<ApiPlatformId, ApiConfig>>;

/**
 * Environment variables checked per platform, first non-empty wins
 */
export const CREDENTIAL_ENV_KEYS: Record<ApiPlatformId, readonly string[]> = {
  openai: ['OPENAI_API_KEY'],
  gemini: ['GEMINI_API_KEY', 'GOOGLE_AI_API_KEY'],
  perplexity: ['PERPLEXITY_API_KEY'],
  anthropic: ['ANTHROPIC_API_KEY'],
};

/**
 * Optional model overrides, e.g. OPENAI_MODEL=gpt-4o-mini
 */
const MODEL_ENV_KEYS: Record<ApiPlatformId, string> = {
  openai: 'OPENAI_MODEL',
  gemini: 'GEMINI_MODEL',
  perplexity: 'PERPLEXITY_MODEL',
  anthropic: 'ANTHROPIC_MODEL',
};

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build API configs for every platform whose key is present. Platforms
 * without a key are left out.
 */
export function resolvePlatformCredentials(env: NodeJS.ProcessEnv = process.env): PlatformCredentials {
  const credentials: PlatformCredentials = {};

  for (const platform of API_PLATFORM_IDS) {
    const apiKey = CREDENTIAL_ENV_KEYS[platform]
      .map((key) => readEnv(env, key))
      .find((value) => value !== undefined);
    if (!apiKey) {
      continue;
    }

    const config: ApiConfig = { apiKey };
    const model = readEnv(env, MODEL_ENV_KEYS[platform]);
    if (model) {
      config.defaultModel = model;
    }
    if (platform === 'openai') {
      const organizationId = readEnv(env, 'OPENAI_ORG_ID');
      if (organizationId) {
        config.organizationId = organizationId;
      }
    }
    credentials[platform] = config;
  }

  return credentials;
}

export function isApiPlatformId(id: string): id is ApiPlatformId {
  return API_PLATFORM_IDS.some((platform) => platform === id);
}
