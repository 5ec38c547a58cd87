/**
 * Perplexity Platform Adapter
 *
 * Adapter for Perplexity's OpenAI-compatible API (Sonar models)
 */

import { z } from 'zod';
import { BasePlatformAdapter, type BaseAdapterConfig } from '../base/base-adapter.js';
import { estimateCost, parseResponse, postJson } from '../base/http.js';
import type {
  ApiConfig,
  PlatformCompletion,
  PlatformMetadata,
  PlatformQueryRequest,
} from '../types.js';

export interface PerplexityAdapterConfig extends Partial<BaseAdapterConfig> {
  apiConfig: ApiConfig;
}

/**
 * System prompt sent with every query
 */
export const PERPLEXITY_SYSTEM_PROMPT = 'Be precise and concise in your response.';

const PerplexityResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1, 'No choices in response'),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export const PERPLEXITY_METADATA: PlatformMetadata = {
  id: 'perplexity',
  name: 'Perplexity',
  authRequirement: 'api_key',
  baseUrl: 'https://api.perplexity.ai',
  defaultModel: 'sonar',
};

/**
 * Model pricing per 1K tokens
 */
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'sonar': { input: 0.001, output: 0.001 },
  'sonar-pro': { input: 0.003, output: 0.015 },
};

export class PerplexityAdapter extends BasePlatformAdapter {
  private apiConfig: ApiConfig;
  private defaultModel: string;

  constructor(config: PerplexityAdapterConfig) {
    super(PERPLEXITY_METADATA, config);
    this.apiConfig = config.apiConfig;
    this.defaultModel = config.apiConfig.defaultModel ?? PERPLEXITY_METADATA.defaultModel;

    if (!this.apiConfig.apiKey) {
      throw new Error('Perplexity API key is required');
    }
  }

  protected async executeQuery(
    request: PlatformQueryRequest,
    signal: AbortSignal
  ): Promise<PlatformCompletion> {
    const model = request.model ?? this.defaultModel;

    const body: Record<string, unknown> = {
      model,
      messages: [
        { role: 'system', content: PERPLEXITY_SYSTEM_PROMPT },
        { role: 'user', content: request.prompt },
      ],
    };
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.maxTokens) {
      body.max_tokens = request.maxTokens;
    }

    const payload = await postJson(
      `${this.apiConfig.baseUrl ?? PERPLEXITY_METADATA.baseUrl}/chat/completions`,
      { Authorization: `Bearer ${this.apiConfig.apiKey}` },
      body,
      signal
    );
    const response = parseResponse(PerplexityResponseSchema, payload, PERPLEXITY_METADATA.name);
    const usage = response.usage;
    const pricing = MODEL_PRICING[model] ?? MODEL_PRICING['sonar'];

    return {
      responseText: response.choices[0].message.content,
      model: response.model ?? model,
      tokenUsage: usage
        ? {
            inputTokens: usage.prompt_tokens,
            outputTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
            estimatedCostUsd: estimateCost(pricing, usage.prompt_tokens, usage.completion_tokens),
          }
        : undefined,
    };
  }

  async close(): Promise<void> {
    // No persistent connections to close for API adapter
  }
}

export function createPerplexityAdapter(config: PerplexityAdapterConfig): PerplexityAdapter {
  return new PerplexityAdapter(config);
}
