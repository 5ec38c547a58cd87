/**
 * Anthropic Platform Adapter
 *
 * Adapter for Anthropic's Messages API
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

export interface AnthropicAdapterConfig extends Partial<BaseAdapterConfig> {
  apiConfig: ApiConfig;
  /** Value of the anthropic-version header */
  apiVersion?: string;
}

const AnthropicResponseSchema = z.object({
  model: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

export const ANTHROPIC_METADATA: PlatformMetadata = {
  id: 'anthropic',
  name: 'Anthropic',
  authRequirement: 'api_key',
  baseUrl: 'https://api.anthropic.com/v1',
  defaultModel: 'claude-3-5-haiku-latest',
};

/**
 * Model pricing per 1K tokens, matched by model prefix
 */
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'claude-3-5-haiku': { input: 0.0008, output: 0.004 },
  'claude-3-5-sonnet': { input: 0.003, output: 0.015 },
  'claude-3-opus': { input: 0.015, output: 0.075 },
};

/**
 * Messages API requires an explicit output cap
 */
const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicAdapter extends BasePlatformAdapter {
  private apiConfig: ApiConfig;
  private defaultModel: string;
  private apiVersion: string;

  constructor(config: AnthropicAdapterConfig) {
    super(ANTHROPIC_METADATA, config);
    this.apiConfig = config.apiConfig;
    this.defaultModel = config.apiConfig.defaultModel ?? ANTHROPIC_METADATA.defaultModel;
    this.apiVersion = config.apiVersion ?? '2023-06-01';

    if (!this.apiConfig.apiKey) {
      throw new Error('Anthropic API key is required');
    }
  }

  protected async executeQuery(
    request: PlatformQueryRequest,
    signal: AbortSignal
  ): Promise<PlatformCompletion> {
    const model = request.model ?? this.defaultModel;

    const body: Record<string, unknown> = {
      model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: [{ role: 'user', content: request.prompt }],
    };
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }

    const payload = await postJson(
      `${this.apiConfig.baseUrl ?? ANTHROPIC_METADATA.baseUrl}/messages`,
      {
        'x-api-key': this.apiConfig.apiKey,
        'anthropic-version': this.apiVersion,
      },
      body,
      signal
    );
    const response = parseResponse(AnthropicResponseSchema, payload, ANTHROPIC_METADATA.name);

    const responseText = response.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    const usage = response.usage;
    const pricingKey = Object.keys(MODEL_PRICING).find((prefix) => model.startsWith(prefix));
    const pricing = MODEL_PRICING[pricingKey ?? 'claude-3-5-haiku'];

    return {
      responseText,
      model: response.model,
      tokenUsage: usage
        ? {
            inputTokens: usage.input_tokens,
            outputTokens: usage.output_tokens,
            totalTokens: usage.input_tokens + usage.output_tokens,
            estimatedCostUsd: estimateCost(pricing, usage.input_tokens, usage.output_tokens),
          }
        : undefined,
    };
  }

  async close(): Promise<void> {
    // No persistent connections to close for API adapter
  }
}

export function createAnthropicAdapter(config: AnthropicAdapterConfig): AnthropicAdapter {
  return new AnthropicAdapter(config);
}
