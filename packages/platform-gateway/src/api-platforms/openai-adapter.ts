/**
 * OpenAI Platform Adapter
 *
 * Adapter for OpenAI's chat completions API
 */

import { z } from 'zod';
import { BasePlatformAdapter, type BaseAdapterConfig } from '../base/base-adapter.js';
import { estimateCost, parseResponse, postJson } from '../base/http.js';
import type {
  ApiConfig,
  PlatformCompletion,
  PlatformMetadata,
  PlatformQueryRequest,
  TokenUsage,
} from '../types.js';

/**
 * OpenAI adapter configuration
 */
export interface OpenAIAdapterConfig extends Partial<BaseAdapterConfig> {
  apiConfig: ApiConfig;
}

interface OpenAIChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

const OpenAIChatResponseSchema = z.object({
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1, 'No choices in response'),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

type OpenAIChatResponse = z.infer<typeof OpenAIChatResponseSchema>;

/**
 * OpenAI platform metadata
 */
export const OPENAI_METADATA: PlatformMetadata = {
  id: 'openai',
  name: 'OpenAI',
  authRequirement: 'api_key',
  baseUrl: 'https://api.openai.com/v1',
  defaultModel: 'gpt-4o',
};

/**
 * Model pricing per 1K tokens
 */
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'gpt-4o': { input: 0.0025, output: 0.01 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
  'gpt-4-turbo': { input: 0.01, output: 0.03 },
  'gpt-3.5-turbo': { input: 0.0005, output: 0.0015 },
};

/**
 * OpenAI Platform Adapter
 */
export class OpenAIAdapter extends BasePlatformAdapter {
  private apiConfig: ApiConfig;
  private defaultModel: string;

  constructor(config: OpenAIAdapterConfig) {
    super(OPENAI_METADATA, config);
    this.apiConfig = config.apiConfig;
    this.defaultModel = config.apiConfig.defaultModel ?? OPENAI_METADATA.defaultModel;

    if (!this.apiConfig.apiKey) {
      throw new Error('OpenAI API key is required');
    }
  }

  protected async executeQuery(
    request: PlatformQueryRequest,
    signal: AbortSignal
  ): Promise<PlatformCompletion> {
    const model = request.model ?? this.defaultModel;

    const messages: OpenAIChatMessage[] = [{ role: 'user', content: request.prompt }];

    const body: Record<string, unknown> = { model, messages };
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.maxTokens) {
      body.max_tokens = request.maxTokens;
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiConfig.apiKey}`,
    };
    if (this.apiConfig.organizationId) {
      headers['OpenAI-Organization'] = this.apiConfig.organizationId;
    }

    const payload = await postJson(
      `${this.apiConfig.baseUrl ?? OPENAI_METADATA.baseUrl}/chat/completions`,
      headers,
      body,
      signal
    );
    const response = parseResponse(OpenAIChatResponseSchema, payload, OPENAI_METADATA.name);

    return {
      responseText: response.choices[0].message.content ?? '',
      model: response.model,
      tokenUsage: this.calculateTokenUsage(response.usage, model),
    };
  }

  private calculateTokenUsage(
    usage: OpenAIChatResponse['usage'],
    model: string
  ): TokenUsage | undefined {
    if (!usage) {
      return undefined;
    }
    const pricing = MODEL_PRICING[model] ?? MODEL_PRICING['gpt-4o'];
    return {
      inputTokens: usage.prompt_tokens,
      outputTokens: usage.completion_tokens,
      totalTokens: usage.total_tokens,
      estimatedCostUsd: estimateCost(pricing, usage.prompt_tokens, usage.completion_tokens),
    };
  }

  async close(): Promise<void> {
    // No persistent connections to close for API adapter
  }
}

/**
 * Create an OpenAI adapter
 */
export function createOpenAIAdapter(config: OpenAIAdapterConfig): OpenAIAdapter {
  return new OpenAIAdapter(config);
}
