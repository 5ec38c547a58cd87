/**
 * Google Gemini Platform Adapter
 *
 * Adapter for the Gemini generateContent API
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

export interface GeminiAdapterConfig extends Partial<BaseAdapterConfig> {
  apiConfig: ApiConfig;
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).default([]),
        }),
        finishReason: z.string().optional(),
      })
    )
    .min(1, 'No candidates in response'),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().default(0),
      candidatesTokenCount: z.number().default(0),
      totalTokenCount: z.number().default(0),
    })
    .optional(),
});

type GeminiResponse = z.infer<typeof GeminiResponseSchema>;

export const GEMINI_METADATA: PlatformMetadata = {
  id: 'gemini',
  name: 'Google Gemini',
  authRequirement: 'api_key',
  baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
  defaultModel: 'gemini-2.5-flash',
};

/**
 * Model pricing per 1K tokens
 */
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'gemini-2.5-flash': { input: 0.0003, output: 0.0025 },
  'gemini-2.5-pro': { input: 0.00125, output: 0.01 },
  'gemini-2.0-flash': { input: 0.0001, output: 0.0004 },
};

export class GeminiAdapter extends BasePlatformAdapter {
  private apiConfig: ApiConfig;
  private defaultModel: string;

  constructor(config: GeminiAdapterConfig) {
    super(GEMINI_METADATA, config);
    this.apiConfig = config.apiConfig;
    this.defaultModel = config.apiConfig.defaultModel ?? GEMINI_METADATA.defaultModel;

    if (!this.apiConfig.apiKey) {
      throw new Error('Gemini API key is required');
    }
  }

  protected async executeQuery(
    request: PlatformQueryRequest,
    signal: AbortSignal
  ): Promise<PlatformCompletion> {
    const model = request.model ?? this.defaultModel;
    const baseUrl = this.apiConfig.baseUrl ?? GEMINI_METADATA.baseUrl;

    const body: Record<string, unknown> = {
      contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
    };

    const generationConfig: Record<string, unknown> = {};
    if (request.temperature !== undefined) {
      generationConfig.temperature = request.temperature;
    }
    if (request.maxTokens) {
      generationConfig.maxOutputTokens = request.maxTokens;
    }
    if (Object.keys(generationConfig).length > 0) {
      body.generationConfig = generationConfig;
    }

    const payload = await postJson(
      `${baseUrl}/models/${model}:generateContent`,
      { 'x-goog-api-key': this.apiConfig.apiKey },
      body,
      signal
    );
    const response = parseResponse(GeminiResponseSchema, payload, GEMINI_METADATA.name);

    const responseText = response.candidates[0].content.parts
      .map((part) => part.text ?? '')
      .join('\n');

    return {
      responseText,
      model,
      tokenUsage: this.calculateTokenUsage(response.usageMetadata, model),
    };
  }

  private calculateTokenUsage(
    usage: GeminiResponse['usageMetadata'],
    model: string
  ): TokenUsage | undefined {
    if (!usage) {
      return undefined;
    }
    const pricing = MODEL_PRICING[model] ?? MODEL_PRICING['gemini-2.5-flash'];
    return {
      inputTokens: usage.promptTokenCount,
      outputTokens: usage.candidatesTokenCount,
      totalTokens: usage.totalTokenCount,
      estimatedCostUsd: estimateCost(pricing, usage.promptTokenCount, usage.candidatesTokenCount),
    };
  }

  async close(): Promise<void> {
    // No persistent connections to close for API adapter
  }
}

export function createGeminiAdapter(config: GeminiAdapterConfig): GeminiAdapter {
  return new GeminiAdapter(config);
}
