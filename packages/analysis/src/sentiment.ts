/**
 * Sentiment classification of a response toward an entity
 */

import { z } from 'zod';
import { Errors, describeValidationErrors, formatValidationErrors } from '@lumora/core';
import type { Sentiment } from '@lumora/core';
import keywordData from '../data/sentiment-keywords.json' with { type: 'json' };
import { findOccurrences } from './matching.js';

/**
 * Pluggable classifier. Implementations must be pure: the same text and
 * entity always give the same label.
 */
export interface SentimentStrategy {
  readonly name: string;
  classify(text: string, entityName: string): Sentiment;
}

export const SentimentKeywordsSchema = z.object({
  positive: z.array(z.string().trim().min(1)).min(1),
  negative: z.array(z.string().trim().min(1)).min(1),
});

export type SentimentKeywords = z.infer<typeof SentimentKeywordsSchema>;

export function loadSentimentKeywords(data: unknown): SentimentKeywords {
  const result = SentimentKeywordsSchema.safeParse(data);
  if (!result.success) {
    throw Errors.configurationError(
      `Invalid sentiment keywords: ${describeValidationErrors(formatValidationErrors(result.error))}`
    );
  }
  return {
    positive: result.data.positive.map((word) => word.toLowerCase()),
    negative: result.data.negative.map((word) => word.toLowerCase()),
  };
}

export const DEFAULT_SENTIMENT_KEYWORDS: SentimentKeywords = loadSentimentKeywords(keywordData);

export interface KeywordSentimentConfig {
  keywords?: SentimentKeywords;
  /** Characters inspected either side of each occurrence */
  windowRadius?: number;
}

export const DEFAULT_KEYWORD_SENTIMENT_CONFIG = {
  windowRadius: 100,
} as const;

/**
 * Keyword proximity classifier.
 *
 * Each occurrence of the entity contributes (+1 per distinct positive
 * keyword, -1 per distinct negative keyword) found as a substring of the
 * lowercased window around it. A positive sum is "positive", a negative sum
 * "negative", anything else "neutral".
 */
export class KeywordProximitySentiment implements SentimentStrategy {
  readonly name = 'keyword-proximity';

  private keywords: SentimentKeywords;
  private windowRadius: number;

  constructor(config: KeywordSentimentConfig = {}) {
    this.keywords = config.keywords ?? DEFAULT_SENTIMENT_KEYWORDS;
    this.windowRadius = config.windowRadius ?? DEFAULT_KEYWORD_SENTIMENT_CONFIG.windowRadius;
  }

  classify(text: string, entityName: string): Sentiment {
    return labelFor(this.score(text, entityName));
  }

  /**
   * Raw keyword balance across all occurrences
   */
  score(text: string, entityName: string): number {
    let total = 0;

    for (const occurrence of findOccurrences(text, entityName)) {
      const start = Math.max(0, occurrence.index - this.windowRadius);
      const end = Math.min(text.length, occurrence.index + occurrence.text.length + this.windowRadius);
      const window = text.slice(start, end).toLowerCase();

      const positive = this.keywords.positive.filter((word) => window.includes(word)).length;
      const negative = this.keywords.negative.filter((word) => window.includes(word)).length;
      total += positive - negative;
    }

    return total;
  }
}

function labelFor(score: number): Sentiment {
  if (score > 0) return 'positive';
  if (score < 0) return 'negative';
  return 'neutral';
}

export function createKeywordSentiment(config?: KeywordSentimentConfig): KeywordProximitySentiment {
  return new KeywordProximitySentiment(config);
}
