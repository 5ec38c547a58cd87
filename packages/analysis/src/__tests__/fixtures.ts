/**
 * Builders for analysis test data
 */

import type {
  EntityAnalysis,
  PlatformMentionDetail,
  PlatformResponses,
  PromptResponse,
  SentimentTally,
} from '@lumora/core';

/**
 * Platform responses with generated prompt texts
 */
export function responsesFor(texts: Record<string, string[]>): PlatformResponses {
  const responses: PlatformResponses = {};
  for (const [platform, list] of Object.entries(texts)) {
    responses[platform] = list.map(
      (response, index): PromptResponse => ({ prompt: `Prompt ${index + 1}`, response })
    );
  }
  return responses;
}

export interface EntityOptions {
  /** Responses per platform */
  responses?: number;
  averageRanking?: number | null;
  sentiment?: Record<string, SentimentTally>;
}

/**
 * Hand-built EntityAnalysis with consistent totals
 */
export function entity(
  entityName: string,
  platformMentions: Record<string, number>,
  options: EntityOptions = {}
): EntityAnalysis {
  const perPlatform = options.responses ?? 10;
  const averageRanking = options.averageRanking ?? null;
  const platformDetails: Record<string, PlatformMentionDetail> = {};
  const sentimentAnalysis: Record<string, SentimentTally> = {};
  let totalMentions = 0;

  for (const [platform, mentions] of Object.entries(platformMentions)) {
    const sentiment = options.sentiment?.[platform] ?? { positive: 0, neutral: 0, negative: 0 };
    platformDetails[platform] = {
      mentions,
      responses: perPlatform,
      mentionRate: perPlatform > 0 ? mentions / perPlatform : 0,
      rankings: averageRanking === null ? [] : [averageRanking],
      averageRanking,
      sentiment,
      sampleMentions: [],
    };
    sentimentAnalysis[platform] = sentiment;
    totalMentions += mentions;
  }

  return {
    entityName,
    platformMentions: { ...platformMentions },
    platformDetails,
    totalMentions,
    totalResponses: perPlatform * Object.keys(platformMentions).length,
    rankings: averageRanking === null ? [] : [averageRanking],
    averageRanking,
    mentions: [],
    sentimentAnalysis,
  };
}
