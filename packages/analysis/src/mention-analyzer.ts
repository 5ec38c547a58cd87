/**
 * Mention Analyzer
 *
 * Scans platform responses for one entity and rolls up mention counts,
 * extracted ranks, context windows and sentiment.
 */

import {
  ERROR_RESPONSE_PREFIX,
  type EntityAnalysis,
  type MentionRecord,
  type PlatformId,
  type PlatformMentionDetail,
  type PlatformResponses,
  type PromptResponse,
  type SampleMention,
  type SentimentTally,
} from '@lumora/core';
import { extractContext, extractRank, findOccurrences } from './matching.js';
import { KeywordProximitySentiment, type SentimentStrategy } from './sentiment.js';
import { emptyTally, mean, roundHalfEven } from './utils.js';

export interface MentionAnalyzerConfig {
  sentiment?: SentimentStrategy;
  /** Mentioning responses kept per platform as samples */
  sampleLimit?: number;
}

export const DEFAULT_MENTION_ANALYZER_CONFIG = {
  sampleLimit: 5,
} as const;

export class MentionAnalyzer {
  private sentiment: SentimentStrategy;
  private sampleLimit: number;

  constructor(config: MentionAnalyzerConfig = {}) {
    this.sentiment = config.sentiment ?? new KeywordProximitySentiment();
    this.sampleLimit = config.sampleLimit ?? DEFAULT_MENTION_ANALYZER_CONFIG.sampleLimit;
  }

  /**
   * Analyze every response for `entityName`. Pure: the same inputs always
   * produce an equal result.
   */
  analyze(responsesByPlatform: PlatformResponses, entityName: string): EntityAnalysis {
    const platformMentions: Record<PlatformId, number> = {};
    const platformDetails: Record<PlatformId, PlatformMentionDetail> = {};
    const sentimentAnalysis: Record<PlatformId, SentimentTally> = {};
    const mentions: MentionRecord[] = [];
    const rankings: number[] = [];
    let totalMentions = 0;
    let totalResponses = 0;

    for (const [platform, responses] of Object.entries(responsesByPlatform)) {
      const detail = emptyPlatformDetail(responses.length);

      responses.forEach((entry, promptIndex) => {
        if (isFailedResponse(entry)) {
          return;
        }
        const occurrences = findOccurrences(entry.response, entityName);
        if (occurrences.length === 0) {
          return;
        }

        detail.mentions++;
        const rank = extractRank(entry.response, entityName);
        if (rank !== null) {
          detail.rankings.push(rank);
        }

        const sentiment = this.sentiment.classify(entry.response, entityName);
        detail.sentiment[sentiment]++;

        occurrences.forEach((occurrence, position) => {
          mentions.push({
            entityName,
            platform,
            prompt: entry.prompt,
            promptIndex,
            mention: occurrence.text,
            context: extractContext(entry.response, occurrence),
            rank,
            sentiment,
            counted: position === 0,
          });
        });

        if (detail.sampleMentions.length < this.sampleLimit) {
          const sample: SampleMention = {
            prompt: entry.prompt,
            response: entry.response,
            mentions: occurrences.map((occurrence) => occurrence.text),
          };
          detail.sampleMentions.push(sample);
        }
      });

      detail.mentionRate = detail.responses > 0 ? detail.mentions / detail.responses : 0;
      detail.averageRanking = mean(detail.rankings);

      platformMentions[platform] = detail.mentions;
      platformDetails[platform] = detail;
      sentimentAnalysis[platform] = detail.sentiment;
      rankings.push(...detail.rankings);
      totalMentions += detail.mentions;
      totalResponses += detail.responses;
    }

    const averageRanking = mean(rankings);

    return {
      entityName,
      platformMentions,
      platformDetails,
      totalMentions,
      totalResponses,
      rankings,
      averageRanking: averageRanking === null ? null : roundHalfEven(averageRanking),
      mentions,
      sentimentAnalysis,
    };
  }
}

/**
 * Failed queries still count as responses but carry no mentions
 */
function isFailedResponse(entry: PromptResponse): boolean {
  return entry.error !== undefined || entry.response.startsWith(ERROR_RESPONSE_PREFIX);
}

function emptyPlatformDetail(responses: number): PlatformMentionDetail {
  return {
    mentions: 0,
    responses,
    mentionRate: 0,
    rankings: [],
    averageRanking: null,
    sentiment: emptyTally(),
    sampleMentions: [],
  };
}

/**
 * Analysis with every count at zero, used when an entity could not be
 * analyzed. Platform response counts are kept so rates stay comparable.
 */
export function emptyEntityAnalysis(
  entityName: string,
  responsesByPlatform: PlatformResponses = {}
): EntityAnalysis {
  const platformMentions: Record<PlatformId, number> = {};
  const platformDetails: Record<PlatformId, PlatformMentionDetail> = {};
  const sentimentAnalysis: Record<PlatformId, SentimentTally> = {};
  let totalResponses = 0;

  for (const [platform, responses] of Object.entries(responsesByPlatform)) {
    const detail = emptyPlatformDetail(responses.length);
    platformMentions[platform] = 0;
    platformDetails[platform] = detail;
    sentimentAnalysis[platform] = detail.sentiment;
    totalResponses += responses.length;
  }

  return {
    entityName,
    platformMentions,
    platformDetails,
    totalMentions: 0,
    totalResponses,
    rankings: [],
    averageRanking: null,
    mentions: [],
    sentimentAnalysis,
  };
}

export function createMentionAnalyzer(config?: MentionAnalyzerConfig): MentionAnalyzer {
  return new MentionAnalyzer(config);
}
