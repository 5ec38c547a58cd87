/**
 * Mention analysis types
 */

import type { PlatformId } from './profile.js';

export type Sentiment = 'positive' | 'neutral' | 'negative';

export type SentimentTally = Record<Sentiment, number>;

/**
 * One literal occurrence of an entity in one response
 */
export interface MentionRecord {
  entityName: string;
  platform: PlatformId;
  prompt: string;
  /** Position of the prompt in the platform's response list */
  promptIndex: number;
  /** Surface form as it appears in the response */
  mention: string;
  /** Up to 50 characters either side of the occurrence */
  context: string;
  /** Rank extracted from the response, shared by all records of that response */
  rank: number | null;
  /** Sentiment of the response toward the entity */
  sentiment: Sentiment;
  /** True for exactly one record per mentioning response */
  counted: boolean;
}

/**
 * A mentioning (prompt, response) pair kept for illustration
 */
export interface SampleMention {
  prompt: string;
  response: string;
  mentions: string[];
}

/**
 * Mention rollup for one platform
 */
export interface PlatformMentionDetail {
  /** Responses mentioning the entity */
  mentions: number;
  /** Responses received from the platform */
  responses: number;
  mentionRate: number;
  rankings: number[];
  /** Unrounded mean of `rankings`, null when empty */
  averageRanking: number | null;
  sentiment: SentimentTally;
  /** First five mentioning responses */
  sampleMentions: SampleMention[];
}

/**
 * Rollup of mentions, ranks and sentiment for one entity
 */
export interface EntityAnalysis {
  entityName: string;
  platformMentions: Record<PlatformId, number>;
  platformDetails: Record<PlatformId, PlatformMentionDetail>;
  totalMentions: number;
  totalResponses: number;
  rankings: number[];
  /** Rounded mean of all ranks; null when no rank was extracted */
  averageRanking: number | null;
  mentions: MentionRecord[];
  sentimentAnalysis: Record<PlatformId, SentimentTally>;
}
