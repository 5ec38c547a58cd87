/**
 * Competitive insight and visibility score types
 */

import type { PlatformId } from './profile.js';

export type PlatformStatus = 'leading' | 'competitive' | 'lagging';

export interface PlatformPerformance {
  brandMentions: number;
  avgCompetitorMentions: number;
  /** Brand mentions divided by the competitor mean, 0 when the mean is 0 */
  performanceRatio: number;
  status: PlatformStatus;
}

export interface MarketPosition {
  /** Share of achievable comparison points won, 0-100 */
  positionScore: number;
  betterThanCount: number;
  worseThanCount: number;
  /** 1-based rank of the brand by total mentions */
  marketRank: number;
  totalEntities: number;
}

export interface MarketShareEntry {
  entity: string;
  /** Fraction of all mentions, 0-1 */
  share: number;
}

export interface CompetitiveInsights {
  marketPosition: MarketPosition;
  platformPerformance: Record<PlatformId, PlatformPerformance>;
  opportunities: string[];
  threats: string[];
  recommendations: string[];
  /** Brand first, then competitors in canonical order; empty when nobody was mentioned */
  marketShare: MarketShareEntry[];
}

export type ScoreComponent =
  | 'mentionFrequency'
  | 'rankingPosition'
  | 'platformCoverage'
  | 'sentimentQuality'
  | 'competitivePosition';

export type ComponentScores = Record<ScoreComponent, number>;

export interface VisibilityScore {
  /** Weighted composite, 0-100, one decimal */
  overallScore: number;
  componentScores: ComponentScores;
  insights: string[];
  recommendations: string[];
  scoreBreakdown: Record<ScoreComponent, string>;
}
