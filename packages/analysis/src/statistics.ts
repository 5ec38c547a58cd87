/**
 * Mention statistics and comparison tables derived from entity analyses
 */

import type { EntityAnalysis, MarketShareEntry, PlatformId, PlatformMentionDetail } from '@lumora/core';
import { roundOne } from './utils.js';

export interface PlatformStatistics {
  mentions: number;
  mentionRate: number;
  averageRanking: number | null;
  /** Mention rate plus a ranking bonus, 0-100, one decimal */
  performanceScore: number;
}

export interface MentionStatistics {
  totalMentions: number;
  /** Mentions per response across every platform */
  mentionRate: number;
  /** Share of the entity's mentions that came from each platform */
  platformDistribution: Record<PlatformId, number>;
  platformPerformance: Record<PlatformId, PlatformStatistics>;
}

export interface ComparisonRow {
  entity: string;
  type: 'brand' | 'competitor';
  totalMentions: number;
  averageRanking: number | null;
  platformMentions: Record<PlatformId, number>;
}

export interface PerformanceGap {
  competitor: string;
  /** Competitor mentions minus brand mentions */
  mentionGap: number;
  /** Gap relative to the brand's mentions, in percent; 0 when the brand has none */
  gapPercentage: number;
}

export type ImprovementPotential = 'high' | 'medium';

export interface ImprovementOpportunity {
  platform: PlatformId;
  /** Strongest competitor's mentions on the platform minus the brand's */
  gap: number;
  improvementPotential: ImprovementPotential;
}

export interface CompetitiveMetrics {
  marketShare: MarketShareEntry[];
  competitivePosition: { rank: number; totalEntities: number };
  /** In competitor order */
  performanceGaps: PerformanceGap[];
  opportunities: ImprovementOpportunity[];
}

/**
 * Ranking bonus added to a platform's mention rate
 */
function rankingBonus(averageRanking: number | null): number {
  if (averageRanking === null) return 0;
  if (averageRanking <= 2) return 20;
  if (averageRanking <= 3) return 10;
  if (averageRanking <= 5) return 5;
  return 0;
}

export function platformPerformanceScore(detail: PlatformMentionDetail): number {
  return roundOne(Math.min(100, detail.mentionRate * 100 + rankingBonus(detail.averageRanking)));
}

export function calculateMentionStatistics(analysis: EntityAnalysis): MentionStatistics {
  const platformDistribution: Record<PlatformId, number> = {};
  const platformPerformance: Record<PlatformId, PlatformStatistics> = {};

  for (const [platform, detail] of Object.entries(analysis.platformDetails)) {
    if (analysis.totalMentions > 0) {
      platformDistribution[platform] = detail.mentions / analysis.totalMentions;
    }
    platformPerformance[platform] = {
      mentions: detail.mentions,
      mentionRate: detail.mentionRate,
      averageRanking: detail.averageRanking,
      performanceScore: platformPerformanceScore(detail),
    };
  }

  return {
    totalMentions: analysis.totalMentions,
    mentionRate: analysis.totalResponses > 0 ? analysis.totalMentions / analysis.totalResponses : 0,
    platformDistribution,
    platformPerformance,
  };
}

/**
 * One row per entity, brand first, competitors in the given order
 */
export function buildComparisonMatrix(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): ComparisonRow[] {
  const row = (analysis: EntityAnalysis, type: ComparisonRow['type']): ComparisonRow => ({
    entity: analysis.entityName,
    type,
    totalMentions: analysis.totalMentions,
    averageRanking: analysis.averageRanking,
    platformMentions: { ...analysis.platformMentions },
  });

  return [
    row(brand, 'brand'),
    ...competitors.map((analysis) => row(analysis, 'competitor')),
  ];
}

/**
 * 1-based position of the brand when all entities are sorted by total
 * mentions, highest first. Ties keep encounter order, brand first.
 */
export function calculateMarketRank(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): number {
  const entities = [
    { isBrand: true, mentions: brand.totalMentions },
    ...competitors.map((analysis) => ({ isBrand: false, mentions: analysis.totalMentions })),
  ];
  const sorted = [...entities].sort((a, b) => b.mentions - a.mentions);
  return sorted.findIndex((entity) => entity.isBrand) + 1;
}

/**
 * Each entity's share of all mentions, brand first; empty when nobody was
 * mentioned
 */
export function calculateMarketShare(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): MarketShareEntry[] {
  const entities = [brand, ...competitors];
  const total = entities.reduce((sum, analysis) => sum + analysis.totalMentions, 0);
  if (total === 0) {
    return [];
  }

  return entities.map((analysis) => ({
    entity: analysis.entityName,
    share: analysis.totalMentions / total,
  }));
}

export function calculateCompetitiveMetrics(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): CompetitiveMetrics {
  const performanceGaps = competitors.map((analysis): PerformanceGap => {
    const mentionGap = analysis.totalMentions - brand.totalMentions;
    return {
      competitor: analysis.entityName,
      mentionGap,
      gapPercentage: brand.totalMentions > 0 ? (mentionGap / brand.totalMentions) * 100 : 0,
    };
  });

  const opportunities: ImprovementOpportunity[] = [];
  if (competitors.length > 0) {
    for (const [platform, brandMentions] of Object.entries(brand.platformMentions)) {
      const best = Math.max(...competitors.map((analysis) => analysis.platformMentions[platform] ?? 0));
      if (brandMentions < best * 0.7) {
        opportunities.push({
          platform,
          gap: best - brandMentions,
          improvementPotential: best > brandMentions * 2 ? 'high' : 'medium',
        });
      }
    }
  }

  return {
    marketShare: calculateMarketShare(brand, competitors),
    competitivePosition: {
      rank: calculateMarketRank(brand, competitors),
      totalEntities: competitors.length + 1,
    },
    performanceGaps,
    opportunities,
  };
}
