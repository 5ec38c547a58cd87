/**
 * Competitive Aggregator
 *
 * Runs the Mention Analyzer once per competitor and derives market position,
 * platform performance, opportunity and threat signals relative to the brand.
 */

import {
  Errors,
  POOL_LIMITS,
  createSilentLogger,
  runPool,
  toLumoraError,
  type CompetitiveInsights,
  type EntityAnalysis,
  type Logger,
  type MarketPosition,
  type PlatformId,
  type PlatformPerformance,
  type PlatformResponses,
  type PlatformStatus,
} from '@lumora/core';
import { MentionAnalyzer, emptyEntityAnalysis } from './mention-analyzer.js';
import { calculateMarketRank, calculateMarketShare } from './statistics.js';
import { firstMax, firstMin, roundOne, sumTallies } from './utils.js';

export interface CompetitorAnalyzerConfig {
  analyzer?: MentionAnalyzer;
  logger?: Logger;
  /** Upper bound on competitors analyzed at once */
  maxWorkers?: number;
}

export class CompetitorAnalyzer {
  private analyzer: MentionAnalyzer;
  private logger: Logger;
  private maxWorkers: number;

  constructor(config: CompetitorAnalyzerConfig = {}) {
    this.analyzer = config.analyzer ?? new MentionAnalyzer();
    this.logger = (config.logger ?? createSilentLogger()).child('competitor-analyzer');
    this.maxWorkers = config.maxWorkers ?? POOL_LIMITS.MAX_COMPETITOR_WORKERS;
  }

  /**
   * Analyze each competitor on a bounded pool. A competitor whose analysis
   * fails gets a zero-valued analysis and an error log entry; the others are
   * unaffected. Results follow the order of `competitors`.
   */
  async analyzeCompetitors(
    responses: PlatformResponses,
    competitors: readonly string[]
  ): Promise<EntityAnalysis[]> {
    const concurrency = Math.min(competitors.length, this.maxWorkers);

    return runPool(competitors, concurrency, async (competitor) => {
      try {
        return this.analyzer.analyze(responses, competitor);
      } catch (error) {
        const failure = Errors.competitorAnalysisFailed(competitor, toLumoraError(error));
        this.logger.error(failure.message, { competitor, code: failure.code });
        return emptyEntityAnalysis(competitor, responses);
      }
    });
  }

  generateInsights(
    brand: EntityAnalysis,
    competitors: readonly EntityAnalysis[]
  ): CompetitiveInsights {
    return {
      marketPosition: analyzeMarketPosition(brand, competitors),
      platformPerformance: analyzePlatformPerformance(brand, competitors),
      opportunities: identifyOpportunities(brand, competitors),
      threats: identifyThreats(brand, competitors),
      recommendations: generateRecommendations(brand, competitors),
      marketShare: calculateMarketShare(brand, competitors),
    };
  }
}

function rankOrInfinity(analysis: EntityAnalysis): number {
  return analysis.averageRanking ?? Infinity;
}

export function analyzeMarketPosition(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): MarketPosition {
  const brandRank = rankOrInfinity(brand);
  let betterThan = 0;
  let worseThan = 0;

  for (const rival of competitors) {
    if (brand.totalMentions > rival.totalMentions) betterThan += 1;
    else if (brand.totalMentions < rival.totalMentions) worseThan += 1;

    const rivalRank = rankOrInfinity(rival);
    if (brandRank < rivalRank) betterThan += 0.5;
    else if (brandRank > rivalRank) worseThan += 0.5;
  }

  return {
    positionScore: competitors.length > 0 ? roundOne((betterThan / (competitors.length * 1.5)) * 100) : 0,
    betterThanCount: Math.trunc(betterThan),
    worseThanCount: Math.trunc(worseThan),
    marketRank: calculateMarketRank(brand, competitors),
    totalEntities: competitors.length + 1,
  };
}

function statusFor(ratio: number): PlatformStatus {
  if (ratio > 1.2) return 'leading';
  if (ratio > 0.8) return 'competitive';
  return 'lagging';
}

export function analyzePlatformPerformance(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): Record<PlatformId, PlatformPerformance> {
  const performance: Record<PlatformId, PlatformPerformance> = {};
  if (competitors.length === 0) {
    return performance;
  }

  for (const [platform, brandMentions] of Object.entries(brand.platformMentions)) {
    const avgCompetitorMentions =
      competitors.reduce((sum, rival) => sum + (rival.platformMentions[platform] ?? 0), 0) / competitors.length;
    const performanceRatio = avgCompetitorMentions > 0 ? brandMentions / avgCompetitorMentions : 0;

    performance[platform] = {
      brandMentions,
      avgCompetitorMentions,
      performanceRatio,
      status: statusFor(performanceRatio),
    };
  }

  return performance;
}

export function identifyOpportunities(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): string[] {
  const opportunities: string[] = [];

  if (competitors.length > 0) {
    for (const [platform, brandMentions] of Object.entries(brand.platformMentions)) {
      const strongest = Math.max(...competitors.map((rival) => rival.platformMentions[platform] ?? 0));
      if (brandMentions < strongest * 0.7) {
        opportunities.push(
          `Improve presence on ${platform.toUpperCase()} - competitors are performing significantly better`
        );
      }
    }
  }

  if (brand.averageRanking !== null && brand.averageRanking > 3) {
    opportunities.push('Focus on improving search result rankings - currently not in top 3');
  }

  if (sumTallies(Object.values(brand.sentimentAnalysis)).negative > 0) {
    opportunities.push('Address negative sentiment in AI responses');
  }

  return opportunities;
}

export function identifyThreats(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): string[] {
  const threats: string[] = [];

  for (const rival of competitors) {
    const name = rival.entityName;
    if (rival.totalMentions > 0 && rival.totalMentions >= brand.totalMentions * 1.5) {
      threats.push(`${name} has significantly higher mention frequency`);
    }
    if (
      rival.averageRanking !== null &&
      brand.averageRanking !== null &&
      rival.averageRanking < brand.averageRanking - 1
    ) {
      threats.push(`${name} consistently ranks higher in AI responses`);
    }
  }

  if (brand.totalMentions === 0) {
    threats.push('No brand mentions found - complete lack of AI visibility');
  }

  return threats;
}

export function generateRecommendations(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): string[] {
  const recommendations: string[] = [];

  const weakest = firstMin(Object.entries(brand.platformMentions), ([, mentions]) => mentions);
  if (weakest) {
    recommendations.push(`Prioritize content strategy for ${weakest[0].toUpperCase()} platform`);
  }

  const top = firstMax(competitors, (analysis) => analysis.totalMentions);
  if (top) {
    recommendations.push(`Study ${top.entityName}'s content strategy and positioning`);
  }

  if (brand.averageRanking !== null && brand.averageRanking > 2) {
    recommendations.push('Optimize content for AI training data to improve ranking positions');
  }

  const tally = sumTallies(Object.values(brand.sentimentAnalysis));
  const total = tally.positive + tally.neutral + tally.negative;
  if (total > 0 && tally.positive / total < 0.6) {
    recommendations.push('Improve brand messaging to increase positive sentiment in AI responses');
  }

  return recommendations;
}

export function createCompetitorAnalyzer(config?: CompetitorAnalyzerConfig): CompetitorAnalyzer {
  return new CompetitorAnalyzer(config);
}
