/**
 * Visibility Scorer
 *
 * Combines five component scores into one weighted 0-100 visibility score
 * and derives insight, recommendation and breakdown sentences.
 */

import type {
  ComponentScores,
  EntityAnalysis,
  ScoreComponent,
  VisibilityScore,
} from '@lumora/core';
import { clamp, firstMax, firstMin, roundOne, sumTallies } from './utils.js';

/**
 * Component weights, summing to 1
 */
export const SCORE_WEIGHTS: Readonly<Record<ScoreComponent, number>> = Object.freeze({
  mentionFrequency: 0.3,
  rankingPosition: 0.25,
  platformCoverage: 0.2,
  sentimentQuality: 0.15,
  competitivePosition: 0.1,
});

export const SCORE_COMPONENTS: readonly ScoreComponent[] = [
  'mentionFrequency',
  'rankingPosition',
  'platformCoverage',
  'sentimentQuality',
  'competitivePosition',
];

export type MarketPositionLabel = 'Market Leader' | 'Strong Competitor' | 'Emerging Player' | 'Niche Presence';

export function marketPositionLabel(overallScore: number): MarketPositionLabel {
  if (overallScore >= 80) return 'Market Leader';
  if (overallScore >= 60) return 'Strong Competitor';
  if (overallScore >= 40) return 'Emerging Player';
  return 'Niche Presence';
}

// Component scores

export function mentionFrequencyScore(brand: EntityAnalysis): number {
  if (brand.totalResponses === 0) {
    return 0;
  }
  return Math.min(100, (brand.totalMentions / brand.totalResponses) * 200);
}

export function rankingPositionScore(brand: EntityAnalysis): number {
  const rank = brand.averageRanking;
  if (rank === null) return 0;
  if (rank <= 1) return 100;
  if (rank <= 2) return 85;
  if (rank <= 3) return 70;
  if (rank <= 5) return 50;
  if (rank <= 10) return 25;
  return 10;
}

export function platformCoverageScore(brand: EntityAnalysis): number {
  const counts = Object.values(brand.platformMentions);
  if (counts.length === 0) {
    return 0;
  }

  const covered = counts.filter((mentions) => mentions > 0);
  let score = (covered.length / counts.length) * 100;

  if (covered.length > 1) {
    const average = covered.reduce((sum, value) => sum + value, 0) / covered.length;
    const variance = covered.reduce((sum, value) => sum + (value - average) ** 2, 0) / covered.length;
    const cv = average > 0 ? Math.sqrt(variance) / average : 0;
    score = Math.min(100, score + Math.max(0, 20 - cv * 20));
  }

  return score;
}

export function sentimentQualityScore(brand: EntityAnalysis): number {
  const tally = sumTallies(Object.values(brand.sentimentAnalysis));
  const total = tally.positive + tally.neutral + tally.negative;
  if (total === 0) {
    return 50;
  }
  return clamp((tally.positive / total) * 100 - (tally.negative / total) * 50, 0, 100);
}

export function competitivePositionScore(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): number {
  if (competitors.length === 0) {
    return 50;
  }

  let beaten = 0;
  for (const rival of competitors) {
    if (brand.totalMentions > rival.totalMentions) beaten += 1;
    else if (brand.totalMentions === rival.totalMentions) beaten += 0.5;
  }
  return (beaten / competitors.length) * 100;
}

export class VisibilityScorer {
  readonly weights = SCORE_WEIGHTS;

  score(brand: EntityAnalysis, competitors: readonly EntityAnalysis[]): VisibilityScore {
    const raw: ComponentScores = {
      mentionFrequency: mentionFrequencyScore(brand),
      rankingPosition: rankingPositionScore(brand),
      platformCoverage: platformCoverageScore(brand),
      sentimentQuality: sentimentQualityScore(brand),
      competitivePosition: competitivePositionScore(brand, competitors),
    };

    const overall = SCORE_COMPONENTS.reduce(
      (sum, component) => sum + raw[component] * this.weights[component],
      0
    );

    const componentScores: ComponentScores = {
      mentionFrequency: roundOne(raw.mentionFrequency),
      rankingPosition: roundOne(raw.rankingPosition),
      platformCoverage: roundOne(raw.platformCoverage),
      sentimentQuality: roundOne(raw.sentimentQuality),
      competitivePosition: roundOne(raw.competitivePosition),
    };

    return {
      overallScore: roundOne(clamp(overall, 0, 100)),
      componentScores,
      insights: generateInsights(brand, competitors),
      recommendations: generateRecommendations(brand, competitors),
      scoreBreakdown: describeComponents(raw),
    };
  }
}

function topCompetitor(competitors: readonly EntityAnalysis[]): EntityAnalysis | undefined {
  return firstMax(competitors, (analysis) => analysis.totalMentions);
}

function generateInsights(brand: EntityAnalysis, competitors: readonly EntityAnalysis[]): string[] {
  const insights: string[] = [];
  const total = brand.totalMentions;

  if (total === 0) {
    insights.push('No brand mentions found across AI platforms - this indicates zero AI visibility');
  } else if (total < 5) {
    insights.push('Low brand mention frequency suggests limited AI platform visibility');
  } else if (total >= 20) {
    insights.push('Strong brand mention frequency indicates good AI platform visibility');
  }

  const platforms = Object.entries(brand.platformMentions);
  const best = firstMax(platforms, ([, mentions]) => mentions);
  const worst = firstMin(platforms, ([, mentions]) => mentions);
  if (best && worst) {
    insights.push(`${best[0].toUpperCase()} is your strongest platform with ${best[1]} mentions`);
    if (worst[1] < best[1] * 0.5) {
      insights.push(`${worst[0].toUpperCase()} shows significant room for improvement`);
    }
  }

  const top = topCompetitor(competitors);
  if (top && top.totalMentions > total) {
    insights.push(`${top.entityName} leads in AI visibility with ${top.totalMentions} mentions`);
  }

  const rank = brand.averageRanking;
  if (rank !== null) {
    if (rank <= 2) {
      insights.push('Excellent ranking position - typically appearing in top 2 results');
    } else if (rank <= 5) {
      insights.push('Good ranking position but opportunity to reach top 3');
    } else {
      insights.push('Low ranking position - focus needed on improving search result placement');
    }
  }

  return insights;
}

function generateRecommendations(
  brand: EntityAnalysis,
  competitors: readonly EntityAnalysis[]
): string[] {
  const recommendations: string[] = [];

  const platforms = Object.entries(brand.platformMentions);
  const worst = firstMin(platforms, ([, mentions]) => mentions);
  const best = firstMax(platforms, ([, mentions]) => mentions);
  if (worst && best && worst[1] < best[1] * 0.5) {
    recommendations.push(
      `Develop targeted content strategy for ${worst[0].toUpperCase()} to improve visibility`
    );
  }

  if (brand.totalMentions < 10) {
    recommendations.push('Increase content production and SEO efforts to improve AI platform indexing');
  }

  if (brand.averageRanking !== null && brand.averageRanking > 3) {
    recommendations.push('Optimize content for featured snippets and AI-friendly formats');
  }

  const top = topCompetitor(competitors);
  if (top && top.totalMentions > brand.totalMentions) {
    recommendations.push(`Analyze ${top.entityName}'s content strategy and digital presence`);
  }

  if (sumTallies(Object.values(brand.sentimentAnalysis)).negative > 0) {
    recommendations.push('Address negative sentiment through improved brand messaging and PR');
  }

  recommendations.push('Regularly monitor AI platform responses to track visibility changes');
  recommendations.push('Create AI-friendly content that answers common industry questions');

  return recommendations;
}

function describeComponents(scores: ComponentScores): Record<ScoreComponent, string> {
  const mention = scores.mentionFrequency;
  const ranking = scores.rankingPosition;
  const coverage = scores.platformCoverage;
  const sentiment = scores.sentimentQuality;
  const competitive = scores.competitivePosition;

  return {
    mentionFrequency:
      mention >= 80
        ? 'Excellent mention frequency across platforms'
        : mention >= 60
          ? 'Good mention frequency with room for improvement'
          : mention >= 40
            ? 'Moderate mention frequency - needs attention'
            : 'Low mention frequency - immediate action required',
    rankingPosition:
      ranking >= 80
        ? 'Excellent ranking positions in AI responses'
        : ranking >= 60
          ? 'Good ranking positions with improvement potential'
          : 'Poor ranking positions - focus on SEO optimization',
    platformCoverage:
      coverage >= 80
        ? 'Strong presence across multiple AI platforms'
        : coverage >= 60
          ? 'Good platform coverage with some gaps'
          : 'Limited platform coverage - expand presence',
    sentimentQuality:
      sentiment >= 70
        ? 'Positive sentiment in AI responses'
        : sentiment >= 50
          ? 'Neutral sentiment - opportunity for improvement'
          : 'Negative sentiment - address messaging issues',
    competitivePosition:
      competitive >= 70
        ? 'Leading competitive position'
        : competitive >= 50
          ? 'Competitive position with room for growth'
          : 'Lagging behind competitors - strategic focus needed',
  };
}

export function createVisibilityScorer(): VisibilityScorer {
  return new VisibilityScorer();
}
