/**
 * Result export: JSON document, analysis report and CSV tables
 */

import { stringify } from 'csv-stringify/sync';
import type { AnalysisBundle, BrandProfile, EntityAnalysis, PlatformId } from '@lumora/core';
import {
  buildComparisonMatrix,
  calculateCompetitiveMetrics,
  calculateMentionStatistics,
  marketPositionLabel,
  type ComparisonRow,
  type CompetitiveMetrics,
  type MarketPositionLabel,
  type MentionStatistics,
} from '@lumora/analysis';

export interface ExportDocument {
  brandProfile: Readonly<BrandProfile>;
  results: AnalysisBundle;
  /** ISO-8601 */
  exportTimestamp: string;
}

export interface AnalysisReport {
  metadata: {
    brandName: string;
    industry: string;
    analysisDate: string;
    platformsAnalyzed: PlatformId[];
    competitorsAnalyzed: string[];
  };
  executiveSummary: {
    overallScore: number;
    totalMentions: number;
    marketPosition: MarketPositionLabel;
    keyFindings: string[];
  };
  detailedAnalysis: Pick<AnalysisBundle, 'brandAnalysis' | 'competitorAnalysis' | 'visibilityScore'>;
  statistics: {
    brand: MentionStatistics;
    /** Brand row first, then competitors in canonical order */
    comparison: ComparisonRow[];
    competitive: CompetitiveMetrics;
  };
  recommendations: string[];
}

export function buildExportDocument(
  profile: Readonly<BrandProfile>,
  bundle: AnalysisBundle,
  now: Date = new Date()
): ExportDocument {
  return {
    brandProfile: profile,
    results: bundle,
    exportTimestamp: now.toISOString(),
  };
}

export function buildAnalysisReport(
  profile: Readonly<BrandProfile>,
  bundle: AnalysisBundle,
  now: Date = new Date()
): AnalysisReport {
  const score = bundle.visibilityScore;
  return {
    metadata: {
      brandName: profile.brandName,
      industry: profile.industry,
      analysisDate: now.toISOString(),
      platformsAnalyzed: [...profile.platforms],
      competitorsAnalyzed: [...profile.competitors],
    },
    executiveSummary: {
      overallScore: score.overallScore,
      totalMentions: bundle.brandAnalysis.totalMentions,
      marketPosition: marketPositionLabel(score.overallScore),
      keyFindings: [...score.insights],
    },
    detailedAnalysis: {
      brandAnalysis: bundle.brandAnalysis,
      competitorAnalysis: bundle.competitorAnalysis,
      visibilityScore: score,
    },
    statistics: {
      brand: calculateMentionStatistics(bundle.brandAnalysis),
      comparison: buildComparisonMatrix(bundle.brandAnalysis, bundle.competitorAnalysis),
      competitive: calculateCompetitiveMetrics(bundle.brandAnalysis, bundle.competitorAnalysis),
    },
    recommendations: [...score.recommendations],
  };
}

/**
 * Platform with the most brand mentions; the first one wins a tie
 */
export function topPlatform(analysis: EntityAnalysis): PlatformId | null {
  let best: PlatformId | null = null;
  let bestMentions = -1;
  for (const [platform, mentions] of Object.entries(analysis.platformMentions)) {
    if (mentions > bestMentions) {
      best = platform;
      bestMentions = mentions;
    }
  }
  return best;
}

/**
 * Two-column Metric/Value summary
 */
export function buildSummaryCsv(bundle: AnalysisBundle): string {
  const brand = bundle.brandAnalysis;
  return stringify(
    [
      ['Overall Visibility Score', bundle.visibilityScore.overallScore],
      ['Total Brand Mentions', brand.totalMentions],
      ['Average Ranking', brand.averageRanking ?? 0],
      ['Top Platform', topPlatform(brand) ?? ''],
    ],
    { header: true, columns: ['Metric', 'Value'] }
  );
}

/**
 * One row per (platform, prompt) response
 */
export function buildResponsesCsv(bundle: AnalysisBundle): string {
  const rows = Object.entries(bundle.responses).flatMap(([platform, responses]) =>
    responses.map((entry, promptId) => ({
      platform,
      promptId,
      prompt: entry.prompt,
      response: entry.response,
      responseLength: entry.response.length,
      error: entry.error?.code ?? '',
    }))
  );

  return stringify(rows, {
    header: true,
    columns: ['platform', 'promptId', 'prompt', 'response', 'responseLength', 'error'],
  });
}
