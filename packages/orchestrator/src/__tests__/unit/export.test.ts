/**
 * Export Unit Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { parseBrandProfile, type AnalysisBundle, type BrandProfile } from '@lumora/core';
import { PromptGenerator } from '@lumora/prompt-generator';
import {
  AnalysisPipeline,
  buildAnalysisReport,
  buildExportDocument,
  buildResponsesCsv,
  buildSummaryCsv,
  topPlatform,
} from '../../index.js';

const EXPORTED_AT = new Date('2026-03-02T08:30:00.000Z');

describe('export', () => {
  let profile: Readonly<BrandProfile>;
  let bundle: AnalysisBundle;

  beforeAll(async () => {
    profile = parseBrandProfile({
      brandName: 'Acme Corp',
      industry: 'SaaS',
      competitors: ['Rival'],
      promptCount: 10,
      platforms: ['openai', 'gemini'],
    });
    const pipeline = new AnalysisPipeline(
      {
        query: async (platformId) => ({
          ok: true,
          responseText: platformId === 'openai' ? '1. Acme Corp is the best choice' : 'Rival is common',
        }),
      },
      { promptGenerator: new PromptGenerator({ random: () => 0 }) }
    );
    bundle = await pipeline.run(profile);
  });

  describe('buildSummaryCsv', () => {
    it('should write the four summary metrics', () => {
      const overall = bundle.visibilityScore.overallScore;

      expect(buildSummaryCsv(bundle)).toBe(
        [
          'Metric,Value',
          `Overall Visibility Score,${overall}`,
          'Total Brand Mentions,10',
          'Average Ranking,1',
          'Top Platform,openai',
          '',
        ].join('\n')
      );
    });

    it('should write 0 for a missing average ranking', () => {
      const unranked: AnalysisBundle = {
        ...bundle,
        brandAnalysis: { ...bundle.brandAnalysis, averageRanking: null },
      };

      expect(buildSummaryCsv(unranked).split('\n')[3]).toBe('Average Ranking,0');
    });
  });

  describe('buildResponsesCsv', () => {
    it('should quote fields that need it and flag failures', () => {
      const withResponses: AnalysisBundle = {
        ...bundle,
        responses: {
          openai: [{ prompt: 'Best CRM, today?', response: '1. Acme' }],
          gemini: [
            {
              prompt: 'Q',
              response: '[ERROR] Error querying gemini: boom',
              error: { code: 'TIMEOUT', message: 'boom' },
            },
          ],
        },
      };

      expect(buildResponsesCsv(withResponses)).toBe(
        [
          'platform,promptId,prompt,response,responseLength,error',
          'openai,0,"Best CRM, today?",1. Acme,7,',
          'gemini,0,Q,[ERROR] Error querying gemini: boom,35,TIMEOUT',
          '',
        ].join('\n')
      );
    });
  });

  describe('buildExportDocument', () => {
    it('should wrap the profile and results with a timestamp', () => {
      const document = buildExportDocument(profile, bundle, EXPORTED_AT);

      expect(document.brandProfile).toBe(profile);
      expect(document.results).toBe(bundle);
      expect(document.exportTimestamp).toBe('2026-03-02T08:30:00.000Z');
      expect(JSON.parse(JSON.stringify(document)).brandProfile.brandName).toBe('Acme Corp');
    });
  });

  describe('buildAnalysisReport', () => {
    it('should summarize the run', () => {
      const report = buildAnalysisReport(profile, bundle, EXPORTED_AT);

      expect(report.metadata).toEqual({
        brandName: 'Acme Corp',
        industry: 'SaaS',
        analysisDate: '2026-03-02T08:30:00.000Z',
        platformsAnalyzed: ['openai', 'gemini'],
        competitorsAnalyzed: ['Rival'],
      });
      expect(report.executiveSummary.totalMentions).toBe(10);
      expect(report.executiveSummary.keyFindings).toEqual(bundle.visibilityScore.insights);
      expect(report.recommendations).toEqual(bundle.visibilityScore.recommendations);
      expect(report.detailedAnalysis.brandAnalysis).toBe(bundle.brandAnalysis);
    });

    it('should include brand statistics and the competitor comparison', () => {
      const { statistics } = buildAnalysisReport(profile, bundle, EXPORTED_AT);

      expect(statistics.brand).toEqual({
        totalMentions: 10,
        mentionRate: 0.5,
        platformDistribution: { openai: 1, gemini: 0 },
        platformPerformance: {
          openai: { mentions: 10, mentionRate: 1, averageRanking: 1, performanceScore: 100 },
          gemini: { mentions: 0, mentionRate: 0, averageRanking: null, performanceScore: 0 },
        },
      });
      expect(statistics.comparison.map((row) => [row.entity, row.type, row.totalMentions])).toEqual([
        ['Acme Corp', 'brand', 10],
        ['Rival', 'competitor', 10],
      ]);
      expect(statistics.competitive).toEqual({
        marketShare: [
          { entity: 'Acme Corp', share: 0.5 },
          { entity: 'Rival', share: 0.5 },
        ],
        competitivePosition: { rank: 1, totalEntities: 2 },
        performanceGaps: [{ competitor: 'Rival', mentionGap: 0, gapPercentage: 0 }],
        opportunities: [{ platform: 'gemini', gap: 10, improvementPotential: 'high' }],
      });
    });

    it('should label the market position from the overall score', () => {
      const leader: AnalysisBundle = {
        ...bundle,
        visibilityScore: { ...bundle.visibilityScore, overallScore: 85 },
      };

      expect(buildAnalysisReport(profile, leader).executiveSummary.marketPosition).toBe('Market Leader');
    });
  });

  describe('topPlatform', () => {
    it('should pick the platform with the most mentions', () => {
      expect(topPlatform(bundle.brandAnalysis)).toBe('openai');
    });

    it('should return null without platforms', () => {
      expect(topPlatform({ ...bundle.brandAnalysis, platformMentions: {} })).toBeNull();
    });
  });
});
