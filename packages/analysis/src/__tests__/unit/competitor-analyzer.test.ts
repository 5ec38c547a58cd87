/**
 * Unit tests for the Competitive Aggregator
 */

import { describe, it, expect } from 'vitest';
import { createTestLogger, type Sentiment } from '@lumora/core';
import {
  CompetitorAnalyzer,
  KeywordProximitySentiment,
  MentionAnalyzer,
  type SentimentStrategy,
} from '../../index.js';
import { entity, responsesFor } from '../fixtures.js';

/**
 * Delegates to keyword sentiment but fails for one entity
 */
function failingFor(target: string): SentimentStrategy {
  const inner = new KeywordProximitySentiment();
  return {
    name: 'failing',
    classify(text: string, entityName: string): Sentiment {
      if (entityName === target) {
        throw new Error('sentiment failed');
      }
      return inner.classify(text, entityName);
    },
  };
}

describe('CompetitorAnalyzer', () => {
  describe('analyzeCompetitors', () => {
    const responses = responsesFor({
      openai: ['1. Zeta\n2. Alpha', 'Alpha is popular', 'Broken and Mid'],
      gemini: ['Mid only'],
    });

    it('should return results in the given competitor order', async () => {
      const analyzer = new CompetitorAnalyzer();

      const [zeta, alpha, mid] = await analyzer.analyzeCompetitors(responses, ['Zeta', 'Alpha', 'Mid']);

      expect(zeta.entityName).toBe('Zeta');
      expect(zeta.totalMentions).toBe(1);
      expect(alpha.entityName).toBe('Alpha');
      expect(alpha.totalMentions).toBe(2);
      expect(alpha.averageRanking).toBe(2);
      expect(mid.entityName).toBe('Mid');
      expect(mid.platformMentions).toEqual({ openai: 1, gemini: 1 });
    });

    it('should keep numeric and reserved-looking names in order', async () => {
      const analyzer = new CompetitorAnalyzer();
      const named = responsesFor({ openai: ['360 leads', 'Zeta and __proto__ tie', '360 again'] });

      const result = await analyzer.analyzeCompetitors(named, ['Zeta', '360', '__proto__']);

      expect(result.map((analysis) => analysis.entityName)).toEqual(['Zeta', '360', '__proto__']);
      expect(result.map((analysis) => analysis.totalMentions)).toEqual([1, 2, 1]);
    });

    it('should fall back to a zero-valued analysis and log the failure', async () => {
      const { logger, transport } = createTestLogger();
      const analyzer = new CompetitorAnalyzer({
        analyzer: new MentionAnalyzer({ sentiment: failingFor('Broken') }),
        logger,
      });

      const result = await analyzer.analyzeCompetitors(responses, ['Alpha', 'Broken', 'Mid']);

      const [alpha, broken, mid] = result;
      expect(result.map((analysis) => analysis.entityName)).toEqual(['Alpha', 'Broken', 'Mid']);
      expect(broken.totalMentions).toBe(0);
      expect(broken.averageRanking).toBeNull();
      expect(broken.platformMentions).toEqual({ openai: 0, gemini: 0 });
      expect(alpha.totalMentions).toBe(2);
      expect(mid.totalMentions).toBe(2);

      const errors = transport.getEntries('error');
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('Error analyzing competitor Broken: sentiment failed');
      expect(errors[0].component).toBe('competitor-analyzer');
    });

    it('should work with a single worker', async () => {
      const analyzer = new CompetitorAnalyzer({ maxWorkers: 1 });

      const result = await analyzer.analyzeCompetitors(responses, ['Zeta', 'Mid']);

      expect(result.map((analysis) => analysis.totalMentions)).toEqual([1, 2]);
    });

    it('should return an empty list for no competitors', async () => {
      const analyzer = new CompetitorAnalyzer();

      expect(await analyzer.analyzeCompetitors(responses, [])).toEqual([]);
    });
  });

  describe('generateInsights', () => {
    const analyzer = new CompetitorAnalyzer();

    it('should place a mid-table brand second of three', () => {
      const brand = entity('Acme', { openai: 5 });
      const competitors = [entity('Rival One', { openai: 10 }), entity('Rival Two', { openai: 0 })];

      const insights = analyzer.generateInsights(brand, competitors);

      expect(insights.marketPosition).toEqual({
        positionScore: 33.3,
        betterThanCount: 1,
        worseThanCount: 1,
        marketRank: 2,
        totalEntities: 3,
      });
      expect(insights.platformPerformance).toEqual({
        openai: { brandMentions: 5, avgCompetitorMentions: 5, performanceRatio: 1, status: 'competitive' },
      });
      expect(insights.opportunities).toEqual([
        'Improve presence on OPENAI - competitors are performing significantly better',
      ]);
      expect(insights.threats).toEqual(['Rival One has significantly higher mention frequency']);
      expect(insights.recommendations).toEqual([
        'Prioritize content strategy for OPENAI platform',
        "Study Rival One's content strategy and positioning",
      ]);
      expect(insights.marketShare).toEqual([
        { entity: 'Acme', share: 1 / 3 },
        { entity: 'Rival One', share: 2 / 3 },
        { entity: 'Rival Two', share: 0 },
      ]);
    });

    it('should reward a better average rank with half a point', () => {
      const brand = entity('Acme', { openai: 5 }, { averageRanking: 1 });
      const competitors = [entity('Rival', { openai: 5 }, { averageRanking: 3 })];

      const position = analyzer.generateInsights(brand, competitors).marketPosition;

      expect(position.positionScore).toBe(33.3);
      expect(position.betterThanCount).toBe(0);
      expect(position.worseThanCount).toBe(0);
      expect(position.marketRank).toBe(1);
    });

    it('should flag ranking and sentiment problems', () => {
      const brand = entity('Acme', { openai: 4 }, {
        averageRanking: 4,
        sentiment: { openai: { positive: 1, neutral: 0, negative: 1 } },
      });
      const competitors = [entity('Rival', { openai: 4 }, { averageRanking: 2 })];

      const insights = analyzer.generateInsights(brand, competitors);

      expect(insights.opportunities).toEqual([
        'Focus on improving search result rankings - currently not in top 3',
        'Address negative sentiment in AI responses',
      ]);
      expect(insights.threats).toEqual(['Rival consistently ranks higher in AI responses']);
      expect(insights.recommendations).toEqual([
        'Prioritize content strategy for OPENAI platform',
        "Study Rival's content strategy and positioning",
        'Optimize content for AI training data to improve ranking positions',
        'Improve brand messaging to increase positive sentiment in AI responses',
      ]);
    });

    it('should flag a brand nobody mentions', () => {
      const brand = entity('Acme', { openai: 0, gemini: 0 });
      const competitors = [entity('Rival', { openai: 0, gemini: 0 })];

      const insights = analyzer.generateInsights(brand, competitors);

      expect(insights.threats).toEqual(['No brand mentions found - complete lack of AI visibility']);
      expect(insights.marketShare).toEqual([]);
      expect(insights.platformPerformance.openai.status).toBe('lagging');
    });

    it('should handle a brand without competitors', () => {
      const brand = entity('Acme', { openai: 3 });

      const insights = analyzer.generateInsights(brand, []);

      expect(insights.marketPosition.positionScore).toBe(0);
      expect(insights.marketPosition.marketRank).toBe(1);
      expect(insights.marketPosition.totalEntities).toBe(1);
      expect(insights.platformPerformance).toEqual({});
      expect(insights.opportunities).toEqual([]);
      expect(insights.recommendations).toEqual(['Prioritize content strategy for OPENAI platform']);
    });
  });
});
