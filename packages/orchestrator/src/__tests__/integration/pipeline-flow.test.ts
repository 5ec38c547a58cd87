/**
 * Pipeline Integration Tests
 *
 * Real registry, gateway and mock adapters behind the pipeline.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { MockAdapter, PlatformGateway, PlatformRegistry } from '@lumora/platform-gateway';
import { PromptGenerator } from '@lumora/prompt-generator';
import { AnalysisPipeline, buildSummaryCsv } from '../../index.js';

describe('Pipeline flow', () => {
  let registry: PlatformRegistry;

  afterEach(async () => {
    await registry.closeAll();
  });

  function setup(): { openai: MockAdapter; pipeline: AnalysisPipeline } {
    const openai = new MockAdapter({
      platformId: 'openai',
      maxRetries: 0,
      responder: () => '1. Acme Corp leads the market\n2. Rival follows',
    });
    const gemini = new MockAdapter({
      platformId: 'gemini',
      maxRetries: 0,
      responder: () => {
        throw new Error('boom');
      },
    });
    registry = new PlatformRegistry().register(openai).register(gemini);

    const pipeline = new AnalysisPipeline(new PlatformGateway(registry), {
      promptGenerator: new PromptGenerator({ random: () => 0 }),
      executor: { workersPerPlatform: 2, maxWorkers: 4 },
    });
    return { openai, pipeline };
  }

  it('should run a profile through every stage', async () => {
    const { openai, pipeline } = setup();

    const bundle = await pipeline.run({
      brandName: 'Acme Corp',
      industry: 'FinTech',
      competitors: ['Rival'],
      promptCount: 10,
      platforms: ['openai', 'gemini', 'perplexity'],
    });

    expect(bundle.prompts).toHaveLength(10);
    expect([...openai.getReceivedPrompts()].sort()).toEqual([...bundle.prompts].sort());

    expect(bundle.responses.openai.map((entry) => entry.prompt)).toEqual(bundle.prompts);
    expect(bundle.responses.gemini.every((entry) => entry.error?.code === 'PLATFORM_QUERY_FAILED')).toBe(true);
    expect(bundle.responses.gemini[0].response).toBe('[ERROR] Error querying gemini: boom');
    expect(bundle.responses.perplexity.every((entry) => entry.error?.code === 'UNKNOWN_PLATFORM')).toBe(true);
    expect(bundle.queryStats.total).toBe(30);
    expect(bundle.queryStats.failed).toBe(20);

    expect(bundle.brandAnalysis.platformMentions).toEqual({ openai: 10, gemini: 0, perplexity: 0 });
    expect(bundle.brandAnalysis.averageRanking).toBe(1);
    const [rival] = bundle.competitorAnalysis;
    expect(rival.entityName).toBe('Rival');
    expect(rival.platformDetails.openai.rankings).toEqual(Array(10).fill(2));
    expect(bundle.competitiveInsights.marketPosition.marketRank).toBe(1);

    expect(buildSummaryCsv(bundle).split('\n')[4]).toBe('Top Platform,openai');
  });

  it('should count failed platforms as responses without mentions', async () => {
    const { pipeline } = setup();

    const bundle = await pipeline.run({
      brandName: 'Acme Corp',
      industry: 'SaaS',
      competitors: ['Rival'],
      promptCount: 10,
      platforms: ['gemini'],
    });

    expect(bundle.brandAnalysis.totalMentions).toBe(0);
    expect(bundle.brandAnalysis.totalResponses).toBe(10);
    expect(bundle.brandAnalysis.platformDetails.gemini.mentionRate).toBe(0);
    expect(bundle.brandAnalysis.averageRanking).toBeNull();
  });

  it('should not count a brand named in a failed query message', async () => {
    const { pipeline } = setup();

    const bundle = await pipeline.run({
      brandName: 'Gemini',
      industry: 'SaaS',
      competitors: ['Rival'],
      promptCount: 10,
      platforms: ['gemini'],
    });

    expect(bundle.responses.gemini[0].response).toBe('[ERROR] Error querying gemini: boom');
    expect(bundle.brandAnalysis.totalMentions).toBe(0);
    expect(bundle.brandAnalysis.totalResponses).toBe(10);
    expect(bundle.brandAnalysis.mentions).toEqual([]);
  });
});
