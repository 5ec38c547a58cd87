/**
 * Unit tests for the Mention Analyzer
 */

import { describe, it, expect } from 'vitest';
import type { PlatformResponses, Sentiment } from '@lumora/core';
import { MentionAnalyzer, emptyEntityAnalysis, type SentimentStrategy } from '../../index.js';
import { responsesFor } from '../fixtures.js';

describe('MentionAnalyzer', () => {
  const analyzer = new MentionAnalyzer();

  it('should record a ranked positive mention from a list item', () => {
    const responses = { openai: [{ prompt: 'p', response: '1. Acme Corp is the best choice' }] };

    const analysis = analyzer.analyze(responses, 'Acme Corp');

    expect(analysis.mentions).toEqual([
      {
        entityName: 'Acme Corp',
        platform: 'openai',
        prompt: 'p',
        promptIndex: 0,
        mention: 'Acme Corp',
        context: '1. Acme Corp is the best choice',
        rank: 1,
        sentiment: 'positive',
        counted: true,
      },
    ]);
    expect(analysis.totalMentions).toBe(1);
    expect(analysis.totalResponses).toBe(1);
    expect(analysis.averageRanking).toBe(1);
    expect(analysis.platformDetails.openai).toEqual({
      mentions: 1,
      responses: 1,
      mentionRate: 1,
      rankings: [1],
      averageRanking: 1,
      sentiment: { positive: 1, neutral: 0, negative: 0 },
      sampleMentions: [
        { prompt: 'p', response: '1. Acme Corp is the best choice', mentions: ['Acme Corp'] },
      ],
    });
  });

  it('should count a response once however many times it names the entity', () => {
    const analysis = analyzer.analyze(responsesFor({ openai: ['Acme and acme and ACME'] }), 'Acme');

    expect(analysis.totalMentions).toBe(1);
    expect(analysis.mentions.map((m) => m.mention)).toEqual(['Acme', 'acme', 'ACME']);
    expect(analysis.mentions.map((m) => m.counted)).toEqual([true, false, false]);
  });

  it('should detect the acronym of a multi-word name', () => {
    const analysis = analyzer.analyze(responsesFor({ gemini: ['AC is popular'] }), 'Acme Corp');

    expect(analysis.totalMentions).toBe(1);
    expect(analysis.mentions[0].mention).toBe('AC');
    expect(analysis.mentions[0].rank).toBeNull();
    expect(analysis.mentions[0].sentiment).toBe('positive');
  });

  it('should report zero visibility when nothing mentions the entity', () => {
    const quiet = Array.from({ length: 10 }, () => 'Nothing relevant here');
    const responses = responsesFor({ openai: quiet, gemini: quiet, perplexity: quiet });

    const analysis = analyzer.analyze(responses, 'Acme');

    expect(analysis.totalMentions).toBe(0);
    expect(analysis.totalResponses).toBe(30);
    expect(analysis.averageRanking).toBeNull();
    expect(analysis.mentions).toEqual([]);
    expect(analysis.platformMentions).toEqual({ openai: 0, gemini: 0, perplexity: 0 });
  });

  it('should round the overall average rank but keep platform averages exact', () => {
    const responses = responsesFor({
      openai: ['1. Acme', '2. Acme', '2. Acme'],
    });

    const analysis = analyzer.analyze(responses, 'Acme');

    expect(analysis.rankings).toEqual([1, 2, 2]);
    expect(analysis.averageRanking).toBe(2);
    expect(analysis.platformDetails.openai.averageRanking).toBeCloseTo(5 / 3, 10);
  });

  it('should round an exact half average rank to the even neighbour', () => {
    const down = analyzer.analyze(responsesFor({ openai: ['2. Acme', '3. Acme'] }), 'Acme');
    const up = analyzer.analyze(responsesFor({ openai: ['3. Acme', '4. Acme'] }), 'Acme');

    expect(down.averageRanking).toBe(2);
    expect(down.platformDetails.openai.averageRanking).toBe(2.5);
    expect(up.averageRanking).toBe(4);
  });

  it('should not match an entity named inside a failed query message', () => {
    const responses: PlatformResponses = {
      openai: [
        {
          prompt: 'Best AI assistants?',
          response: '[ERROR] Error querying openai: Operation timed out',
          error: { code: 'TIMEOUT', message: 'Operation timed out' },
        },
      ],
    };

    const analysis = analyzer.analyze(responses, 'OpenAI');

    expect(analysis.totalMentions).toBe(0);
    expect(analysis.totalResponses).toBe(1);
    expect(analysis.mentions).toEqual([]);
    expect(analysis.platformDetails.openai.sentiment).toEqual({ positive: 0, neutral: 0, negative: 0 });
  });

  it('should skip a response flagged with an error even without the marker', () => {
    const responses: PlatformResponses = {
      gemini: [{ prompt: 'p', response: 'Acme', error: { code: 'RATE_LIMITED', message: 'Acme' } }],
    };

    const analysis = analyzer.analyze(responses, 'Acme');

    expect(analysis.platformDetails.gemini).toMatchObject({ mentions: 0, responses: 1, mentionRate: 0 });
  });

  it('should count error-marked responses without matching them', () => {
    const responses = responsesFor({
      openai: ['[ERROR] Error querying openai: boom', 'Acme is fine'],
    });

    const analysis = analyzer.analyze(responses, 'Acme');

    expect(analysis.platformDetails.openai.responses).toBe(2);
    expect(analysis.platformDetails.openai.mentions).toBe(1);
    expect(analysis.platformDetails.openai.mentionRate).toBe(0.5);
    expect(analysis.mentions[0].promptIndex).toBe(1);
    expect(analysis.mentions[0].prompt).toBe('Prompt 2');
  });

  it('should keep at most five samples per platform', () => {
    const texts = Array.from({ length: 7 }, (_, i) => `Acme answer ${i + 1}`);

    const analysis = analyzer.analyze(responsesFor({ openai: texts }), 'Acme');

    const samples = analysis.platformDetails.openai.sampleMentions;
    expect(samples).toHaveLength(5);
    expect(samples.map((s) => s.prompt)).toEqual(['Prompt 1', 'Prompt 2', 'Prompt 3', 'Prompt 4', 'Prompt 5']);
  });

  it('should be idempotent', () => {
    const responses = responsesFor({
      openai: ['1. Acme leads', 'Avoid Acme', 'Nothing'],
      gemini: ['Acme is the second pick'],
    });

    expect(analyzer.analyze(responses, 'Acme')).toEqual(analyzer.analyze(responses, 'Acme'));
  });

  it('should use the injected sentiment strategy', () => {
    const calls: string[] = [];
    const pessimist: SentimentStrategy = {
      name: 'pessimist',
      classify: (_text: string, entityName: string): Sentiment => {
        calls.push(entityName);
        return 'negative';
      },
    };
    const custom = new MentionAnalyzer({ sentiment: pessimist });

    const analysis = custom.analyze(responsesFor({ openai: ['Acme is the best', 'Nope'] }), 'Acme');

    expect(calls).toEqual(['Acme']);
    expect(analysis.sentimentAnalysis.openai).toEqual({ positive: 0, neutral: 0, negative: 1 });
  });
});

describe('emptyEntityAnalysis', () => {
  it('should keep response counts with every mention at zero', () => {
    const analysis = emptyEntityAnalysis('Rival', responsesFor({ openai: ['a', 'b'] }));

    expect(analysis.platformMentions).toEqual({ openai: 0 });
    expect(analysis.totalResponses).toBe(2);
    expect(analysis.totalMentions).toBe(0);
    expect(analysis.averageRanking).toBeNull();
    expect(analysis.platformDetails.openai.responses).toBe(2);
  });
});
