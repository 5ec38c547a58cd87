/**
 * Analysis Pipeline
 *
 * Runs one brand profile end to end: validation, prompt generation, query
 * fan-out, brand and competitor analysis, insights and scoring. A bundle is
 * only returned when every stage succeeded.
 */

import { randomUUID } from 'node:crypto';
import {
  Errors,
  createSilentLogger,
  isLumoraError,
  parseBrandProfile,
  toLumoraError,
  type AnalysisBundle,
  type BrandProfile,
  type ErrorCode,
  type LumoraError,
  type Logger,
} from '@lumora/core';
import { CompetitorAnalyzer, MentionAnalyzer, VisibilityScorer } from '@lumora/analysis';
import { QueryExecutor, type QueryBatchResult, type QueryGateway } from '@lumora/executor';
import { PromptGenerator, validatePrompts } from '@lumora/prompt-generator';
import type {
  AnalysisPipelineConfig,
  PipelineEvent,
  PipelineEventHandler,
  PipelineEventType,
  PipelineStage,
  RunContext,
  RunOptions,
  WorkStage,
} from './types.js';

/**
 * Valid stage transitions
 */
const VALID_TRANSITIONS: Record<PipelineStage, PipelineStage[]> = {
  created: ['validating', 'failed'],
  validating: ['generating_prompts', 'failed'],
  generating_prompts: ['querying', 'failed'],
  querying: ['analyzing_brand', 'failed'],
  analyzing_brand: ['analyzing_competitors', 'failed'],
  analyzing_competitors: ['scoring', 'failed'],
  scoring: ['complete', 'failed'],
  complete: [],
  failed: [],
};

/**
 * Error codes surfaced to the caller as they are
 */
const PASSTHROUGH_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>(['UNSUPPORTED_INDUSTRY', 'VALIDATION_FAILED']);

export class AnalysisPipeline {
  private eventHandlers: Set<PipelineEventHandler> = new Set();
  private logger: Logger;
  private promptGenerator: PromptGenerator;
  private mentionAnalyzer: MentionAnalyzer;
  private competitorAnalyzer: CompetitorAnalyzer;
  private scorer: VisibilityScorer;
  private now: () => Date;

  constructor(
    private readonly gateway: QueryGateway,
    private readonly config: AnalysisPipelineConfig = {}
  ) {
    this.logger = (config.logger ?? createSilentLogger()).child('pipeline');
    this.promptGenerator = config.promptGenerator ?? new PromptGenerator({ logger: config.logger });
    this.mentionAnalyzer = config.mentionAnalyzer ?? new MentionAnalyzer();
    this.competitorAnalyzer =
      config.competitorAnalyzer ??
      new CompetitorAnalyzer({ analyzer: this.mentionAnalyzer, logger: config.logger });
    this.scorer = config.scorer ?? new VisibilityScorer();
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Subscribe to pipeline events
   */
  on(handler: PipelineEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  private async emit(
    context: RunContext,
    type: PipelineEventType,
    details: Record<string, unknown> = {}
  ): Promise<void> {
    const event: PipelineEvent = {
      type,
      runId: context.runId,
      stage: context.stage,
      timestamp: new Date(),
      details,
    };
    for (const handler of this.eventHandlers) {
      try {
        await handler(event);
      } catch (error) {
        console.error('Event handler error:', error);
      }
    }
  }

  /**
   * Run the full analysis for one brand profile.
   *
   * @throws LumoraError VALIDATION_FAILED or UNSUPPORTED_INDUSTRY unchanged;
   *   PIPELINE_FAILED wrapping anything else
   */
  async run(profileInput: unknown, options: RunOptions = {}): Promise<AnalysisBundle> {
    const context = createRunContext();

    try {
      const profile = await this.stage(context, 'validating', () => parseBrandProfile(profileInput));
      context.profile = profile;

      const prompts = await this.stage(context, 'generating_prompts', () =>
        this.buildPrompts(profile, options)
      );
      context.prompts = prompts;

      const batch = await this.stage(context, 'querying', () => this.runQueries(context, profile, prompts));
      context.responses = batch.responses;
      context.queryStats = batch.stats;

      const brandAnalysis = await this.stage(context, 'analyzing_brand', () =>
        this.mentionAnalyzer.analyze(batch.responses, profile.brandName)
      );

      const competitorAnalysis = await this.stage(context, 'analyzing_competitors', () =>
        this.competitorAnalyzer.analyzeCompetitors(batch.responses, profile.competitors)
      );

      const { competitiveInsights, visibilityScore } = await this.stage(context, 'scoring', () => ({
        competitiveInsights: this.competitorAnalyzer.generateInsights(brandAnalysis, competitorAnalysis),
        visibilityScore: this.scorer.score(brandAnalysis, competitorAnalysis),
      }));

      const bundle: AnalysisBundle = {
        prompts,
        responses: batch.responses,
        brandAnalysis,
        competitorAnalysis,
        competitiveInsights,
        visibilityScore,
        queryStats: batch.stats,
        timestamp: this.now().toISOString(),
      };

      this.transition(context, 'complete');
      this.logger.info('Analysis complete', {
        runId: context.runId,
        brand: profile.brandName,
        overallScore: visibilityScore.overallScore,
      });
      await this.emit(context, 'run_completed', {
        overallScore: visibilityScore.overallScore,
        durationMs: elapsed(context),
      });

      return bundle;
    } catch (error) {
      const failedStage = context.stage;
      const failure = toRunError(error, failedStage);
      this.transition(context, 'failed');
      this.logger.error(failure.message, { runId: context.runId, stage: failedStage, code: failure.code });
      await this.emit(context, 'run_failed', {
        failedStage,
        code: failure.code,
        message: failure.message,
      });
      throw failure;
    }
  }

  /**
   * Enter a stage, do its work and report it
   */
  private async stage<T>(context: RunContext, stage: WorkStage, work: () => T | Promise<T>): Promise<T> {
    this.transition(context, stage);
    const startTime = Date.now();
    this.logger.debug(`Stage ${stage} started`, { runId: context.runId });
    await this.emit(context, 'stage_started');

    const result = await work();

    await this.emit(context, 'stage_completed', { durationMs: Date.now() - startTime });
    return result;
  }

  private transition(context: RunContext, to: PipelineStage): void {
    const from = context.stage;
    if (!VALID_TRANSITIONS[from].includes(to)) {
      throw Errors.internalError(`Invalid stage transition: ${from} -> ${to}`);
    }
    context.stage = to;
    context.transitions.push({ from, to, timestamp: new Date() });
    if (to === 'complete' || to === 'failed') {
      context.completedAt = new Date();
    }
  }

  private buildPrompts(profile: Readonly<BrandProfile>, options: RunOptions): string[] {
    const prompts = this.promptGenerator
      .generate({
        industry: profile.industry,
        count: profile.promptCount,
        location: profile.location,
        isCustom: profile.isCustomIndustry,
      })
      .map((prompt) => prompt.text);

    if (!options.includeCompetitorPrompts) {
      return prompts;
    }

    const comparisons = validatePrompts(
      this.promptGenerator.generateCompetitorPrompts({
        industry: profile.industry,
        brandName: profile.brandName,
        competitors: profile.competitors,
        location: profile.location,
      })
    ).filter((prompt) => !prompts.includes(prompt));

    return [...prompts, ...comparisons];
  }

  private async runQueries(
    context: RunContext,
    profile: Readonly<BrandProfile>,
    prompts: string[]
  ): Promise<QueryBatchResult> {
    const executor = new QueryExecutor(this.gateway, { ...this.config.executor, logger: this.config.logger });
    const unsubscribe = executor.on(async (event) => {
      if (event.type === 'progress') {
        await this.emit(context, 'query_progress', event.details);
      }
    });

    try {
      return await executor.run(profile.platforms, prompts);
    } finally {
      unsubscribe();
    }
  }
}

function createRunContext(): RunContext {
  return {
    runId: randomUUID(),
    stage: 'created',
    transitions: [],
    startedAt: new Date(),
  };
}

function elapsed(context: RunContext): number {
  return (context.completedAt ?? new Date()).getTime() - context.startedAt.getTime();
}

function toRunError(error: unknown, stage: PipelineStage): LumoraError {
  if (isLumoraError(error) && PASSTHROUGH_CODES.has(error.code)) {
    return error;
  }
  return Errors.pipelineFailed(stage, toLumoraError(error));
}

/**
 * Create a pipeline instance
 */
export function createAnalysisPipeline(
  gateway: QueryGateway,
  config?: AnalysisPipelineConfig
): AnalysisPipeline {
  return new AnalysisPipeline(gateway, config);
}
