/**
 * Pipeline Types
 *
 * Types for the run context, stage lifecycle and pipeline events.
 */

import type {
  BrandProfile,
  Logger,
  PlatformResponses,
  QueryStats,
} from '@lumora/core';
import type { CompetitorAnalyzer, MentionAnalyzer, VisibilityScorer } from '@lumora/analysis';
import type { QueryExecutorConfig } from '@lumora/executor';
import type { PromptGenerator } from '@lumora/prompt-generator';

/**
 * Stage of a run in the state machine
 */
export type PipelineStage =
  | 'created'
  | 'validating'
  | 'generating_prompts'
  | 'querying'
  | 'analyzing_brand'
  | 'analyzing_competitors'
  | 'scoring'
  | 'complete'
  | 'failed';

/**
 * Stages that do work, in execution order
 */
export type WorkStage = Exclude<PipelineStage, 'created' | 'complete' | 'failed'>;

/**
 * Stage transition
 */
export interface StageTransition {
  from: PipelineStage;
  to: PipelineStage;
  timestamp: Date;
}

/**
 * State of one run. Created per call and never shared between runs.
 */
export interface RunContext {
  /** Unique run ID */
  runId: string;
  stage: PipelineStage;
  transitions: StageTransition[];
  startedAt: Date;
  completedAt?: Date;
  profile?: Readonly<BrandProfile>;
  prompts?: string[];
  responses?: PlatformResponses;
  queryStats?: QueryStats;
}

/**
 * Per-run options
 */
export interface RunOptions {
  /** Append brand-versus-competitor comparison prompts to the generated set */
  includeCompetitorPrompts?: boolean;
}

/**
 * Pipeline configuration. Every collaborator can be injected.
 */
export interface AnalysisPipelineConfig {
  logger?: Logger;
  promptGenerator?: PromptGenerator;
  mentionAnalyzer?: MentionAnalyzer;
  competitorAnalyzer?: CompetitorAnalyzer;
  scorer?: VisibilityScorer;
  /** Worker pool settings for the query stage */
  executor?: QueryExecutorConfig;
  /** Clock used for bundle timestamps */
  now?: () => Date;
}

/**
 * Pipeline events
 */
export type PipelineEventType =
  | 'stage_started'
  | 'stage_completed'
  | 'query_progress'
  | 'run_completed'
  | 'run_failed';

/**
 * Pipeline event
 */
export interface PipelineEvent {
  /** Event type */
  type: PipelineEventType;
  /** Run ID */
  runId: string;
  /** Stage the event concerns */
  stage: PipelineStage;
  /** Event timestamp */
  timestamp: Date;
  /** Event details */
  details: Record<string, unknown>;
}

/**
 * Pipeline event handler
 */
export type PipelineEventHandler = (event: PipelineEvent) => void | Promise<void>;
