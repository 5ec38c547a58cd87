/**
 * Executor Types
 *
 * Types for query fan-out, completion messages and progress events.
 */

import {
  POOL_LIMITS,
  type PlatformFailure,
  type PlatformId,
  type PlatformResponses,
  type QueryStats,
} from '@lumora/core';
import type { PlatformResult } from '@lumora/platform-gateway';

/**
 * Anything that can answer a prompt on a platform without throwing
 */
export interface QueryGateway {
  query(platformId: PlatformId, prompt: string): Promise<PlatformResult>;
}

/**
 * One (platform, prompt) pair
 */
export interface QueryUnit {
  platform: PlatformId;
  prompt: string;
  /** Position of the prompt in the canonical prompt list */
  promptIndex: number;
}

/**
 * Message a worker sends when its unit finishes, successfully or not
 */
export interface UnitCompletion extends QueryUnit {
  response: string;
  error?: PlatformFailure;
}

/**
 * Executor configuration
 */
export interface QueryExecutorConfig {
  /** Concurrent queries allowed per selected platform */
  workersPerPlatform?: number;
  /** Hard cap on concurrent queries */
  maxWorkers?: number;
}

/**
 * Default executor configuration
 */
export const DEFAULT_QUERY_EXECUTOR_CONFIG: Required<QueryExecutorConfig> = {
  workersPerPlatform: POOL_LIMITS.QUERY_WORKERS_PER_PLATFORM,
  maxWorkers: POOL_LIMITS.MAX_QUERY_WORKERS,
};

/**
 * Executor event types
 */
export type QueryExecutorEventType =
  | 'batch_started'
  | 'progress'
  | 'unit_failed'
  | 'batch_completed';

/**
 * Executor event
 */
export interface QueryExecutorEvent {
  /** Event type */
  type: QueryExecutorEventType;
  /** Timestamp */
  timestamp: Date;
  /** Platform the event concerns, for unit-level events */
  platform?: PlatformId;
  /** Event details */
  details: Record<string, unknown>;
}

/**
 * Executor event handler
 */
export type QueryExecutorEventHandler = (event: QueryExecutorEvent) => void | Promise<void>;

/**
 * Progress snapshot carried by `progress` events
 */
export interface QueryProgress {
  completed: number;
  total: number;
  platform: PlatformId;
}

/**
 * Outcome of a batch
 */
export interface QueryBatchResult {
  responses: PlatformResponses;
  stats: QueryStats;
}
