/**
 * Query Executor
 *
 * Fans every (platform, prompt) pair out over a bounded pool. Workers only
 * send completion messages; a single coordinator owns the per-platform
 * buffers and the progress counter, so each unit is counted exactly once.
 * Buffers are re-sorted by prompt index before they are returned.
 */

import {
  AsyncChannel,
  createSilentLogger,
  errorMessage,
  runPool,
  type Logger,
  type PlatformFailure,
  type PlatformId,
  type PlatformResponses,
  type PromptResponse,
  type QueryStats,
} from '@lumora/core';
import { toResponseText } from '@lumora/platform-gateway';
import type {
  QueryBatchResult,
  QueryExecutorConfig,
  QueryExecutorEvent,
  QueryExecutorEventHandler,
  QueryGateway,
  QueryProgress,
  QueryUnit,
  UnitCompletion,
} from './types.js';
import { DEFAULT_QUERY_EXECUTOR_CONFIG } from './types.js';

export interface QueryExecutorOptions extends QueryExecutorConfig {
  logger?: Logger;
}

/**
 * Query Executor class
 */
export class QueryExecutor {
  private config: Required<QueryExecutorConfig>;
  private eventHandlers: Set<QueryExecutorEventHandler> = new Set();
  private logger: Logger;

  constructor(
    private readonly gateway: QueryGateway,
    options: QueryExecutorOptions = {}
  ) {
    const { logger, ...config } = options;
    this.config = { ...DEFAULT_QUERY_EXECUTOR_CONFIG, ...config };
    this.logger = (logger ?? createSilentLogger()).child('executor');
  }

  /**
   * Subscribe to executor events
   */
  on(handler: QueryExecutorEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  /**
   * Emit an event
   */
  private async emit(
    type: QueryExecutorEvent['type'],
    details: Record<string, unknown>,
    platform?: PlatformId
  ): Promise<void> {
    const event: QueryExecutorEvent = { type, timestamp: new Date(), platform, details };
    for (const handler of this.eventHandlers) {
      try {
        await handler(event);
      } catch (error) {
        console.error('Event handler error:', error);
      }
    }
  }

  /**
   * Pool size for a batch: proportional to the platform count, bounded by the
   * number of units and the global cap
   */
  poolSize(platformCount: number, unitCount: number): number {
    return Math.max(
      1,
      Math.min(platformCount * this.config.workersPerPlatform, unitCount, this.config.maxWorkers)
    );
  }

  /**
   * Query every prompt on every platform. Individual failures never abort
   * the batch; they come back as error-marked responses.
   */
  async execute(platforms: PlatformId[], prompts: string[]): Promise<PlatformResponses> {
    const { responses } = await this.run(platforms, prompts);
    return responses;
  }

  /**
   * Like `execute`, with per-platform failure counts and timing
   */
  async run(platforms: PlatformId[], prompts: string[]): Promise<QueryBatchResult> {
    const startTime = Date.now();
    const platformIds = [...new Set(platforms)];
    const units: QueryUnit[] = platformIds.flatMap((platform) =>
      prompts.map((prompt, promptIndex) => ({ platform, prompt, promptIndex }))
    );
    const total = units.length;
    const workers = total > 0 ? this.poolSize(platformIds.length, total) : 0;

    const buffers = new Map<PlatformId, UnitCompletion[]>(platformIds.map((platform) => [platform, []]));
    const stats: QueryStats = {
      total,
      failed: 0,
      perPlatform: Object.fromEntries(platformIds.map((platform) => [platform, { total: 0, failed: 0 }])),
      durationMs: 0,
    };

    await this.emit('batch_started', { total, platforms: platformIds, workers });
    this.logger.info('Query batch started', { total, platforms: platformIds.length, workers });

    if (total > 0) {
      const channel = new AsyncChannel<UnitCompletion>();
      const pool = runPool(units, workers, (unit) => this.runUnit(unit, channel)).finally(() =>
        channel.close()
      );
      const coordinator = this.coordinate(channel, buffers, stats);
      await Promise.all([pool, coordinator]);
    }

    const responses: PlatformResponses = {};
    for (const [platform, buffer] of buffers) {
      responses[platform] = [...buffer]
        .sort((a, b) => a.promptIndex - b.promptIndex)
        .map(toPromptResponse);
    }

    stats.durationMs = Date.now() - startTime;
    await this.emit('batch_completed', { total, failed: stats.failed, durationMs: stats.durationMs });
    this.logger.info('Query batch completed', {
      total,
      failed: stats.failed,
      durationMs: stats.durationMs,
    });

    return { responses, stats };
  }

  /**
   * Single writer for buffers, counters and progress events
   */
  private async coordinate(
    channel: AsyncChannel<UnitCompletion>,
    buffers: Map<PlatformId, UnitCompletion[]>,
    stats: QueryStats
  ): Promise<void> {
    let completed = 0;

    for await (const completion of channel) {
      buffers.get(completion.platform)?.push(completion);
      completed++;

      const platformStats = stats.perPlatform[completion.platform];
      platformStats.total++;
      if (completion.error) {
        platformStats.failed++;
        stats.failed++;
        await this.emit(
          'unit_failed',
          {
            promptIndex: completion.promptIndex,
            code: completion.error.code,
            message: completion.error.message,
          },
          completion.platform
        );
      }

      const progress: QueryProgress = {
        completed,
        total: stats.total,
        platform: completion.platform,
      };
      await this.emit('progress', { ...progress }, completion.platform);
    }
  }

  /**
   * Query one unit and report it. Anything thrown here is converted to an
   * error-marked response so the unit is still counted.
   */
  private async runUnit(unit: QueryUnit, channel: AsyncChannel<UnitCompletion>): Promise<void> {
    try {
      const result = await this.gateway.query(unit.platform, unit.prompt);
      channel.send({
        ...unit,
        response: toResponseText(unit.platform, result),
        error: result.ok ? undefined : result.error,
      });
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warning('Error in concurrent query', {
        platform: unit.platform,
        promptIndex: unit.promptIndex,
        error: message,
      });
      const failure: PlatformFailure = { code: 'INTERNAL_ERROR', message };
      channel.send({
        ...unit,
        response: toResponseText(unit.platform, { ok: false, error: failure }),
        error: failure,
      });
    }
  }
}

function toPromptResponse(completion: UnitCompletion): PromptResponse {
  const entry: PromptResponse = { prompt: completion.prompt, response: completion.response };
  if (completion.error) {
    entry.error = completion.error;
  }
  return entry;
}

/**
 * Create an executor instance
 */
export function createQueryExecutor(gateway: QueryGateway, options: QueryExecutorOptions = {}): QueryExecutor {
  return new QueryExecutor(gateway, options);
}
