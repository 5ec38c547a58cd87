/**
 * @lumora/executor
 *
 * Concurrent query fan-out with ordering restoration and progress events.
 */

// Types
export type {
  QueryGateway,
  QueryUnit,
  UnitCompletion,
  QueryExecutorConfig,
  QueryExecutorEventType,
  QueryExecutorEvent,
  QueryExecutorEventHandler,
  QueryProgress,
  QueryBatchResult,
} from './types.js';

export { DEFAULT_QUERY_EXECUTOR_CONFIG } from './types.js';

// Executor
export { QueryExecutor, createQueryExecutor, type QueryExecutorOptions } from './executor.js';
