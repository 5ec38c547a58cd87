/**
 * @lumora/orchestrator
 *
 * End-to-end brand visibility analysis and result export.
 */

// Types
export type {
  PipelineStage,
  WorkStage,
  StageTransition,
  RunContext,
  RunOptions,
  AnalysisPipelineConfig,
  PipelineEventType,
  PipelineEvent,
  PipelineEventHandler,
} from './types.js';

// Pipeline
export { AnalysisPipeline, createAnalysisPipeline } from './pipeline.js';

// Export
export {
  buildExportDocument,
  buildAnalysisReport,
  buildSummaryCsv,
  buildResponsesCsv,
  topPlatform,
} from './export.js';
export type { ExportDocument, AnalysisReport } from './export.js';
