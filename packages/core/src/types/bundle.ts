/**
 * Result bundle handed to presentation and export layers
 */

import type { EntityAnalysis } from './analysis.js';
import type { PlatformId } from './profile.js';
import type { PlatformResponses } from './response.js';
import type { CompetitiveInsights, VisibilityScore } from './score.js';

export interface QueryStats {
  total: number;
  failed: number;
  perPlatform: Record<PlatformId, { total: number; failed: number }>;
  durationMs: number;
}

export interface AnalysisBundle {
  prompts: string[];
  responses: PlatformResponses;
  brandAnalysis: EntityAnalysis;
  /** One entry per competitor, in canonical competitor order */
  competitorAnalysis: EntityAnalysis[];
  competitiveInsights: CompetitiveInsights;
  visibilityScore: VisibilityScore;
  queryStats: QueryStats;
  /** ISO-8601 */
  timestamp: string;
}
