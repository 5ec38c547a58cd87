/**
 * @lumora/analysis
 *
 * Mention extraction, competitive insights and visibility scoring over
 * platform responses.
 */

// Matching
export {
  CONTEXT_RADIUS,
  escapeRegExp,
  generateNameVariants,
  findOccurrences,
  extractRank,
  extractContext,
} from './matching.js';
export type { NameVariants, Occurrence } from './matching.js';

// Sentiment
export {
  SentimentKeywordsSchema,
  DEFAULT_SENTIMENT_KEYWORDS,
  DEFAULT_KEYWORD_SENTIMENT_CONFIG,
  KeywordProximitySentiment,
  loadSentimentKeywords,
  createKeywordSentiment,
} from './sentiment.js';
export type { SentimentStrategy, SentimentKeywords, KeywordSentimentConfig } from './sentiment.js';

// Mention analysis
export {
  MentionAnalyzer,
  DEFAULT_MENTION_ANALYZER_CONFIG,
  emptyEntityAnalysis,
  createMentionAnalyzer,
} from './mention-analyzer.js';
export type { MentionAnalyzerConfig } from './mention-analyzer.js';

// Competitive aggregation
export {
  CompetitorAnalyzer,
  analyzeMarketPosition,
  analyzePlatformPerformance,
  identifyOpportunities,
  identifyThreats,
  generateRecommendations,
  createCompetitorAnalyzer,
} from './competitor-analyzer.js';
export type { CompetitorAnalyzerConfig } from './competitor-analyzer.js';

// Scoring
export {
  VisibilityScorer,
  SCORE_WEIGHTS,
  SCORE_COMPONENTS,
  marketPositionLabel,
  mentionFrequencyScore,
  rankingPositionScore,
  platformCoverageScore,
  sentimentQualityScore,
  competitivePositionScore,
  createVisibilityScorer,
} from './visibility-scorer.js';
export type { MarketPositionLabel } from './visibility-scorer.js';

// Statistics
export {
  platformPerformanceScore,
  calculateMentionStatistics,
  buildComparisonMatrix,
  calculateMarketRank,
  calculateMarketShare,
  calculateCompetitiveMetrics,
} from './statistics.js';
export type {
  PlatformStatistics,
  MentionStatistics,
  ComparisonRow,
  PerformanceGap,
  ImprovementPotential,
  ImprovementOpportunity,
  CompetitiveMetrics,
} from './statistics.js';
