export type {
  PlatformId,
  BrandProfile,
  VocabularyCategory,
  IndustryProfile,
  PromptCategory,
  GeneratedPrompt,
} from './profile.js';

export type { PlatformFailure, PromptResponse, PlatformResponses } from './response.js';

export type {
  Sentiment,
  SentimentTally,
  MentionRecord,
  SampleMention,
  PlatformMentionDetail,
  EntityAnalysis,
} from './analysis.js';

export type {
  PlatformStatus,
  PlatformPerformance,
  MarketPosition,
  MarketShareEntry,
  CompetitiveInsights,
  ScoreComponent,
  ComponentScores,
  VisibilityScore,
} from './score.js';

export type { QueryStats, AnalysisBundle } from './bundle.js';
