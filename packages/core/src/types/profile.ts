/**
 * Brand profile and industry vocabulary types
 */

/**
 * Identifier of an AI platform (e.g. "openai", "gemini")
 */
export type PlatformId = string;

/**
 * One analysis request. Immutable once validated.
 */
export interface BrandProfile {
  /** Brand being measured */
  brandName: string;
  /** Catalog industry name, or free text when `isCustomIndustry` is set */
  industry: string;
  /** Whether the industry vocabulary is synthesized instead of looked up */
  isCustomIndustry: boolean;
  /** Market the prompts should reference, if any */
  location: string | null;
  /** Competitors in canonical order */
  competitors: string[];
  /** Number of prompts to generate */
  promptCount: number;
  /** Platforms to query */
  platforms: PlatformId[];
}

/**
 * Vocabulary categories an industry profile provides
 */
export type VocabularyCategory =
  | 'terms'
  | 'regions'
  | 'businessTypes'
  | 'painPoints'
  | 'actions'
  | 'needs'
  | 'useCases'
  | 'features'
  | 'capabilities'
  | 'benefits';

/**
 * Term lists used to fill prompt templates. Every list is non-empty.
 */
export type IndustryProfile = Record<VocabularyCategory, string[]>;

/**
 * Prompt template categories, in generation order
 */
export type PromptCategory =
  | 'direct_comparison'
  | 'recommendation'
  | 'problem_solving'
  | 'feature_specific'
  | 'buying_journey';

/**
 * One generated question
 */
export interface GeneratedPrompt {
  category: PromptCategory;
  text: string;
  industry: string;
}
