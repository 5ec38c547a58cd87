/**
 * @lumora/prompt-generator
 *
 * Industry-specific question generation for brand visibility analysis.
 */

export {
  PromptGenerator,
  createPromptGenerator,
  generatePrompts,
  ensureLocation,
  validatePrompts,
  type PromptGeneratorConfig,
  type PromptRequest,
  type CompetitorPromptRequest,
  type RandomSource,
} from './generator.js';

export {
  PROMPT_CATEGORIES,
  PROMPT_TEMPLATES,
  PLACEHOLDER_VOCABULARY,
  PromptTemplatesSchema,
  loadPromptTemplates,
  type PromptTemplates,
  type TemplateSet,
} from './templates.js';

export {
  GENERIC_VOCABULARY,
  buildCustomIndustryProfile,
  resolveIndustryProfile,
  type VocabularyRequest,
} from './vocabulary.js';
