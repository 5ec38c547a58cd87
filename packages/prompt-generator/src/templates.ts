/**
 * Prompt templates and the placeholder vocabulary they draw from
 */

import { z } from 'zod';
import {
  Errors,
  describeValidationErrors,
  formatValidationErrors,
  type PromptCategory,
  type VocabularyCategory,
} from '@lumora/core';
import templateData from '../data/prompt-templates.json' with { type: 'json' };

/**
 * Categories in generation order
 */
export const PROMPT_CATEGORIES: readonly PromptCategory[] = [
  'direct_comparison',
  'recommendation',
  'problem_solving',
  'feature_specific',
  'buying_journey',
];

/**
 * Vocabulary list each `{placeholder}` is filled from
 */
export const PLACEHOLDER_VOCABULARY: Readonly<Record<string, VocabularyCategory>> = {
  industry: 'terms',
  region: 'regions',
  businessType: 'businessTypes',
  painPoint: 'painPoints',
  action: 'actions',
  need: 'needs',
  useCase: 'useCases',
  feature: 'features',
  capability: 'capabilities',
  benefit: 'benefits',
};

export const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

const templateList = z
  .array(z.string().min(1))
  .min(1, 'Each category needs at least one template')
  .refine(
    (templates) =>
      templates.every((template) =>
        [...template.matchAll(PLACEHOLDER_PATTERN)].every((match) =>
          Object.hasOwn(PLACEHOLDER_VOCABULARY, match[1])
        )
      ),
    'Unknown placeholder in template'
  );

const TemplateSetSchema = z.object({
  direct_comparison: templateList,
  recommendation: templateList,
  problem_solving: templateList,
  feature_specific: templateList,
  buying_journey: templateList,
});

export const PromptTemplatesSchema = z.object({
  /** Templates with a `{region}` slot, used when a location is given */
  locationAware: TemplateSetSchema,
  /** Templates without a region, used otherwise */
  generic: TemplateSetSchema,
});

export type TemplateSet = z.infer<typeof TemplateSetSchema>;
export type PromptTemplates = z.infer<typeof PromptTemplatesSchema>;

/**
 * @throws LumoraError with code CONFIGURATION_ERROR
 */
export function loadPromptTemplates(data: unknown): PromptTemplates {
  const result = PromptTemplatesSchema.safeParse(data);
  if (!result.success) {
    const errors = formatValidationErrors(result.error);
    throw Errors.configurationError(`Invalid prompt templates: ${describeValidationErrors(errors)}`, {
      errors,
    });
  }
  return result.data;
}

export const PROMPT_TEMPLATES: PromptTemplates = loadPromptTemplates(templateData);
