/**
 * Prompt Generator
 *
 * Builds industry-specific questions to send to AI platforms. Prompts are
 * spread evenly over five categories; every placeholder is filled
 * independently at random from the industry vocabulary.
 */

import {
  Errors,
  INDUSTRY_CATALOG,
  createSilentLogger,
  type GeneratedPrompt,
  type IndustryCatalog,
  type IndustryProfile,
  type Logger,
  type PromptCategory,
} from '@lumora/core';
import {
  PLACEHOLDER_PATTERN,
  PLACEHOLDER_VOCABULARY,
  PROMPT_CATEGORIES,
  PROMPT_TEMPLATES,
  type PromptTemplates,
  type TemplateSet,
} from './templates.js';
import { resolveIndustryProfile } from './vocabulary.js';

/**
 * Returns a float in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Prompt generator configuration
 */
export interface PromptGeneratorConfig {
  /** Random source; inject a seeded one for reproducible output */
  random?: RandomSource;
  /** Industry catalog to look up non-custom industries in */
  catalog?: Readonly<IndustryCatalog>;
  templates?: PromptTemplates;
  logger?: Logger;
}

export interface PromptRequest {
  industry: string;
  /** Exact number of prompts to return */
  count: number;
  location?: string | null;
  /** Synthesize a vocabulary instead of looking the industry up */
  isCustom?: boolean;
}

export interface CompetitorPromptRequest {
  industry: string;
  brandName: string;
  competitors: string[];
  location?: string | null;
}

/**
 * Number of feature comparison prompts in a competitor set
 */
const FEATURE_COMPARISONS = 3;

/**
 * Number of competitors that get an "advantages over" prompt
 */
const ADVANTAGE_COMPARISONS = 2;

export class PromptGenerator {
  private readonly random: RandomSource;
  private readonly catalog: Readonly<IndustryCatalog>;
  private readonly templates: PromptTemplates;
  private readonly logger: Logger;

  constructor(config: PromptGeneratorConfig = {}) {
    this.random = config.random ?? Math.random;
    this.catalog = config.catalog ?? INDUSTRY_CATALOG;
    this.templates = config.templates ?? PROMPT_TEMPLATES;
    this.logger = (config.logger ?? createSilentLogger()).child('prompt-generator');
  }

  /**
   * Generate exactly `request.count` prompts.
   *
   * @throws LumoraError UNSUPPORTED_INDUSTRY for a non-custom industry missing from the catalog
   * @throws LumoraError VALIDATION_FAILED for a count below 1
   */
  generate(request: PromptRequest): GeneratedPrompt[] {
    const { industry, count } = request;
    const location = request.location ? request.location : null;

    if (!Number.isInteger(count) || count < 1) {
      throw Errors.validationFailed(`Prompt count must be a positive integer, got ${count}`, { count });
    }

    const profile = resolveIndustryProfile(
      { industry, isCustom: request.isCustom ?? false, location },
      this.catalog
    );
    const templateSet = location ? this.templates.locationAware : this.templates.generic;
    const perCategory = Math.max(1, Math.floor(count / PROMPT_CATEGORIES.length));

    const prompts: GeneratedPrompt[] = [];
    for (const category of PROMPT_CATEGORIES) {
      for (let i = 0; i < perCategory; i++) {
        prompts.push(this.generateOne(category, templateSet, profile, industry));
      }
    }

    while (prompts.length < count) {
      const category = this.pick(PROMPT_CATEGORIES);
      prompts.push(this.generateOne(category, templateSet, profile, industry));
    }

    const result = prompts.slice(0, count).map((prompt) =>
      location ? { ...prompt, text: ensureLocation(prompt.text, location) } : prompt
    );

    this.logger.debug('Generated prompts', { industry, count: result.length, location });
    return result;
  }

  /**
   * Head-to-head prompts naming the brand and its competitors: one direct
   * comparison per competitor, feature comparisons over the first industry
   * features, and "advantages over" prompts for the first competitors.
   */
  generateCompetitorPrompts(request: CompetitorPromptRequest): string[] {
    const { brandName, competitors } = request;
    const location = request.location ? request.location : null;
    const inLocation = location ? ` in ${location}` : '';

    const profile = resolveIndustryProfile(
      { industry: request.industry, isCustom: !Object.hasOwn(this.catalog, request.industry), location },
      this.catalog
    );

    const prompts = competitors.map((competitor) => `Compare ${brandName} vs ${competitor}${inLocation}`);

    if (competitors.length > 0) {
      for (const feature of profile.features.slice(0, FEATURE_COMPARISONS)) {
        prompts.push(`Which is better for ${feature}: ${brandName} or ${this.pick(competitors)}${inLocation}?`);
      }
    }

    for (const competitor of competitors.slice(0, ADVANTAGE_COMPARISONS)) {
      prompts.push(`What are the advantages of ${brandName} over ${competitor}${inLocation}?`);
    }

    return prompts;
  }

  private generateOne(
    category: PromptCategory,
    templateSet: TemplateSet,
    profile: IndustryProfile,
    industry: string
  ): GeneratedPrompt {
    const template = this.pick(templateSet[category]);
    return { category, text: this.fillTemplate(template, profile), industry };
  }

  /**
   * Replace every known placeholder with an independent random draw
   */
  fillTemplate(template: string, profile: IndustryProfile): string {
    return template.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) => {
      if (!Object.hasOwn(PLACEHOLDER_VOCABULARY, name)) {
        return placeholder;
      }
      return this.pick(profile[PLACEHOLDER_VOCABULARY[name]]);
    });
  }

  private pick<T>(items: readonly T[]): T {
    const index = Math.min(items.length - 1, Math.floor(this.random() * items.length));
    return items[index];
  }
}

/**
 * Add " in <location>" to a prompt that does not mention it, keeping a
 * trailing question mark last
 */
export function ensureLocation(text: string, location: string): string {
  if (text.includes(location)) {
    return text;
  }
  if (text.endsWith('?')) {
    return `${text.slice(0, -1)} in ${location}?`;
  }
  return `${text} in ${location}`;
}

/**
 * Drop prompts with unresolved placeholders and repeated prompts, keeping
 * first occurrences in order
 */
export function validatePrompts(prompts: readonly string[]): string[] {
  const seen = new Set<string>();
  const valid: string[] = [];

  for (const prompt of prompts) {
    if (prompt.includes('{') || prompt.includes('}') || seen.has(prompt)) {
      continue;
    }
    seen.add(prompt);
    valid.push(prompt);
  }

  return valid;
}

export function createPromptGenerator(config: PromptGeneratorConfig = {}): PromptGenerator {
  return new PromptGenerator(config);
}

/**
 * Generate prompts with a default generator
 */
export function generatePrompts(request: PromptRequest, config: PromptGeneratorConfig = {}): GeneratedPrompt[] {
  return createPromptGenerator(config).generate(request);
}
