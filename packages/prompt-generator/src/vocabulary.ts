/**
 * Industry vocabulary resolution: catalog lookup or synthesis for custom
 * industries
 */

import { z } from 'zod';
import {
  Errors,
  INDUSTRY_CATALOG,
  IndustryProfileSchema,
  describeValidationErrors,
  formatValidationErrors,
  getIndustryProfile,
  type IndustryCatalog,
  type IndustryProfile,
} from '@lumora/core';
import customIndustryData from '../data/custom-industry.json' with { type: 'json' };

/**
 * Generic business vocabulary; terms are derived from the industry name
 */
const GenericVocabularySchema = IndustryProfileSchema.omit({ terms: true });

type GenericVocabulary = z.infer<typeof GenericVocabularySchema>;

function loadGenericVocabulary(data: unknown): GenericVocabulary {
  const result = GenericVocabularySchema.safeParse(data);
  if (!result.success) {
    const errors = formatValidationErrors(result.error);
    throw Errors.configurationError(
      `Invalid custom industry vocabulary: ${describeValidationErrors(errors)}`,
      { errors }
    );
  }
  return result.data;
}

export const GENERIC_VOCABULARY: Readonly<GenericVocabulary> = Object.freeze(
  loadGenericVocabulary(customIndustryData)
);

/**
 * Vocabulary for an industry that is not in the catalog
 */
export function buildCustomIndustryProfile(industryName: string, location: string | null = null): IndustryProfile {
  const regions = location ? [location, ...GENERIC_VOCABULARY.regions] : [...GENERIC_VOCABULARY.regions];

  return {
    terms: [
      industryName.toLowerCase(),
      industryName,
      `${industryName} solutions`,
      `${industryName} services`,
    ],
    regions,
    businessTypes: [...GENERIC_VOCABULARY.businessTypes],
    painPoints: [...GENERIC_VOCABULARY.painPoints],
    actions: [...GENERIC_VOCABULARY.actions],
    needs: [...GENERIC_VOCABULARY.needs],
    useCases: [...GENERIC_VOCABULARY.useCases],
    features: [...GENERIC_VOCABULARY.features],
    capabilities: [...GENERIC_VOCABULARY.capabilities],
    benefits: [...GENERIC_VOCABULARY.benefits],
  };
}

export interface VocabularyRequest {
  industry: string;
  isCustom: boolean;
  location: string | null;
}

/**
 * Vocabulary for a generation call. Catalog entries are copied, with the
 * location moved to the front of the region list.
 *
 * @throws LumoraError with code UNSUPPORTED_INDUSTRY for an unknown catalog industry
 */
export function resolveIndustryProfile(
  request: VocabularyRequest,
  catalog: Readonly<IndustryCatalog> = INDUSTRY_CATALOG
): IndustryProfile {
  if (request.isCustom) {
    return buildCustomIndustryProfile(request.industry, request.location);
  }

  const profile = getIndustryProfile(request.industry, catalog);
  if (!profile) {
    throw Errors.unsupportedIndustry(request.industry);
  }

  const { location } = request;
  return {
    ...profile,
    regions: location
      ? [location, ...profile.regions.filter((region) => region !== location)]
      : [...profile.regions],
  };
}
