/**
 * Predefined industry vocabularies
 */

import catalogData from '../../data/industries.json' with { type: 'json' };
import { Errors } from '../errors.js';
import { IndustryCatalogSchema, type IndustryCatalog } from '../schemas/industry.js';
import type { IndustryProfile } from '../types/index.js';
import { describeValidationErrors, formatValidationErrors } from '../utils/schema.js';

/**
 * Validate raw catalog data.
 *
 * @throws LumoraError with code CONFIGURATION_ERROR
 */
export function loadIndustryCatalog(data: unknown): Readonly<IndustryCatalog> {
  const result = IndustryCatalogSchema.safeParse(data);
  if (!result.success) {
    const errors = formatValidationErrors(result.error);
    throw Errors.configurationError(`Invalid industry catalog: ${describeValidationErrors(errors)}`, {
      errors,
    });
  }
  return Object.freeze(result.data);
}

export const INDUSTRY_CATALOG: Readonly<IndustryCatalog> = loadIndustryCatalog(catalogData);

export function getIndustryProfile(
  industry: string,
  catalog: Readonly<IndustryCatalog> = INDUSTRY_CATALOG
): IndustryProfile | undefined {
  return Object.hasOwn(catalog, industry) ? catalog[industry] : undefined;
}

export function listIndustries(catalog: Readonly<IndustryCatalog> = INDUSTRY_CATALOG): string[] {
  return Object.keys(catalog);
}
