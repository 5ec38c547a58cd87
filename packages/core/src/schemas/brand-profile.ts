/**
 * Brand profile schema
 */

import { z } from 'zod';
import { PROFILE_LIMITS } from '../constants.js';
import { Errors } from '../errors.js';
import type { BrandProfile } from '../types/index.js';
import {
  describeValidationErrors,
  formatValidationErrors,
  nonEmptyString,
  validateSchema,
  type ValidationResult,
} from '../utils/schema.js';

const entityName = nonEmptyString;

export const BrandProfileSchema = z
  .object({
    brandName: entityName.describe('Brand being measured'),
    industry: entityName.describe('Catalog industry or custom industry name'),
    isCustomIndustry: z.boolean().default(false),
    location: z
      .string()
      .trim()
      .nullish()
      .transform((value) => (value ? value : null)),
    competitors: z
      .array(entityName)
      .min(PROFILE_LIMITS.MIN_COMPETITORS, 'At least one competitor is required')
      .max(PROFILE_LIMITS.MAX_COMPETITORS, `At most ${PROFILE_LIMITS.MAX_COMPETITORS} competitors are allowed`),
    promptCount: z
      .number()
      .int()
      .min(PROFILE_LIMITS.MIN_PROMPTS)
      .max(PROFILE_LIMITS.MAX_PROMPTS)
      .default(PROFILE_LIMITS.DEFAULT_PROMPTS),
    platforms: z.array(entityName).min(1, 'At least one platform must be selected'),
  })
  .refine((profile) => new Set(profile.competitors).size === profile.competitors.length, {
    message: 'Competitor names must be unique',
    path: ['competitors'],
  })
  .refine((profile) => new Set(profile.platforms).size === profile.platforms.length, {
    message: 'Platforms must be unique',
    path: ['platforms'],
  });

/**
 * Brand profile as accepted from callers, before defaults are applied
 */
export type BrandProfileInput = z.input<typeof BrandProfileSchema>;

export function validateBrandProfile(data: unknown): ValidationResult<BrandProfile> {
  return validateSchema(BrandProfileSchema, data);
}

/**
 * Validate a brand profile and freeze it.
 *
 * @throws LumoraError with code VALIDATION_FAILED
 */
export function parseBrandProfile(data: unknown): Readonly<BrandProfile> {
  const result = BrandProfileSchema.safeParse(data);
  if (!result.success) {
    const errors = formatValidationErrors(result.error);
    throw Errors.validationFailed(`Invalid brand profile: ${describeValidationErrors(errors)}`, {
      errors,
    });
  }

  const profile = result.data;
  Object.freeze(profile.competitors);
  Object.freeze(profile.platforms);
  return Object.freeze(profile);
}
