import { describe, it, expect } from 'vitest';
import { validateSchema, describeValidationErrors, z } from '../../utils/schema.js';
import { validateBrandProfile, parseBrandProfile } from '../../schemas/brand-profile.js';
import { isLumoraError } from '../../errors.js';

const validProfile = {
  brandName: 'Acme',
  industry: 'FinTech',
  competitors: ['Globex', 'Initech'],
  platforms: ['openai', 'gemini'],
};

describe('validateSchema', () => {
  const testSchema = z.object({
    name: z.string(),
    age: z.number(),
  });

  it('returns success for valid data', () => {
    const result = validateSchema(testSchema, { name: 'Dana', age: 30 });
    expect(result.success).toBe(true);
    expect(result.data).toEqual({ name: 'Dana', age: 30 });
    expect(result.errors).toBeUndefined();
  });

  it('provides error path information', () => {
    const result = validateSchema(testSchema, { name: 123, age: 'thirty' });
    expect(result.success).toBe(false);
    const paths = result.errors?.map((e) => e.path);
    expect(paths).toContainEqual(['name']);
    expect(paths).toContainEqual(['age']);
  });
});

describe('describeValidationErrors', () => {
  it('joins path and message', () => {
    expect(
      describeValidationErrors([
        { path: ['competitors', 0], message: 'Required', code: 'invalid_type' },
        { path: [], message: 'Bad', code: 'custom' },
      ])
    ).toBe('competitors.0: Required; Bad');
  });
});

describe('validateBrandProfile', () => {
  it('applies defaults', () => {
    const result = validateBrandProfile(validProfile);
    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      ...validProfile,
      isCustomIndustry: false,
      location: null,
      promptCount: 20,
    });
  });

  it('trims names and treats a blank location as none', () => {
    const result = validateBrandProfile({ ...validProfile, brandName: '  Acme ', location: '   ' });
    expect(result.data?.brandName).toBe('Acme');
    expect(result.data?.location).toBeNull();
  });

  it('keeps a supplied location', () => {
    const result = validateBrandProfile({ ...validProfile, location: 'Mumbai' });
    expect(result.data?.location).toBe('Mumbai');
  });

  it('rejects an empty brand name', () => {
    const result = validateBrandProfile({ ...validProfile, brandName: '' });
    expect(result.success).toBe(false);
    expect(result.errors?.[0].path).toEqual(['brandName']);
  });

  it('requires between 1 and 10 competitors', () => {
    expect(validateBrandProfile({ ...validProfile, competitors: [] }).success).toBe(false);
    const eleven = Array.from({ length: 11 }, (_, i) => `Competitor ${i}`);
    expect(validateBrandProfile({ ...validProfile, competitors: eleven }).success).toBe(false);
  });

  it('requires a prompt count between 10 and 50', () => {
    expect(validateBrandProfile({ ...validProfile, promptCount: 9 }).success).toBe(false);
    expect(validateBrandProfile({ ...validProfile, promptCount: 51 }).success).toBe(false);
    expect(validateBrandProfile({ ...validProfile, promptCount: 50 }).success).toBe(true);
  });

  it('requires at least one platform', () => {
    const result = validateBrandProfile({ ...validProfile, platforms: [] });
    expect(result.success).toBe(false);
    expect(result.errors?.[0].message).toBe('At least one platform must be selected');
  });

  it('rejects duplicate platforms and competitors', () => {
    expect(validateBrandProfile({ ...validProfile, platforms: ['openai', 'openai'] }).success).toBe(false);
    expect(validateBrandProfile({ ...validProfile, competitors: ['Globex', 'Globex'] }).success).toBe(false);
  });
});

describe('parseBrandProfile', () => {
  it('returns a frozen profile', () => {
    const profile = parseBrandProfile(validProfile);
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.competitors)).toBe(true);
  });

  it('throws VALIDATION_FAILED with the field errors', () => {
    try {
      parseBrandProfile({ ...validProfile, industry: '' });
      expect.fail('expected a validation error');
    } catch (error) {
      expect(isLumoraError(error)).toBe(true);
      if (isLumoraError(error)) {
        expect(error.code).toBe('VALIDATION_FAILED');
        expect(error.message).toContain('industry:');
      }
    }
  });
});
