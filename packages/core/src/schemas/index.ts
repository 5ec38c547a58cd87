/**
 * Schema exports for @lumora/core
 */

export {
  BrandProfileSchema,
  validateBrandProfile,
  parseBrandProfile,
} from './brand-profile.js';
export type { BrandProfileInput } from './brand-profile.js';

export { IndustryProfileSchema, IndustryCatalogSchema } from './industry.js';
export type { IndustryCatalog } from './industry.js';
