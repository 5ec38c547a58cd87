/**
 * Industry vocabulary schemas
 */

import { z } from 'zod';
import { nonEmptyString } from '../utils/schema.js';

const termList = z.array(nonEmptyString).min(1, 'Term lists cannot be empty');

export const IndustryProfileSchema = z.object({
  terms: termList,
  regions: termList,
  businessTypes: termList,
  painPoints: termList,
  actions: termList,
  needs: termList,
  useCases: termList,
  features: termList,
  capabilities: termList,
  benefits: termList,
});

export const IndustryCatalogSchema = z.record(z.string().min(1), IndustryProfileSchema);

export type IndustryCatalog = z.infer<typeof IndustryCatalogSchema>;
