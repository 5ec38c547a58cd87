/**
 * Option parsing shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import type { BrandProfileInput, PlatformId } from '@lumora/core';

export type OutputFormat = 'json' | 'csv' | 'both';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv', 'both'];

/**
 * Platforms queried in a dry run when none are named
 */
export const DRY_RUN_PLATFORMS: readonly PlatformId[] = ['openai', 'gemini', 'perplexity'];

export interface AnalyzeOptions {
  brand: string;
  industry: string;
  competitors: string[];
  customIndustry: boolean;
  location?: string;
  prompts: number;
  platforms?: string[];
  output: string;
  format: OutputFormat;
  dryRun: boolean;
  includeCompetitorPrompts: boolean;
  verbose: boolean;
}

/**
 * Split a comma-separated option value, dropping empty entries
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (!format) {
    throw new InvalidArgumentError(`Expected one of ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

/**
 * Brand profile input from `analyze` flags. Validation happens in the
 * pipeline.
 */
export function buildProfileInput(options: AnalyzeOptions, platforms: PlatformId[]): BrandProfileInput {
  return {
    brandName: options.brand,
    industry: options.industry,
    isCustomIndustry: options.customIndustry,
    location: options.location ?? null,
    competitors: options.competitors,
    promptCount: options.prompts,
    platforms,
  };
}
