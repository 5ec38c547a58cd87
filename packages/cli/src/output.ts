/**
 * Writes analysis results to the output directory
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { AnalysisBundle, BrandProfile } from '@lumora/core';
import {
  buildAnalysisReport,
  buildExportDocument,
  buildResponsesCsv,
  buildSummaryCsv,
} from '@lumora/orchestrator';
import type { OutputFormat } from './options.js';

/**
 * Brand name reduced to characters safe in a file name
 */
export function fileStem(brandName: string): string {
  const stem = brandName.trim().replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
  return stem || 'brand';
}

/**
 * Write the export files for `format` and return their paths
 */
export async function writeResults(
  directory: string,
  profile: Readonly<BrandProfile>,
  bundle: AnalysisBundle,
  format: OutputFormat,
  now: Date = new Date()
): Promise<string[]> {
  await fs.mkdir(directory, { recursive: true });
  const stem = fileStem(profile.brandName);
  const files: Array<[string, string]> = [];

  if (format === 'json' || format === 'both') {
    files.push([
      `${stem}_visibility_analysis.json`,
      JSON.stringify(buildExportDocument(profile, bundle, now), null, 2),
    ]);
    files.push([`${stem}_report.json`, JSON.stringify(buildAnalysisReport(profile, bundle, now), null, 2)]);
  }
  if (format === 'csv' || format === 'both') {
    files.push([`${stem}_summary.csv`, buildSummaryCsv(bundle)]);
    files.push([`${stem}_responses.csv`, buildResponsesCsv(bundle)]);
  }

  const written: string[] = [];
  for (const [name, content] of files) {
    const filePath = path.join(directory, name);
    await fs.writeFile(filePath, content, 'utf8');
    written.push(filePath);
  }
  return written;
}
