/**
 * lumora prompts - Preview the prompts generated for an industry
 *
 * Usage:
 *   lumora prompts --industry FinTech --count 10 --location India
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { PROFILE_LIMITS, formatError, listIndustries } from '@lumora/core';
import { generatePrompts } from '@lumora/prompt-generator';
import { parseInteger } from '../options.js';

interface PromptsOptions {
  industry: string;
  count: number;
  location?: string;
  customIndustry: boolean;
  json: boolean;
}

export const promptsCommand = new Command('prompts')
  .description('Generate and print prompts for an industry')
  .requiredOption('-i, --industry <name>', 'Industry name')
  .option('-n, --count <count>', 'Number of prompts', parseInteger, PROFILE_LIMITS.DEFAULT_PROMPTS)
  .option('-l, --location <name>', 'Location to add to the prompts')
  .option('--custom-industry', 'Treat the industry as custom instead of a catalog entry', false)
  .option('--json', 'Print the prompts as JSON', false)
  .action((options: PromptsOptions) => {
    try {
      const prompts = generatePrompts({
        industry: options.industry,
        count: options.count,
        location: options.location ?? null,
        isCustom: options.customIndustry,
      });

      if (options.json) {
        console.log(JSON.stringify(prompts, null, 2));
        return;
      }

      console.log(chalk.bold(`\n${prompts.length} prompts for ${options.industry}`));
      console.log(chalk.gray('─'.repeat(60)));
      prompts.forEach((prompt, index) => {
        console.log(`${String(index + 1).padStart(3)}. ${prompt.text} ${chalk.gray(`[${prompt.category}]`)}`);
      });
    } catch (error) {
      console.error(chalk.red(formatError(error)));
      if (!options.customIndustry) {
        console.error(chalk.gray(`Catalog industries: ${listIndustries().join(', ')}`));
      }
      process.exitCode = 1;
    }
  });
