/**
 * lumora analyze - Measure a brand's visibility across AI platforms
 *
 * Usage:
 *   lumora analyze --brand Acme --industry SaaS --competitors Rival,Other --dry-run
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  PROFILE_LIMITS,
  createLogger,
  errorMessage,
  formatError,
  formatErrorDetails,
  getUserFriendlyMessage,
  loadRuntimeConfig,
  parseBrandProfile,
} from '@lumora/core';
import { AnalysisPipeline } from '@lumora/orchestrator';
import { CREDENTIAL_ENV_KEYS } from '@lumora/platform-gateway';
import { STAGE_LABELS, formatSummary } from '../format.js';
import {
  DRY_RUN_PLATFORMS,
  buildProfileInput,
  parseInteger,
  parseList,
  parseOutputFormat,
  type AnalyzeOptions,
} from '../options.js';
import { writeResults } from '../output.js';
import { createRuntime, type Runtime } from '../runtime.js';

export const analyzeCommand = new Command('analyze')
  .description('Analyze how visible a brand is in AI platform answers')
  .requiredOption('-b, --brand <name>', 'Brand name to measure')
  .requiredOption('-i, --industry <name>', 'Industry (FinTech, E-commerce, SaaS, Healthcare, EdTech or custom)')
  .requiredOption('-c, --competitors <names>', 'Competitor names, comma-separated', parseList)
  .option('--custom-industry', 'Treat the industry as custom instead of a catalog entry', false)
  .option('-l, --location <name>', 'Location to add to the prompts')
  .option(
    '-p, --prompts <count>',
    `Number of prompts (${PROFILE_LIMITS.MIN_PROMPTS}-${PROFILE_LIMITS.MAX_PROMPTS})`,
    parseInteger,
    PROFILE_LIMITS.DEFAULT_PROMPTS
  )
  .option('--platforms <ids>', 'Platform IDs, comma-separated (default: every configured platform)', parseList)
  .option('-o, --output <dir>', 'Directory to write results to', 'results')
  .option('-f, --format <format>', 'Output format: json, csv, both', parseOutputFormat, 'json')
  .option('--dry-run', 'Answer every prompt from mock adapters instead of the real platforms', false)
  .option('--include-competitor-prompts', 'Add brand vs competitor comparison prompts', false)
  .option('-v, --verbose', 'Show debug logging', false)
  .action(async (options: AnalyzeOptions) => {
    const spinner = ora();
    let runtime: Runtime | undefined;

    try {
      const config = loadRuntimeConfig();
      const logger = createLogger({ minLevel: options.verbose ? 'debug' : config.logLevel });

      const active = createRuntime({
        config,
        logger,
        dryRun: options.dryRun,
        platforms: options.platforms ?? DRY_RUN_PLATFORMS,
        entities: [options.brand, ...options.competitors],
      });
      runtime = active;

      const platforms = options.platforms ?? active.registry.ids();
      if (platforms.length === 0) {
        const keys = Object.values(CREDENTIAL_ENV_KEYS).map((names) => names[0]);
        console.error(chalk.red('No AI platforms are configured.'));
        console.error(chalk.gray(`Set one of ${keys.join(', ')} or use --dry-run`));
        process.exitCode = 1;
        return;
      }

      const missing = platforms.filter((platform) => !active.registry.has(platform));
      if (missing.length > 0) {
        spinner.warn(`No adapter configured for: ${missing.join(', ')}`);
      }

      const profile = parseBrandProfile(buildProfileInput(options, platforms));

      console.log(chalk.bold('\nLumora Analysis'));
      console.log(chalk.gray('─'.repeat(60)));
      console.log(`Brand:       ${chalk.cyan(profile.brandName)}`);
      console.log(`Industry:    ${profile.industry}${profile.isCustomIndustry ? chalk.gray(' (custom)') : ''}`);
      console.log(`Competitors: ${chalk.yellow(profile.competitors.join(', '))}`);
      console.log(`Platforms:   ${chalk.green(profile.platforms.join(', '))}${options.dryRun ? chalk.gray(' (dry run)') : ''}`);
      console.log(`Prompts:     ${profile.promptCount}`);
      console.log(chalk.gray('─'.repeat(60)));

      const pipeline = new AnalysisPipeline(active.gateway, {
        logger,
        executor: { maxWorkers: config.maxWorkers },
      });
      pipeline.on((event) => {
        if (event.type === 'stage_started') {
          spinner.text = `${STAGE_LABELS[event.stage]}...`;
        } else if (event.type === 'query_progress') {
          const { completed, total } = event.details;
          if (typeof completed === 'number' && typeof total === 'number') {
            spinner.text = `${STAGE_LABELS.querying} (${completed}/${total})...`;
          }
        }
      });

      spinner.start(STAGE_LABELS.created);
      const bundle = await pipeline.run(profile, {
        includeCompetitorPrompts: options.includeCompetitorPrompts,
      });
      spinner.succeed(`Analysis complete (${bundle.queryStats.total} queries)`);

      for (const line of formatSummary(profile.brandName, bundle)) {
        console.log(line);
      }

      const files = await writeResults(options.output, profile, bundle, options.format);
      console.log();
      for (const file of files) {
        console.log(chalk.green(`Saved ${file}`));
      }
    } catch (error) {
      spinner.fail('Analysis failed');
      console.error(chalk.red(formatError(error)));
      const hint = getUserFriendlyMessage(error);
      if (hint !== errorMessage(error)) {
        console.error(chalk.gray(hint));
      }
      if (options.verbose) {
        console.error(chalk.gray(JSON.stringify(formatErrorDetails(error), null, 2)));
      }
      process.exitCode = 1;
    } finally {
      await runtime?.registry.closeAll();
    }
  });
