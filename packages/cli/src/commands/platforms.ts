/**
 * lumora platforms - Show which AI platforms are configured and reachable
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createLogger, formatError, loadRuntimeConfig } from '@lumora/core';
import { API_PLATFORM_IDS, CREDENTIAL_ENV_KEYS } from '@lumora/platform-gateway';
import { createRuntime, type Runtime } from '../runtime.js';

interface PlatformsOptions {
  check: boolean;
}

export const platformsCommand = new Command('platforms')
  .description('List configured AI platforms and test connectivity')
  .option('--no-check', 'Skip the connectivity test')
  .action(async (options: PlatformsOptions) => {
    const spinner = ora();
    let runtime: Runtime | undefined;

    try {
      const config = loadRuntimeConfig();
      const active = createRuntime({ config, logger: createLogger({ minLevel: 'error' }) });
      runtime = active;

      const configured = active.registry.ids();
      let connectivity: Record<string, boolean> = {};
      if (configured.length > 0 && options.check) {
        spinner.start('Testing connectivity...');
        connectivity = await active.gateway.checkConnectivity(configured);
        spinner.stop();
      }

      console.log(chalk.bold('\nAI Platforms'));
      console.log(chalk.gray('─'.repeat(60)));
      for (const platform of API_PLATFORM_IDS) {
        const name = platform.padEnd(12);
        if (!active.registry.has(platform)) {
          console.log(`${name}${chalk.gray(`not configured (${CREDENTIAL_ENV_KEYS[platform].join(' or ')})`)}`);
        } else if (!options.check) {
          console.log(`${name}${chalk.cyan('configured')}`);
        } else if (connectivity[platform]) {
          console.log(`${name}${chalk.green('✓ reachable')}`);
        } else {
          console.log(`${name}${chalk.red('✗ unreachable')}`);
        }
      }
    } catch (error) {
      spinner.fail('Connectivity check failed');
      console.error(chalk.red(formatError(error)));
      process.exitCode = 1;
    } finally {
      await runtime?.registry.closeAll();
    }
  });
