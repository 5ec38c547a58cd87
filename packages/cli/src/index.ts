#!/usr/bin/env node
/**
 * Lumora CLI
 *
 * Measure brand visibility in AI platform answers
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { analyzeCommand } from './commands/analyze.js';
import { promptsCommand } from './commands/prompts.js';
import { platformsCommand } from './commands/platforms.js';

// Load environment variables
config();

const program = new Command();

program
  .name('lumora')
  .description('Measure brand visibility in AI platform answers')
  .version('0.1.0');

// Register commands
program.addCommand(analyzeCommand);
program.addCommand(promptsCommand);
program.addCommand(platformsCommand);

await program.parseAsync();
