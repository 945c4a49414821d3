#!/usr/bin/env node

/**
 * git-onboard CLI
 * Main entry point
 */

import { Command } from 'commander';
import { logger } from '@git-onboard/core';
import { setupCommand } from './commands/setup.js';
import { configCommand } from './commands/config.js';

const program = new Command();

/**
 * CLI Version and description
 */
program
  .name('git-onboard')
  .description('Install Git and set it up for first use: identity, SSH key and connectivity')
  .version('1.0.0');

/**
 * Setup command - The onboarding wizard (default)
 */
program
  .command('setup', { isDefault: true })
  .description('Install and configure Git interactively')
  .option('-c, --config <path>', 'Use a specific preferences file')
  .option('-v, --verbose', 'Show debug logging on the console')
  .action(setupCommand);

/**
 * Config command - Manage the preferences file
 */
program
  .command('config')
  .description('Show or initialize the preferences file')
  .option('-c, --config <path>', 'Use a specific preferences file')
  .option('--show', 'Print the effective preferences as YAML (default)')
  .option('--init', 'Write the default preferences to the file')
  .option('--force', 'Overwrite an existing file with --init')
  .addHelpText(
    'after',
    `
Examples:
  $ git-onboard config
  $ git-onboard config --init
  $ git-onboard config --init --force -c ./onboard.yaml
  `
  )
  .action(configCommand);

/**
 * Parse and execute commands
 */
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error('CLI error', error);
    process.exit(1);
  }
}

void main();

export { program };
