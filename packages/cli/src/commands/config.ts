/**
 * Config Command
 * Show or initialize the onboarding preferences file
 */

import chalk from 'chalk';
import yaml from 'js-yaml';
import { logger, ConfigManager, DEFAULT_CONFIG, fileExists, isSetupError, errorMessage } from '@git-onboard/core';
import { printSetupError } from '../utils/report.js';

interface ConfigOptions {
  config?: string;
  show?: boolean;
  init?: boolean;
  force?: boolean;
}

/**
 * Handle the config command and return the process exit code
 */
export async function runConfig(options: ConfigOptions): Promise<number> {
  const configManager = new ConfigManager(options.config);
  const configPath = configManager.getConfigPath();

  try {
    if (options.init) {
      if ((await fileExists(configPath)) && !options.force) {
        console.log(chalk.yellow(`\n⚠️  ${configPath} already exists. Use --force to overwrite it.\n`));
        return 1;
      }

      await configManager.save(DEFAULT_CONFIG);
      console.log(chalk.green(`\n✅ Default preferences written to ${configPath}\n`));
      return 0;
    }

    // --show is the default
    const config = await configManager.load();
    console.log(chalk.gray(`# ${configPath}`));
    console.log(yaml.dump(config));
    return 0;
  } catch (error) {
    if (isSetupError(error)) {
      printSetupError(error);
      return 1;
    }

    logger.error('Config command failed', error);
    console.log(chalk.red(`\n✖ ${errorMessage(error)}\n`));
    return 1;
  }
}

/**
 * Config command handler
 */
export async function configCommand(options: ConfigOptions): Promise<void> {
  const code = await runConfig(options);
  if (code !== 0) {
    process.exit(code);
  }
}
