/**
 * Setup Command
 * Runs the onboarding wizard: detect, install, configure, SSH key, connectivity
 */

import os from 'node:os';
import ora from 'ora';
import chalk from 'chalk';
import {
  logger,
  initLogger,
  LogLevel,
  ConfigManager,
  OSDetector,
  OperatingSystem,
  InstallationManager,
  StepStatus,
  GitConfigurator,
  GitGlobalConfig,
  SSHKeyManager,
  ConnectivityChecker,
  LocalExecutor,
  fileExists,
  isSetupError,
  errorMessage,
  type CommandExecutor,
  type Prompter,
  type GitConfigStore,
  type OnboardConfig,
  type FileProbe,
  type InstallationProgress,
  type ConfigurationSummary,
  type SSHKeySetupResult,
} from '@git-onboard/core';
import { InquirerPrompter } from '../utils/prompter.js';
import { printSetupError } from '../utils/report.js';

interface SetupOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Everything the wizard talks to. Tests swap in fakes.
 */
export interface SetupContext {
  executor: CommandExecutor;
  prompter: Prompter;
  store: GitConfigStore;
  config: OnboardConfig;
  env: NodeJS.ProcessEnv;
  platform: string;
  homeDir: string;
  fileExists: FileProbe;
  /** Running as root */
  elevated?: boolean;
}

const STATUS_EMOJI: Record<StepStatus, string> = {
  [StepStatus.IN_PROGRESS]: '🔄',
  [StepStatus.COMPLETED]: '✅',
  [StepStatus.FAILED]: '❌',
  [StepStatus.SKIPPED]: '⏭️',
};

function printProgress(progress: InstallationProgress): void {
  const color =
    progress.status === StepStatus.COMPLETED
      ? chalk.green
      : progress.status === StepStatus.FAILED
        ? chalk.red
        : progress.status === StepStatus.SKIPPED
          ? chalk.gray
          : chalk.cyan;

  console.log(color(`${STATUS_EMOJI[progress.status]} ${progress.message}`));
}

function printSummary(summary: ConfigurationSummary): void {
  console.log(chalk.bold('\n📋 Global Git configuration:\n'));
  for (const entry of summary.entries) {
    console.log(chalk.white(`  ${entry.key}=${entry.value}`));
  }
  if (summary.credentialHelper) {
    console.log(chalk.gray(`\n  Credential helper: ${summary.credentialHelper}`));
  }
  console.log();
}

function printPublicKey(key: SSHKeySetupResult, keysUrl: string): void {
  if (key.generated) {
    console.log(chalk.green(`\n✅ SSH key generated at ${key.keyPath}`));
    if (!key.agentRegistered) {
      console.log(chalk.yellow(`⚠️  The key was not added to ssh-agent. Run: ssh-add ${key.keyPath}`));
    }
  } else {
    console.log(chalk.gray(`\nUsing the existing SSH key at ${key.keyPath}`));
  }

  console.log(chalk.bold('\n🔑 Public key:\n'));
  console.log(key.publicKey.trim());
  console.log(chalk.cyan(`\nAdd it to your account at ${keysUrl}\n`));
}

async function checkConnectivity(checker: ConnectivityChecker): Promise<void> {
  console.log(chalk.cyan('\n🌐 Testing SSH authentication...\n'));
  const ssh = await checker.checkSSH();
  logger.debug('SSH check finished', { target: ssh.target, code: ssh.code });

  const spinner = ora('Checking HTTPS access...').start();
  const https = await checker.checkHTTPS();
  if (https.reachable) {
    spinner.succeed(chalk.green(`Reached ${https.repository}`));
  } else {
    spinner.fail(chalk.red(`Could not reach ${https.repository}, possible network issue`));
    if (https.error) {
      console.log(chalk.gray(`  ${https.error}`));
    }
  }
}

/**
 * Run the wizard and return the process exit code
 */
export async function runSetup(ctx: SetupContext): Promise<number> {
  console.log(chalk.bold.cyan('\n🔧 Git Onboarding Wizard\n'));

  try {
    // Step 1: Detect the operating system
    const operatingSystem = OSDetector.detect(ctx.env, ctx.platform);
    if (operatingSystem === OperatingSystem.UNKNOWN) {
      const indicator = OSDetector.resolveIndicator(ctx.env, ctx.platform);
      logger.error('Unsupported operating system', { indicator });
      console.log(chalk.red(`\n❌ Unsupported operating system (${indicator}).`));
      console.log(chalk.white('   Install Git manually from https://git-scm.com/downloads\n'));
      return 1;
    }
    console.log(chalk.gray(`  OS: ${OSDetector.getOSName(operatingSystem)}\n`));

    // Step 2: Make sure Git is installed
    const installer = new InstallationManager({
      os: operatingSystem,
      executor: ctx.executor,
      prompter: ctx.prompter,
      progressCallback: printProgress,
      fileExists: ctx.fileExists,
      env: ctx.env,
      platform: ctx.platform,
      elevated: ctx.elevated,
    });
    const installation = await installer.install();

    switch (installation.status) {
      case 'declined':
        console.log(chalk.yellow('\nLeaving the existing Git configuration untouched.\n'));
        return 0;
      case 'manual':
        console.log(chalk.red(`\n❌ ${installation.reason}. Install Git manually:\n`));
        for (const line of installation.instructions) {
          console.log(chalk.white(`  ${line}`));
        }
        console.log();
        return 1;
      case 'already-installed':
        console.log(chalk.green(`\n✅ Using ${installation.version}\n`));
        break;
      case 'installed':
        console.log(chalk.green(`\n✅ Installed ${installation.version} with ${installation.method}\n`));
        break;
    }

    // Step 3: Identity and preferences
    console.log(chalk.cyan('📝 Configuring Git\n'));
    const configurator = new GitConfigurator({
      store: ctx.store,
      prompter: ctx.prompter,
      os: operatingSystem,
      config: ctx.config,
    });
    printSummary(await configurator.configure());

    // Step 4: SSH key (optional)
    const { hosting } = ctx.config;
    if (await ctx.prompter.confirm(`Set up an SSH key for ${hosting.host}?`, false)) {
      const keyManager = new SSHKeyManager({
        executor: ctx.executor,
        prompter: ctx.prompter,
        store: ctx.store,
        config: ctx.config,
        homeDir: ctx.homeDir,
        env: ctx.env,
      });
      printPublicKey(await keyManager.setup(), hosting.keysUrl);
    }

    // Step 5: Connectivity (optional)
    if (await ctx.prompter.confirm(`Test the connection to ${hosting.host}?`, false)) {
      await checkConnectivity(new ConnectivityChecker(ctx.executor, hosting));
    }

    console.log(chalk.green.bold('\n🎉 Git is ready to use!\n'));
    return 0;
  } catch (error) {
    if (isSetupError(error)) {
      logger.error(error.message, { code: error.code, step: error.step, ...error.context });
      printSetupError(error);
      return 1;
    }

    logger.error('Setup failed', error);
    console.log(chalk.red(`\n✖ ${errorMessage(error)}\n`));
    return 1;
  }
}

/**
 * Setup command handler
 */
export async function setupCommand(options: SetupOptions): Promise<void> {
  let config: OnboardConfig;
  try {
    config = await new ConfigManager(options.config).load();
  } catch (error) {
    if (isSetupError(error)) {
      printSetupError(error);
      process.exit(1);
    }
    throw error;
  }

  initLogger({
    level: options.verbose ? LogLevel.DEBUG : LogLevel.INFO,
    consoleLevel: options.verbose ? LogLevel.DEBUG : config.logging.level,
    logToFile: config.logging.logToFile,
  });

  const executor = new LocalExecutor();
  const code = await runSetup({
    executor,
    prompter: new InquirerPrompter(),
    store: new GitGlobalConfig(executor),
    config,
    env: process.env,
    platform: process.platform,
    homeDir: os.homedir(),
    fileExists,
  });

  process.exit(code);
}
