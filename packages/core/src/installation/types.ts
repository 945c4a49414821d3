/**
 * Installation Module Types
 */

import type { OperatingSystem, LinuxDistribution, FileProbe } from '../types/common.js';
import type { CommandExecutor } from '../exec/types.js';
import type { Prompter } from '../prompts/types.js';

/**
 * Installation step
 */
export enum InstallationStep {
  CHECK_EXISTING = 'check_existing',
  DETECT_DISTRIBUTION = 'detect_distribution',
  BOOTSTRAP_PACKAGE_MANAGER = 'bootstrap_package_manager',
  INSTALL_PACKAGE = 'install_package',
  VERIFY_INSTALLATION = 'verify_installation',
}

/**
 * Installation step status
 */
export enum StepStatus {
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

export interface InstallationProgress {
  step: InstallationStep;
  status: StepStatus;
  message: string;
  error?: Error;
  timestamp: Date;
}

export type ProgressCallback = (progress: InstallationProgress) => void;

/**
 * A single package-manager invocation
 */
export interface PackageCommand {
  command: string;
  args: string[];
  /** Prefix with sudo unless already running as root */
  privileged: boolean;
}

/**
 * How the installation attempt ended
 */
export type InstallationResult =
  | { status: 'already-installed'; version: string }
  | { status: 'installed'; version: string; method: string }
  | { status: 'declined'; version: string }
  | { status: 'manual'; reason: string; instructions: string[] };

export interface InstallationOptions {
  os: OperatingSystem;
  executor: CommandExecutor;
  prompter: Prompter;
  progressCallback?: ProgressCallback;
  /** Defaults to checking the real filesystem */
  fileExists?: FileProbe;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Defaults to process.platform */
  platform?: string;
  /** Running as root; package commands then skip sudo. Defaults to uid 0 detection. */
  elevated?: boolean;
  /** Pre-detected distribution, skips marker probing */
  distro?: LinuxDistribution;
}
