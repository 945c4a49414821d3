/**
 * Installation Manager
 * Makes sure Git is installed, using the native package manager of the host
 */

import { logger } from '../utils/logger.js';
import { SetupError, SetupErrorCode } from '../utils/errors.js';
import { OSDetector, fileExists } from '../os/detector.js';
import { probeCommand } from '../exec/executor.js';
import { OperatingSystem, LinuxDistribution } from '../types/common.js';
import type { CommandExecutor } from '../exec/types.js';
import type { Prompter } from '../prompts/types.js';
import type { FileProbe } from '../types/common.js';
import type {
  InstallationOptions,
  InstallationResult,
  InstallationProgress,
  PackageCommand,
  ProgressCallback,
} from './types.js';
import { InstallationStep, StepStatus } from './types.js';

const INSTALLER_STEP = 'Installer';

const STEP_LABELS: Record<InstallationStep, string> = {
  [InstallationStep.CHECK_EXISTING]: 'Checking for an existing Git installation',
  [InstallationStep.DETECT_DISTRIBUTION]: 'Detecting the Linux distribution',
  [InstallationStep.BOOTSTRAP_PACKAGE_MANAGER]: 'Installing Homebrew',
  [InstallationStep.INSTALL_PACKAGE]: 'Installing Git',
  [InstallationStep.VERIFY_INSTALLATION]: 'Verifying the Git installation',
};

export const HOMEBREW_INSTALL_SCRIPT = 'https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh';

/** Where the Homebrew installer puts brew when it is not yet on PATH */
export const HOMEBREW_LOCATIONS = ['/opt/homebrew/bin/brew', '/usr/local/bin/brew'];

export const MANUAL_DOWNLOADS: Record<OperatingSystem, string> = {
  [OperatingSystem.LINUX]: 'https://git-scm.com/download/linux',
  [OperatingSystem.MACOS]: 'https://git-scm.com/download/mac',
  [OperatingSystem.WINDOWS]: 'https://git-scm.com/download/win',
  [OperatingSystem.UNKNOWN]: 'https://git-scm.com/downloads',
};

/**
 * Update-and-install sequence per distribution family
 */
export const LINUX_INSTALL_COMMANDS: Record<Exclude<LinuxDistribution, LinuxDistribution.UNSUPPORTED>, PackageCommand[]> = {
  [LinuxDistribution.DEBIAN]: [
    { command: 'apt-get', args: ['update'], privileged: true },
    { command: 'apt-get', args: ['install', '-y', 'git'], privileged: true },
  ],
  [LinuxDistribution.FEDORA]: [
    { command: 'dnf', args: ['-y', 'makecache'], privileged: true },
    { command: 'dnf', args: ['-y', 'install', 'git'], privileged: true },
  ],
  [LinuxDistribution.REDHAT]: [
    { command: 'yum', args: ['-y', 'makecache'], privileged: true },
    { command: 'yum', args: ['-y', 'install', 'git'], privileged: true },
  ],
};

/**
 * Installation Manager class
 */
export class InstallationManager {
  private readonly os: OperatingSystem;
  private readonly executor: CommandExecutor;
  private readonly prompter: Prompter;
  private readonly fileExists: FileProbe;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: string;
  private readonly elevated: boolean;
  private readonly progressCallback?: ProgressCallback;
  private distro?: LinuxDistribution;
  private steps: InstallationProgress[] = [];

  constructor(options: InstallationOptions) {
    this.os = options.os;
    this.executor = options.executor;
    this.prompter = options.prompter;
    this.progressCallback = options.progressCallback;
    this.fileExists = options.fileExists ?? fileExists;
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.elevated = options.elevated ?? process.getuid?.() === 0;
    this.distro = options.distro;
  }

  /**
   * Ensure Git is present. Throws a SetupError on any fatal failure.
   */
  public async install(): Promise<InstallationResult> {
    logger.info('Starting Git installation check', { os: this.os });

    const existing = await this.executeStep(InstallationStep.CHECK_EXISTING, () => this.getGitVersion());

    if (existing) {
      const proceed = await this.prompter.confirm(
        `Git is already installed (${existing}). Continue with configuration?`,
        true
      );
      return proceed
        ? { status: 'already-installed', version: existing }
        : { status: 'declined', version: existing };
    }

    let method: string;
    switch (this.os) {
      case OperatingSystem.LINUX: {
        const outcome = await this.installOnLinux();
        if (typeof outcome !== 'string') return outcome;
        method = outcome;
        break;
      }
      case OperatingSystem.MACOS: {
        const outcome = await this.installOnMacOS();
        if (typeof outcome !== 'string') return outcome;
        method = outcome;
        break;
      }
      case OperatingSystem.WINDOWS: {
        const outcome = await this.installOnWindows();
        if (typeof outcome !== 'string') return outcome;
        method = outcome;
        break;
      }
      case OperatingSystem.UNKNOWN:
        throw new SetupError(
          SetupErrorCode.UNSUPPORTED_OS,
          INSTALLER_STEP,
          `Unsupported operating system. Install Git manually from ${MANUAL_DOWNLOADS[OperatingSystem.UNKNOWN]}`
        );
      default: {
        const unreachable: never = this.os;
        throw new Error(`Unhandled operating system: ${String(unreachable)}`);
      }
    }

    const version = await this.executeStep(InstallationStep.VERIFY_INSTALLATION, () => this.verifyInstallation());

    logger.info('Git installed', { version, method });
    return { status: 'installed', version, method };
  }

  /**
   * Progress reported so far
   */
  public getSteps(): InstallationProgress[] {
    return [...this.steps];
  }

  private async installOnLinux(): Promise<string | InstallationResult> {
    const distro = await this.executeStep(InstallationStep.DETECT_DISTRIBUTION, async () => {
      this.distro = this.distro ?? (await OSDetector.detectLinuxDistro(this.fileExists));
      return this.distro;
    });

    if (distro === LinuxDistribution.UNSUPPORTED) {
      this.skipStep(InstallationStep.INSTALL_PACKAGE, 'Unsupported Linux distribution');
      return this.manual('Unsupported Linux distribution', [
        'Install Git with your distribution\'s package manager, for example:',
        '  Arch:     sudo pacman -S git',
        '  openSUSE: sudo zypper install git',
        '  Alpine:   sudo apk add git',
        `More options: ${MANUAL_DOWNLOADS[OperatingSystem.LINUX]}`,
      ]);
    }

    await this.executeStep(InstallationStep.INSTALL_PACKAGE, async () => {
      for (const packageCommand of LINUX_INSTALL_COMMANDS[distro]) {
        await this.runPackageCommand(packageCommand);
      }
    });

    return LINUX_INSTALL_COMMANDS[distro][0].command;
  }

  private async installOnMacOS(): Promise<string | InstallationResult> {
    let brew = await this.locateHomebrew();

    if (!brew) {
      const bootstrap = await this.prompter.confirm('Homebrew is not installed. Install Homebrew now?', true);

      if (!bootstrap) {
        this.skipStep(InstallationStep.BOOTSTRAP_PACKAGE_MANAGER, 'Homebrew installation declined');
        return this.manual('Homebrew not available', [
          `Download Git from ${MANUAL_DOWNLOADS[OperatingSystem.MACOS]}`,
          'or install the Xcode Command Line Tools with: xcode-select --install',
        ]);
      }

      brew = await this.executeStep(InstallationStep.BOOTSTRAP_PACKAGE_MANAGER, async () => {
        const result = await this.executor.exec(
          '/bin/bash',
          ['-c', `/bin/bash -c "$(curl -fsSL ${HOMEBREW_INSTALL_SCRIPT})"`],
          { interactive: true }
        );
        if (!result.success) {
          throw new SetupError(
            SetupErrorCode.BOOTSTRAP_FAILED,
            INSTALLER_STEP,
            `Homebrew installation failed (exit code ${result.code})`
          );
        }
        const located = await this.locateHomebrew();
        if (!located) {
          throw new SetupError(
            SetupErrorCode.BOOTSTRAP_FAILED,
            INSTALLER_STEP,
            'Homebrew was installed but brew could not be found'
          );
        }
        return located;
      });
    } else {
      this.skipStep(InstallationStep.BOOTSTRAP_PACKAGE_MANAGER, `Homebrew found at ${brew}`);
    }

    const brewPath = brew;
    await this.executeStep(InstallationStep.INSTALL_PACKAGE, () =>
      this.runPackageCommand({ command: brewPath, args: ['install', 'git'], privileged: false })
    );

    return 'brew';
  }

  private async installOnWindows(): Promise<string | InstallationResult> {
    if (OSDetector.isPosixLayer(this.env, this.platform)) {
      // Git for Windows ships Git Bash; MSYS2/Cygwin users install it through their own layer
      this.skipStep(InstallationStep.INSTALL_PACKAGE, 'Running inside a POSIX layer, Git ships with it');
      return 'posix-layer';
    }

    if (await probeCommand(this.executor, 'winget')) {
      await this.executeStep(InstallationStep.INSTALL_PACKAGE, () =>
        this.runPackageCommand({
          command: 'winget',
          args: ['install', '--id', 'Git.Git', '-e', '--source', 'winget'],
          privileged: false,
        })
      );
      return 'winget';
    }

    if (await probeCommand(this.executor, 'choco')) {
      await this.executeStep(InstallationStep.INSTALL_PACKAGE, () =>
        this.runPackageCommand({ command: 'choco', args: ['install', 'git', '-y'], privileged: false })
      );
      return 'choco';
    }

    this.skipStep(InstallationStep.INSTALL_PACKAGE, 'No supported package manager found');
    return this.manual('No supported package manager found', [
      `Download Git for Windows from ${MANUAL_DOWNLOADS[OperatingSystem.WINDOWS]}`,
      'then re-run this tool from Git Bash.',
    ]);
  }

  private async locateHomebrew(): Promise<string | undefined> {
    if (await probeCommand(this.executor, 'brew')) {
      return 'brew';
    }
    for (const location of HOMEBREW_LOCATIONS) {
      if (await this.fileExists(location)) {
        return location;
      }
    }
    return undefined;
  }

  private async runPackageCommand(packageCommand: PackageCommand): Promise<void> {
    const useSudo = packageCommand.privileged && !this.elevated;
    const command = useSudo ? 'sudo' : packageCommand.command;
    const args = useSudo ? [packageCommand.command, ...packageCommand.args] : packageCommand.args;
    const commandLine = [command, ...args].join(' ');

    logger.info('Running package manager', { command: commandLine });

    const result = await this.executor.exec(command, args, { interactive: true });
    if (!result.success) {
      throw new SetupError(
        SetupErrorCode.INSTALL_FAILED,
        INSTALLER_STEP,
        `"${commandLine}" failed with exit code ${result.code}`,
        { command: commandLine }
      );
    }
  }

  private async getGitVersion(): Promise<string | undefined> {
    return probeCommand(this.executor, 'git');
  }

  private async verifyInstallation(): Promise<string> {
    const version = await this.getGitVersion();
    if (!version) {
      throw new SetupError(
        SetupErrorCode.INSTALL_NOT_VERIFIED,
        INSTALLER_STEP,
        'Git is still not available on the command search path after installation'
      );
    }
    return version;
  }

  private manual(reason: string, instructions: string[]): InstallationResult {
    logger.info('Automatic installation not possible', { reason });
    return { status: 'manual', reason, instructions };
  }

  /**
   * Execute a single installation step
   */
  private async executeStep<T>(step: InstallationStep, action: () => Promise<T>): Promise<T> {
    this.updateProgress(step, StepStatus.IN_PROGRESS, `${STEP_LABELS[step]}...`);

    try {
      const result = await action();
      this.updateProgress(step, StepStatus.COMPLETED, `${STEP_LABELS[step]}: done`);
      return result;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.updateProgress(step, StepStatus.FAILED, `${STEP_LABELS[step]} failed: ${failure.message}`, failure);
      throw error;
    }
  }

  private skipStep(step: InstallationStep, reason: string): void {
    this.updateProgress(step, StepStatus.SKIPPED, reason);
  }

  private updateProgress(step: InstallationStep, status: StepStatus, message: string, error?: Error): void {
    const progressUpdate: InstallationProgress = {
      step,
      status,
      message,
      error,
      timestamp: new Date(),
    };

    this.steps.push(progressUpdate);

    if (this.progressCallback) {
      this.progressCallback(progressUpdate);
    }

    logger.debug('Installation progress', { step, status });
  }
}
