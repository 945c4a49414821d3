/**
 * OS Detection Module
 * Classifies the host operating system and Linux distribution family
 */

import fs from 'node:fs/promises';
import { OperatingSystem, LinuxDistribution } from '../types/common.js';
import type { FileProbe } from '../types/common.js';

/**
 * Release marker files, in probing order
 */
export const DISTRIBUTION_MARKERS: ReadonlyArray<{ file: string; distro: LinuxDistribution }> = [
  { file: '/etc/debian_version', distro: LinuxDistribution.DEBIAN },
  { file: '/etc/fedora-release', distro: LinuxDistribution.FEDORA },
  { file: '/etc/redhat-release', distro: LinuxDistribution.REDHAT },
];

/**
 * Check whether a file exists
 */
export const fileExists: FileProbe = async (filePath) => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Detects operating system and distribution information
 */
export class OSDetector {
  /**
   * Classify an OSTYPE-style indicator string
   */
  public static classify(indicator: string): OperatingSystem {
    const value = indicator.trim().toLowerCase();

    if (value.startsWith('linux-gnu')) {
      return OperatingSystem.LINUX;
    }
    if (value.startsWith('darwin')) {
      return OperatingSystem.MACOS;
    }
    if (value.startsWith('cygwin') || value.startsWith('msys') || value.startsWith('win32')) {
      return OperatingSystem.WINDOWS;
    }

    return OperatingSystem.UNKNOWN;
  }

  /**
   * Work out the indicator for the current process.
   *
   * Shells keep OSTYPE unexported most of the time, so fall back to MSYSTEM
   * (exported by Git Bash) and then to Node's platform name.
   */
  public static resolveIndicator(
    env: NodeJS.ProcessEnv = process.env,
    platform: string = process.platform
  ): string {
    if (env.OSTYPE) {
      return env.OSTYPE;
    }
    if (env.MSYSTEM) {
      return 'msys';
    }
    return this.platformToIndicator(platform);
  }

  /**
   * Detect the operating system of the current process
   */
  public static detect(env: NodeJS.ProcessEnv = process.env, platform: string = process.platform): OperatingSystem {
    return this.classify(this.resolveIndicator(env, platform));
  }

  /**
   * Probe the release marker files and return the first matching family
   */
  public static async detectLinuxDistro(exists: FileProbe = fileExists): Promise<LinuxDistribution> {
    for (const marker of DISTRIBUTION_MARKERS) {
      if (await exists(marker.file)) {
        return marker.distro;
      }
    }
    return LinuxDistribution.UNSUPPORTED;
  }

  /**
   * True when running inside Git Bash, MSYS2 or Cygwin on Windows
   */
  public static isPosixLayer(env: NodeJS.ProcessEnv = process.env, platform: string = process.platform): boolean {
    if (env.MSYSTEM) {
      return true;
    }
    const indicator = this.resolveIndicator(env, platform).toLowerCase();
    return indicator.startsWith('msys') || indicator.startsWith('cygwin');
  }

  /**
   * Get a human-readable OS name
   */
  public static getOSName(operatingSystem: OperatingSystem, distro?: LinuxDistribution): string {
    switch (operatingSystem) {
      case OperatingSystem.LINUX:
        if (distro && distro !== LinuxDistribution.UNSUPPORTED) {
          return `${distro.charAt(0).toUpperCase()}${distro.slice(1)} Linux`;
        }
        return 'Linux';
      case OperatingSystem.MACOS:
        return 'macOS';
      case OperatingSystem.WINDOWS:
        return 'Windows';
      default:
        return 'Unknown OS';
    }
  }

  private static platformToIndicator(platform: string): string {
    switch (platform) {
      case 'linux':
        return 'linux-gnu';
      case 'darwin':
        return 'darwin';
      case 'win32':
        return 'win32';
      case 'cygwin':
        return 'cygwin';
      default:
        return platform;
    }
  }
}
