/**
 * Common types used across the core package
 */

/**
 * Supported operating systems
 */
export enum OperatingSystem {
  LINUX = 'linux',
  MACOS = 'macos',
  WINDOWS = 'windows',
  UNKNOWN = 'unknown',
}

/**
 * Linux distribution families, identified by their release marker files
 */
export enum LinuxDistribution {
  DEBIAN = 'debian',
  FEDORA = 'fedora',
  REDHAT = 'redhat',
  UNSUPPORTED = 'unsupported',
}

/**
 * Execution result for commands
 */
export interface ExecutionResult {
  stdout: string;
  stderr: string;
  code: number;
  success: boolean;
}

/**
 * Checks whether a path exists on the local filesystem
 */
export type FileProbe = (filePath: string) => Promise<boolean>;
