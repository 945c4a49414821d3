/**
 * Configuration Module Types
 */

import { LogLevel } from '../utils/logger.js';

/**
 * Key algorithms accepted by ssh-keygen that we offer
 */
export enum SSHKeyType {
  ED25519 = 'ed25519',
  ECDSA = 'ecdsa',
  RSA = 'rsa',
}

/**
 * Remote hosting service the connectivity check and URL rewrite target
 */
export interface HostingConfig {
  host: string;
  sshUser: string;
  /** Public repository used for the unauthenticated reachability check */
  testRepository: string;
  /** Where users register their public key */
  keysUrl: string;
}

export interface GitDefaultsConfig {
  /** Value written to init.defaultBranch when the user opts in */
  defaultBranch: string;
  /** Seconds the Linux credential cache keeps secrets */
  credentialCacheTimeout: number;
}

export interface SSHKeyConfig {
  type: SSHKeyType;
  /** Only passed to ssh-keygen for rsa and ecdsa */
  bits: number;
}

export interface LoggingConfig {
  level: LogLevel;
  logToFile: boolean;
}

/**
 * Onboarding preferences, loaded from ~/.git-onboard/config.yaml
 */
export interface OnboardConfig {
  hosting: HostingConfig;
  git: GitDefaultsConfig;
  sshKey: SSHKeyConfig;
  logging: LoggingConfig;
}

export const DEFAULT_CONFIG: OnboardConfig = {
  hosting: {
    host: 'github.com',
    sshUser: 'git',
    testRepository: 'https://github.com/octocat/Hello-World.git',
    keysUrl: 'https://github.com/settings/keys',
  },
  git: {
    defaultBranch: 'main',
    credentialCacheTimeout: 3600,
  },
  sshKey: {
    type: SSHKeyType.ED25519,
    bits: 4096,
  },
  logging: {
    level: LogLevel.WARN,
    logToFile: true,
  },
};

/**
 * HTTPS prefix of the hosting service, e.g. https://github.com/
 */
export const httpsPrefix = (hosting: HostingConfig): string => `https://${hosting.host}/`;

/**
 * SSH prefix of the hosting service, e.g. git@github.com:
 */
export const sshPrefix = (hosting: HostingConfig): string => `${hosting.sshUser}@${hosting.host}:`;
