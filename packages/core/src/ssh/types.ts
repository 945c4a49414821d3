/**
 * SSH Module Types
 */

import type { CommandExecutor } from '../exec/types.js';
import type { Prompter } from '../prompts/types.js';
import type { GitConfigStore } from '../config/git-config.js';
import type { OnboardConfig } from '../config/types.js';

export interface SSHKeyManagerOptions {
  executor: CommandExecutor;
  prompter: Prompter;
  store: GitConfigStore;
  config: OnboardConfig;
  /** Defaults to os.homedir() */
  homeDir?: string;
  /** Defaults to process.env; consulted for an already running agent */
  env?: NodeJS.ProcessEnv;
}

/**
 * Connection details of a running ssh-agent
 */
export interface SSHAgentEnvironment {
  SSH_AUTH_SOCK: string;
  SSH_AGENT_PID?: string;
}

export interface SSHKeySetupResult {
  keyPath: string;
  publicKeyPath: string;
  publicKey: string;
  /** False when an existing key was kept */
  generated: boolean;
  /** True when ssh-add accepted the key */
  agentRegistered: boolean;
}
