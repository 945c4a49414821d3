/**
 * Command execution types
 */

import type { ExecutionResult } from '../types/common.js';

export interface ExecOptions {
  /**
   * Attach the child to the terminal (stdin/stdout/stderr inherited).
   * Used for anything that may ask the user something: sudo, ssh-keygen, ssh.
   * Output is not captured in this mode.
   */
  interactive?: boolean;
  /** Extra environment variables merged over the current process environment */
  env?: Record<string, string>;
}

/**
 * Runs external programs on the local machine
 */
export interface CommandExecutor {
  exec(command: string, args?: string[], options?: ExecOptions): Promise<ExecutionResult>;
}
