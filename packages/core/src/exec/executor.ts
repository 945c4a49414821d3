/**
 * Local command execution
 */

import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ExecutionResult } from '../types/common.js';
import type { CommandExecutor, ExecOptions } from './types.js';

const execFileAsync = promisify(execFile);

/** Exit code shells use for "command not found" */
export const COMMAND_NOT_FOUND = 127;

/**
 * Executes commands with node:child_process. Arguments are passed straight to
 * the program, never through a shell.
 */
export class LocalExecutor implements CommandExecutor {
  public async exec(command: string, args: string[] = [], options: ExecOptions = {}): Promise<ExecutionResult> {
    const env = options.env ? { ...process.env, ...options.env } : process.env;

    logger.debug('Executing command', { command, args, interactive: !!options.interactive });

    const result = options.interactive
      ? await this.execInteractive(command, args, env)
      : await this.execCaptured(command, args, env);

    logger.debug('Command completed', { command, code: result.code });
    return result;
  }

  private async execCaptured(command: string, args: string[], env: NodeJS.ProcessEnv): Promise<ExecutionResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, { env, windowsHide: true });
      return { stdout, stderr, code: 0, success: true };
    } catch (error) {
      // execFile rejects with the exit code and captured output attached
      const failure: { stdout?: unknown; stderr?: unknown; code?: unknown } =
        typeof error === 'object' && error !== null ? error : {};
      const code = typeof failure.code === 'number' ? failure.code : COMMAND_NOT_FOUND;
      return {
        stdout: typeof failure.stdout === 'string' ? failure.stdout : '',
        stderr: typeof failure.stderr === 'string' && failure.stderr !== '' ? failure.stderr : errorMessage(error),
        code,
        success: false,
      };
    }
  }

  private execInteractive(command: string, args: string[], env: NodeJS.ProcessEnv): Promise<ExecutionResult> {
    return new Promise((resolve) => {
      const child = spawn(command, args, { env, stdio: 'inherit' });

      child.on('error', (error) => {
        resolve({ stdout: '', stderr: error.message, code: COMMAND_NOT_FOUND, success: false });
      });

      child.on('close', (code) => {
        const exitCode = code ?? 1;
        resolve({ stdout: '', stderr: '', code: exitCode, success: exitCode === 0 });
      });
    });
  }
}

/**
 * Run `<command> --version` and return its first output line, or undefined if
 * the command is not on the search path or fails.
 */
export async function probeCommand(executor: CommandExecutor, command: string): Promise<string | undefined> {
  const result = await executor.exec(command, ['--version']);
  if (!result.success) {
    return undefined;
  }
  const output = result.stdout.trim() || result.stderr.trim();
  return output.split(/\r?\n/)[0] || command;
}
