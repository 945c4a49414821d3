/**
 * Exec Module - Local command execution
 */

export { LocalExecutor, probeCommand, COMMAND_NOT_FOUND } from './executor.js';
export type { CommandExecutor, ExecOptions } from './types.js';
