/**
 * Git global configuration store
 */

import { logger } from "../utils/logger.js";
import { SetupError, SetupErrorCode } from "../utils/errors.js";
import type { CommandExecutor } from "../exec/types.js";

export interface ConfigEntry {
  key: string;
  value: string;
}

/**
 * Key/value store backed by the user's global Git configuration
 */
export interface GitConfigStore {
  get(key: string): Promise<string | undefined>;
  /** Throws a SetupError when the write fails */
  set(key: string, value: string): Promise<void>;
  list(): Promise<ConfigEntry[]>;
}

/**
 * Parse `git config --list` output. Values may themselves contain '='.
 */
export function parseConfigList(output: string): ConfigEntry[] {
  const entries: ConfigEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const separator = line.indexOf("=");
    if (separator === -1) {
      entries.push({ key: line, value: "" });
    } else {
      entries.push({ key: line.slice(0, separator), value: line.slice(separator + 1) });
    }
  }
  return entries;
}

/**
 * GitConfigStore that shells out to `git config --global`
 */
export class GitGlobalConfig implements GitConfigStore {
  constructor(private readonly executor: CommandExecutor) {}

  public async get(key: string): Promise<string | undefined> {
    const result = await this.executor.exec("git", ["config", "--global", "--get", key]);
    if (!result.success) {
      // exit code 1 means the key is not set
      return undefined;
    }
    return result.stdout.trim();
  }

  public async set(key: string, value: string): Promise<void> {
    const result = await this.executor.exec("git", ["config", "--global", key, value]);
    if (!result.success) {
      throw new SetupError(
        SetupErrorCode.CONFIG_WRITE_FAILED,
        "Configurator",
        `Failed to set ${key}: ${result.stderr.trim() || `git exited with ${result.code}`}`,
        { key }
      );
    }
    logger.info("Global configuration updated", { key });
  }

  public async list(): Promise<ConfigEntry[]> {
    const result = await this.executor.exec("git", ["config", "--global", "--list"]);
    if (!result.success) {
      // no ~/.gitconfig yet
      return [];
    }
    return parseConfigList(result.stdout);
  }
}
