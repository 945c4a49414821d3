/**
 * SSH Key Manager
 * Generates a key pair, registers it with ssh-agent and reads back the public key
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { logger } from "../utils/logger.js";
import { SetupError, SetupErrorCode } from "../utils/errors.js";
import { SSHKeyType } from "../config/types.js";
import { fileExists } from "../os/detector.js";
import type { CommandExecutor } from "../exec/types.js";
import type { Prompter } from "../prompts/types.js";
import type { GitConfigStore } from "../config/git-config.js";
import type { OnboardConfig } from "../config/types.js";
import type { SSHAgentEnvironment, SSHKeyManagerOptions, SSHKeySetupResult } from "./types.js";

const SSH_STEP = "SSH key";

/**
 * Parse the Bourne shell output of `ssh-agent -s`
 */
export function parseAgentOutput(output: string): SSHAgentEnvironment | undefined {
  const sock = output.match(/SSH_AUTH_SOCK=([^;\s]+)/);
  if (!sock) {
    return undefined;
  }
  const pid = output.match(/SSH_AGENT_PID=(\d+)/);
  return pid ? { SSH_AUTH_SOCK: sock[1], SSH_AGENT_PID: pid[1] } : { SSH_AUTH_SOCK: sock[1] };
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(filePath: string, homeDir: string): string {
  if (filePath === "~") {
    return homeDir;
  }
  if (filePath.startsWith("~/") || filePath.startsWith("~\\")) {
    return path.join(homeDir, filePath.slice(2));
  }
  return filePath;
}

/**
 * SSH Key Manager class
 */
export class SSHKeyManager {
  private readonly executor: CommandExecutor;
  private readonly prompter: Prompter;
  private readonly store: GitConfigStore;
  private readonly config: OnboardConfig;
  private readonly homeDir: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: SSHKeyManagerOptions) {
    this.executor = options.executor;
    this.prompter = options.prompter;
    this.store = options.store;
    this.config = options.config;
    this.homeDir = options.homeDir ?? os.homedir();
    this.env = options.env ?? process.env;
  }

  /**
   * ~/.ssh/id_<type>
   */
  public getDefaultKeyPath(): string {
    return path.join(this.homeDir, ".ssh", `id_${this.config.sshKey.type}`);
  }

  /**
   * Run the whole key setup: choose a path, reuse or generate, register with the agent
   */
  public async setup(): Promise<SSHKeySetupResult> {
    const keyPath = await this.resolveKeyPath();
    const publicKeyPath = `${keyPath}.pub`;

    await this.ensureKeyDirectory(path.dirname(keyPath));

    let backup: string[] = [];
    if (await fileExists(publicKeyPath)) {
      const overwrite = await this.prompter.confirm(
        `An SSH key already exists at ${publicKeyPath}. Overwrite it?`,
        false
      );
      if (!overwrite) {
        logger.info("Keeping existing SSH key", { keyPath });
        const publicKey = await fs.readFile(publicKeyPath, "utf-8");
        return { keyPath, publicKeyPath, publicKey, generated: false, agentRegistered: false };
      }
      backup = await this.backupKeyPair(keyPath);
    }

    try {
      const email = await this.resolveEmail();
      await this.generateKey(keyPath, email);
    } catch (error) {
      await this.restoreKeyPair(backup);
      throw error;
    }
    await this.discardBackup(backup);

    const agentRegistered = await this.registerWithAgent(keyPath);
    const publicKey = await fs.readFile(publicKeyPath, "utf-8");

    return { keyPath, publicKeyPath, publicKey, generated: true, agentRegistered };
  }

  private async resolveKeyPath(): Promise<string> {
    const defaultPath = this.getDefaultKeyPath();

    if (!(await this.prompter.confirm(`Use a custom SSH key path instead of ${defaultPath}?`, false))) {
      return defaultPath;
    }

    const custom = (await this.prompter.ask("SSH key path:")).trim();
    if (custom === "") {
      logger.info("No custom path given, using the default", { keyPath: defaultPath });
      return defaultPath;
    }
    return path.resolve(expandHome(custom, this.homeDir));
  }

  /**
   * Create the directory if needed. Only ~/.ssh and directories created here
   * are restricted to the owner; an existing shared directory keeps its mode.
   */
  private async ensureKeyDirectory(directory: string): Promise<void> {
    const created = await fs.mkdir(directory, { recursive: true, mode: 0o700 });
    if (created !== undefined || directory === path.dirname(this.getDefaultKeyPath())) {
      await fs.chmod(directory, 0o700);
    }
  }

  /**
   * Move the old pair aside as <file>.bak; returns the original paths moved
   */
  private async backupKeyPair(keyPath: string): Promise<string[]> {
    const moved: string[] = [];
    for (const file of [keyPath, `${keyPath}.pub`]) {
      if (await fileExists(file)) {
        await fs.rename(file, `${file}.bak`);
        moved.push(file);
      }
    }
    return moved;
  }

  private async restoreKeyPair(files: string[]): Promise<void> {
    for (const file of files) {
      await fs.rm(file, { force: true });
      await fs.rename(`${file}.bak`, file);
    }
    if (files.length > 0) {
      logger.warn("Key generation failed, previous SSH key restored", { files });
    }
  }

  private async discardBackup(files: string[]): Promise<void> {
    for (const file of files) {
      await fs.rm(`${file}.bak`, { force: true });
    }
  }

  private async resolveEmail(): Promise<string> {
    const configured = (await this.store.get("user.email")) ?? "";
    const answer = (await this.prompter.ask("Email to label the key with:", configured || undefined)).trim();
    return answer || configured;
  }

  private async generateKey(keyPath: string, email: string): Promise<void> {
    const { type, bits } = this.config.sshKey;

    if (type === SSHKeyType.RSA) {
      logger.warn("Generating an RSA key; ed25519 is the recommended key type for new keys");
    }

    const args = ["-t", type];
    if (type !== SSHKeyType.ED25519) {
      args.push("-b", String(bits));
    }
    args.push("-C", email, "-f", keyPath);

    logger.info("Generating SSH key pair", { keyPath, type });

    const result = await this.executor.exec("ssh-keygen", args, { interactive: true });
    if (!result.success) {
      throw new SetupError(
        SetupErrorCode.KEYGEN_FAILED,
        SSH_STEP,
        `ssh-keygen failed with exit code ${result.code}`,
        { keyPath }
      );
    }
  }

  /**
   * Add the key to ssh-agent. Failures are warnings only.
   */
  private async registerWithAgent(keyPath: string): Promise<boolean> {
    const agent = await this.ensureAgent();
    if (!agent) {
      return false;
    }

    const env: Record<string, string> = { SSH_AUTH_SOCK: agent.SSH_AUTH_SOCK };
    if (agent.SSH_AGENT_PID) {
      env.SSH_AGENT_PID = agent.SSH_AGENT_PID;
    }

    const result = await this.executor.exec("ssh-add", [keyPath], { interactive: true, env });
    if (!result.success) {
      logger.warn("Could not add the key to ssh-agent", { keyPath, code: result.code });
      return false;
    }

    logger.info("SSH key added to ssh-agent", { keyPath });
    return true;
  }

  private async ensureAgent(): Promise<SSHAgentEnvironment | undefined> {
    if (this.env.SSH_AUTH_SOCK) {
      return { SSH_AUTH_SOCK: this.env.SSH_AUTH_SOCK, SSH_AGENT_PID: this.env.SSH_AGENT_PID };
    }

    // ssh-agent forks into the background on its own
    const result = await this.executor.exec("ssh-agent", ["-s"]);
    const agent = result.success ? parseAgentOutput(result.stdout) : undefined;
    if (!agent) {
      logger.warn("Could not start ssh-agent", { code: result.code, stderr: result.stderr.trim() });
      return undefined;
    }

    logger.info("Started ssh-agent", { pid: agent.SSH_AGENT_PID });
    return agent;
  }
}
