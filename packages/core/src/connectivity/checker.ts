/**
 * Connectivity Checker
 * Tests SSH authentication and HTTPS reachability of the hosting service
 */

import { logger } from '../utils/logger.js';
import type { CommandExecutor } from '../exec/types.js';
import type { HostingConfig } from '../config/types.js';

export interface SSHCheckResult {
  target: string;
  /** Exit code of `ssh -T`; GitHub answers a successful login with 1 */
  code: number;
}

export interface HTTPSCheckResult {
  repository: string;
  reachable: boolean;
  error?: string;
}

export interface ConnectivityReport {
  ssh: SSHCheckResult;
  https: HTTPSCheckResult;
}

export class ConnectivityChecker {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly hosting: HostingConfig
  ) {}

  /**
   * Authenticated handshake. Output goes straight to the terminal and the
   * result is informational only.
   */
  public async checkSSH(): Promise<SSHCheckResult> {
    const target = `${this.hosting.sshUser}@${this.hosting.host}`;
    const result = await this.executor.exec('ssh', ['-T', target], { interactive: true });
    logger.info('SSH handshake finished', { target, code: result.code });
    return { target, code: result.code };
  }

  /**
   * Unauthenticated listing of the public test repository
   */
  public async checkHTTPS(): Promise<HTTPSCheckResult> {
    const repository = this.hosting.testRepository;
    const result = await this.executor.exec('git', ['ls-remote', repository]);

    if (!result.success) {
      logger.warn('Could not reach the test repository', { repository, code: result.code });
      return { repository, reachable: false, error: result.stderr.trim() || undefined };
    }

    logger.info('Test repository reachable', { repository });
    return { repository, reachable: true };
  }

  public async check(): Promise<ConnectivityReport> {
    const ssh = await this.checkSSH();
    const https = await this.checkHTTPS();
    return { ssh, https };
  }
}
