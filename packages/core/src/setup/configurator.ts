/**
 * Git Configurator
 * Collects identity and preferences and writes them to the global Git configuration
 */

import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { OperatingSystem } from '../types/common.js';
import { httpsPrefix, sshPrefix } from '../config/types.js';
import type { OnboardConfig } from '../config/types.js';
import type { GitConfigStore, ConfigEntry } from '../config/git-config.js';
import type { Prompter } from '../prompts/types.js';

export interface GitIdentity {
  name: string;
  email: string;
}

export interface ConfiguratorOptions {
  store: GitConfigStore;
  prompter: Prompter;
  os: OperatingSystem;
  config: OnboardConfig;
}

export interface ConfigurationSummary {
  identity: GitIdentity;
  defaultBranch?: string;
  editor?: string;
  sshRewrite: boolean;
  /** Undefined when the helper could not be set or there is none for this OS */
  credentialHelper?: string;
  /** Global `user.*` and `url.*` entries after all writes */
  entries: ConfigEntry[];
}

/**
 * Credential helper Git should use on each platform
 */
export function credentialHelperFor(os: OperatingSystem, cacheTimeout: number): string | undefined {
  switch (os) {
    case OperatingSystem.MACOS:
      return 'osxkeychain';
    case OperatingSystem.WINDOWS:
      return 'manager';
    case OperatingSystem.LINUX:
      return `cache --timeout=${cacheTimeout}`;
    case OperatingSystem.UNKNOWN:
      return undefined;
  }
}

/**
 * Key of the rewrite rule, e.g. url.git@github.com:.insteadOf
 */
export const rewriteKeyFor = (config: OnboardConfig): string => `url.${sshPrefix(config.hosting)}.insteadOf`;

const SUMMARY_SECTIONS = /^(user|url)\./i;

export class GitConfigurator {
  private readonly store: GitConfigStore;
  private readonly prompter: Prompter;
  private readonly os: OperatingSystem;
  private readonly config: OnboardConfig;

  constructor(options: ConfiguratorOptions) {
    this.store = options.store;
    this.prompter = options.prompter;
    this.os = options.os;
    this.config = options.config;
  }

  public async configure(): Promise<ConfigurationSummary> {
    const identity = await this.configureIdentity();
    const defaultBranch = await this.configureDefaultBranch();
    const editor = await this.configureEditor();
    const sshRewrite = await this.configureSshRewrite();
    const credentialHelper = await this.configureCredentialHelper();

    const entries = (await this.store.list()).filter((entry) => SUMMARY_SECTIONS.test(entry.key));

    return { identity, defaultBranch, editor, sshRewrite, credentialHelper, entries };
  }

  public async configureIdentity(): Promise<GitIdentity> {
    const name = await this.askRequired('Your full name (for commits):', 'Name');
    await this.store.set('user.name', name);

    const email = await this.askRequired('Your email address (for commits):', 'Email');
    await this.store.set('user.email', email);

    return { name, email };
  }

  public async configureDefaultBranch(): Promise<string | undefined> {
    const branch = this.config.git.defaultBranch;
    if (!(await this.prompter.confirm(`Set the default branch name for new repositories to '${branch}'?`, true))) {
      return undefined;
    }
    await this.store.set('init.defaultBranch', branch);
    return branch;
  }

  public async configureEditor(): Promise<string | undefined> {
    if (!(await this.prompter.confirm('Set a default editor for Git?', false))) {
      return undefined;
    }

    const editor = await this.prompter.ask('Editor command (e.g. nano, vim, code --wait):');
    if (editor.trim() === '') {
      logger.warn('No editor given, leaving core.editor unchanged');
      return undefined;
    }

    await this.store.set('core.editor', editor);
    return editor;
  }

  public async configureSshRewrite(): Promise<boolean> {
    const from = httpsPrefix(this.config.hosting);
    const to = sshPrefix(this.config.hosting);

    if (!(await this.prompter.confirm(`Always use SSH instead of HTTPS for ${this.config.hosting.host} (${from} → ${to})?`, false))) {
      return false;
    }

    await this.store.set(rewriteKeyFor(this.config), from);
    return true;
  }

  /**
   * Failure here is only a warning
   */
  public async configureCredentialHelper(): Promise<string | undefined> {
    const helper = credentialHelperFor(this.os, this.config.git.credentialCacheTimeout);
    if (!helper) {
      return undefined;
    }

    try {
      await this.store.set('credential.helper', helper);
      return helper;
    } catch (error) {
      logger.warn('Could not configure the credential helper', { helper, error: errorMessage(error) });
      return undefined;
    }
  }

  private async askRequired(message: string, label: string): Promise<string> {
    let question = message;
    while (true) {
      const answer = (await this.prompter.ask(question)).trim();
      if (answer !== '') {
        return answer;
      }
      logger.debug(`${label} left empty, asking again`);
      question = `${label} cannot be empty. ${message}`;
    }
  }
}
