/**
 * Configuration Manager
 * Loads and saves onboarding preferences as YAML
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "js-yaml";
import { logger, LogLevel } from "../utils/logger.js";
import { SetupError, SetupErrorCode, errorMessage } from "../utils/errors.js";
import type { OnboardConfig } from "./types.js";
import { DEFAULT_CONFIG, SSHKeyType } from "./types.js";

const CONFIG_STEP = "Config";

type Mapping = Record<string, unknown>;

const isMapping = (value: unknown): value is Mapping =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isNonEmptyString = (value: unknown): value is string => typeof value === "string" && value.trim() !== "";

const isPositiveInteger = (value: unknown): value is number => Number.isInteger(value) && Number(value) > 0;

const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";

const isSSHKeyType = (value: unknown): value is SSHKeyType =>
  Object.values<unknown>(SSHKeyType).includes(value);

const isLogLevel = (value: unknown): value is LogLevel => Object.values<unknown>(LogLevel).includes(value);

/**
 * Configuration Manager class
 */
export class ConfigManager {
  private config: OnboardConfig | null = null;
  private configPath: string;

  /**
   * @param configPath Optional path to the configuration file
   */
  constructor(configPath?: string) {
    this.configPath = configPath ?? ConfigManager.getDefaultConfigPath();
  }

  /**
   * Default location: ~/.git-onboard/config.yaml
   */
  public static getDefaultConfigPath(): string {
    return path.join(os.homedir(), ".git-onboard", "config.yaml");
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, falling back to defaults when it does not exist
   */
  public async load(): Promise<OnboardConfig> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
        logger.debug("Configuration file not found, using defaults", { path: this.configPath });
        this.config = this.parse({});
        return this.config;
      }
      throw new SetupError(
        SetupErrorCode.CONFIG_INVALID,
        CONFIG_STEP,
        `Failed to read ${this.configPath}: ${errorMessage(error)}`
      );
    }

    let loaded: unknown;
    try {
      loaded = yaml.load(fileContent);
    } catch (error) {
      throw new SetupError(
        SetupErrorCode.CONFIG_INVALID,
        CONFIG_STEP,
        `Invalid YAML in ${this.configPath}: ${errorMessage(error)}`
      );
    }

    this.config = this.parse(loaded ?? {});

    logger.info("Configuration loaded successfully", { path: this.configPath });
    return this.config;
  }

  /**
   * Save configuration to file
   */
  public async save(config?: OnboardConfig): Promise<void> {
    const configToSave = config ?? this.config;

    if (!configToSave) {
      throw new Error("No configuration to save");
    }

    await fs.mkdir(path.dirname(this.configPath), { recursive: true });

    const yamlContent = yaml.dump(configToSave, {
      indent: 2,
      lineWidth: 100,
      noRefs: true,
    });

    await fs.writeFile(this.configPath, yamlContent, "utf-8");

    this.config = configToSave;
    logger.info("Configuration saved successfully", { path: this.configPath });
  }

  /**
   * Get the loaded configuration
   */
  public getConfig(): OnboardConfig {
    if (!this.config) {
      throw new Error("Configuration not loaded. Call load() first.");
    }
    return this.config;
  }

  /**
   * Read the parsed YAML document field by field over the defaults.
   * Every invalid field is reported, not just the first.
   */
  private parse(document: unknown): OnboardConfig {
    if (!isMapping(document)) {
      throw new SetupError(
        SetupErrorCode.CONFIG_INVALID,
        CONFIG_STEP,
        `${this.configPath} must contain a mapping at the top level`
      );
    }

    const root: Mapping = document;
    const problems: string[] = [];

    const section = (name: keyof OnboardConfig): Mapping => {
      const value = root[name];
      if (value === undefined || value === null) {
        return {};
      }
      if (isMapping(value)) {
        return value;
      }
      problems.push(`${name} must be a mapping`);
      return {};
    };

    const read = <T>(
      name: string,
      source: Mapping,
      key: string,
      fallback: T,
      accept: (value: unknown) => value is T,
      expected: string
    ): T => {
      const value = source[key];
      if (value === undefined || value === null) {
        return fallback;
      }
      if (accept(value)) {
        return value;
      }
      problems.push(`${name}.${key} must be ${expected}`);
      return fallback;
    };

    const text = (name: string, source: Mapping, key: string, fallback: string): string =>
      read(name, source, key, fallback, isNonEmptyString, "a non-empty string");
    const count = (name: string, source: Mapping, key: string, fallback: number): number =>
      read(name, source, key, fallback, isPositiveInteger, "a positive integer");

    const hosting = section("hosting");
    const git = section("git");
    const sshKey = section("sshKey");
    const logging = section("logging");
    const defaults = DEFAULT_CONFIG;

    const config: OnboardConfig = {
      hosting: {
        host: text("hosting", hosting, "host", defaults.hosting.host),
        sshUser: text("hosting", hosting, "sshUser", defaults.hosting.sshUser),
        testRepository: text("hosting", hosting, "testRepository", defaults.hosting.testRepository),
        keysUrl: text("hosting", hosting, "keysUrl", defaults.hosting.keysUrl),
      },
      git: {
        defaultBranch: text("git", git, "defaultBranch", defaults.git.defaultBranch),
        credentialCacheTimeout: count("git", git, "credentialCacheTimeout", defaults.git.credentialCacheTimeout),
      },
      sshKey: {
        type: read("sshKey", sshKey, "type", defaults.sshKey.type, isSSHKeyType, `one of ${Object.values(SSHKeyType).join(", ")}`),
        bits: count("sshKey", sshKey, "bits", defaults.sshKey.bits),
      },
      logging: {
        level: read("logging", logging, "level", defaults.logging.level, isLogLevel, `one of ${Object.values(LogLevel).join(", ")}`),
        logToFile: read("logging", logging, "logToFile", defaults.logging.logToFile, isBoolean, "true or false"),
      },
    };

    if (problems.length > 0) {
      throw new SetupError(SetupErrorCode.CONFIG_INVALID, CONFIG_STEP, `Invalid configuration in ${this.configPath}`, {
        problems,
      });
    }

    return config;
  }
}
