/**
 * @git-onboard/core
 *
 * Core logic for the Git onboarding wizard
 * Provides OS detection, Git installation, global configuration, SSH key setup and connectivity checks
 */

// Export common types
export type { ExecutionResult, FileProbe } from "./types/common.js";
export { OperatingSystem, LinuxDistribution } from "./types/common.js";

// Export OS module
export { OSDetector, DISTRIBUTION_MARKERS, fileExists } from "./os/index.js";

// Export Exec module
export { LocalExecutor, probeCommand, COMMAND_NOT_FOUND } from "./exec/index.js";
export type { CommandExecutor, ExecOptions } from "./exec/index.js";

// Export Prompts module
export type { Prompter } from "./prompts/index.js";

// Export Config module
export {
  ConfigManager,
  GitGlobalConfig,
  parseConfigList,
  DEFAULT_CONFIG,
  SSHKeyType,
  httpsPrefix,
  sshPrefix,
} from "./config/index.js";
export type {
  GitConfigStore,
  ConfigEntry,
  OnboardConfig,
  HostingConfig,
  GitDefaultsConfig,
  SSHKeyConfig,
  LoggingConfig,
} from "./config/index.js";

// Export Utils module
export {
  logger,
  initLogger,
  getLogger,
  getDefaultLogDir,
  LogLevel,
  SetupError,
  SetupErrorCode,
  isSetupError,
  errorMessage,
} from "./utils/index.js";
export type { Logger, LoggerConfig } from "./utils/index.js";

// Export Installation module
export {
  InstallationManager,
  LINUX_INSTALL_COMMANDS,
  HOMEBREW_INSTALL_SCRIPT,
  HOMEBREW_LOCATIONS,
  MANUAL_DOWNLOADS,
  InstallationStep,
  StepStatus,
} from "./installation/index.js";
export type {
  InstallationOptions,
  InstallationResult,
  InstallationProgress,
  PackageCommand,
  ProgressCallback,
} from "./installation/index.js";

// Export Setup module
export { GitConfigurator, credentialHelperFor, rewriteKeyFor } from "./setup/index.js";
export type { GitIdentity, ConfiguratorOptions, ConfigurationSummary } from "./setup/index.js";

// Export SSH module
export { SSHKeyManager, parseAgentOutput, expandHome } from "./ssh/index.js";
export type { SSHKeyManagerOptions, SSHKeySetupResult, SSHAgentEnvironment } from "./ssh/index.js";

// Export Connectivity module
export { ConnectivityChecker } from "./connectivity/index.js";
export type { ConnectivityReport, SSHCheckResult, HTTPSCheckResult } from "./connectivity/index.js";
